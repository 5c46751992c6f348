/** Raised when a status document is not valid JSON or does not match the schema. */
export class DirectoryDecodeError extends Error {
  public issues: string[];

  constructor(issues: string[], source?: string) {
    const origin = source ? ` from ${source}` : '';
    super(`malformed mirror status${origin}: ${issues.join('; ')}`);
    this.name = 'DirectoryDecodeError';
    this.issues = issues;
  }
}

/** Raised when the status document could not be downloaded. */
export class DirectoryFetchError extends Error {
  public url: string;
  public status?: number;

  constructor(url: string, message: string, status?: number) {
    super(`failed to fetch ${url}: ${message}`);
    this.name = 'DirectoryFetchError';
    this.url = url;
    this.status = status;
  }
}
