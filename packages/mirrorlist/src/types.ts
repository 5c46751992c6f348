export type MirrorlistOptions = {
  limit?: number; // render at most this many servers
  generatedAt?: Date;
};

/** Occurrences of one (country, country code) pair. */
export type CountryCount = {
  country: string;
  code: string;
  count: number;
};
