#!/usr/bin/env -S node --import tsx
import { writeFile } from 'node:fs/promises';
import { renderCountryReport, renderMirrorlist } from '@mirrorrank/mirrorlist';
import { buildConfig } from './config';
import { parseArgs, usage } from './lib';
import { logDebug, logError, logInfo, logWarn, setLogLevel } from './logging';
import { loadDirectory, selectMirrors, summarizeOutcomes } from './pipeline';

const run = async (): Promise<void> => {
  const command = process.argv[2];
  if (!command || command === 'help' || command === '--help') {
    console.error(usage());
    process.exit(command ? 0 : 1);
  }

  const args = parseArgs(process.argv.slice(3));
  const config = buildConfig(args);
  setLogLevel(config.logLevel);
  logDebug('[mirrorrank] configuration', config);

  if (command === 'countries') {
    const directory = await loadDirectory(config);
    console.log(renderCountryReport(directory));
    return;
  }

  if (command === 'mirrorlist') {
    const directory = await loadDirectory(config);
    logInfo(`[mirrorrank] loaded ${directory.endpoints.length} mirrors from ${directory.source}`);

    const selection = await selectMirrors(directory, config, { logger: logDebug });
    if (config.sort === 'rate') {
      logInfo('[mirrorrank] download rates measured', summarizeOutcomes(selection.outcomes));
    }
    if (selection.directory.endpoints.length === 0) {
      logWarn('[mirrorrank] no mirrors matched the selection criteria');
    }

    const content = renderMirrorlist(selection.directory, { generatedAt: new Date() });
    if (config.savePath) {
      await writeFile(config.savePath, `${content}\n`);
      logInfo(`[mirrorrank] wrote ${selection.directory.endpoints.length} servers to ${config.savePath}`);
    } else {
      console.log(content);
    }
    return;
  }

  console.error(usage());
  process.exit(1);
};

run().catch((error) => {
  logError(`[mirrorrank] ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
