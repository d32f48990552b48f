#!/usr/bin/env node

import { parseCliArguments } from './cli';
import { ConfigLoader } from './config/configLoader';
import { VersionSynchronizer, SyncResult } from './services/versionSynchronizer';
import { Logger } from './utils/logger';

export function main(argv: string[] = process.argv): SyncResult[] {
  const cliOptions = parseCliArguments(argv);
  const config = ConfigLoader.loadConfig(cliOptions);
  const logger = new Logger(config.logging.level);

  const synchronizer = new VersionSynchronizer(config, logger);
  return synchronizer.synchronize();
}

// Only run main if this file is executed directly (not imported)
if (require.main === module) {
  try {
    main();
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
