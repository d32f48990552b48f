import { Command } from 'commander';
import { CliOptions } from './types/config';
import { TOOL_VERSION } from './version';

type ParsedOptions = {
  config?: string;
  setVersion?: string;
  logLevel?: string;
};

export function parseCliArguments(argv: string[] = process.argv): CliOptions {
  const program = new Command();

  program
    .name('version-sync')
    .description('Write one version string into the version declaration of each project manifest')
    .version(TOOL_VERSION)
    .option('-c, --config <path>', 'path to configuration file')
    .option('--set-version <version>', 'version to write, overriding the configuration')
    .option('--log-level <level>', 'log level: debug, info, warn or error')
    .parse(argv);

  const options = program.opts<ParsedOptions>();

  return {
    config: options.config,
    setVersion: options.setVersion,
    logLevel: options.logLevel,
  };
}
