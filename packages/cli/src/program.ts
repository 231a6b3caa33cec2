import { Command } from 'commander';
import { version } from '../package.json';
import { registerCacheCommand, registerScanCommand } from './commands';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('tagscan')
    .description('Find TODO, FIXME and similar tags in source comments')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging');

  registerScanCommand(program);
  registerCacheCommand(program);

  return program;
}
