import chalk from 'chalk';
import type { Command } from 'commander';
import { parseCliOptions, parseEnvironment } from '../boundaries/index';
import { handleUnknownError } from '../errors/index';
import { debug, error, setSilentMode, setVerboseMode } from '../output/logger';
import { buildMessages, resolveFormats } from './orchestrator';
import { OutputStyle } from './types';

/*
 * Registers the default command: build the letter in the selected formats
 * and print it.
 *
 * Note: process.exit is intentional in CLI commands to set proper exit codes.
 */
export function registerMainCommand(program: Command): void {
  program
    .option('-f, --format <format>', 'Message format: json, xml, or all (default from MESSAGE_DIRECTOR_FORMAT, else all)')
    .option('--output <style>', 'Output style: line (default) or raw', 'line')
    .option('-v, --verbose', 'Log each construction step to stderr')
    .action(() => {
      // Parse and validate CLI options
      let cliOptions;
      try {
        cliOptions = parseCliOptions(program.opts());
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing CLI options');
        error(`Error: ${err.message}`);
        process.exit(1);
      }

      // Parse and validate environment variables
      let env;
      try {
        env = parseEnvironment();
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Validating environment variables');
        error(`Error: ${err.message}`);
        error('Please fix these in your .env file or environment.');
        process.exit(1);
      }

      const outputStyle = cliOptions.output === 'raw' ? OutputStyle.Raw : OutputStyle.Line;
      setSilentMode(outputStyle === OutputStyle.Raw);
      setVerboseMode(cliOptions.verbose);
      if (env.MESSAGE_DIRECTOR_COLOR === false) {
        chalk.level = 0;
      }

      const selection = cliOptions.format ?? env.MESSAGE_DIRECTOR_FORMAT;
      const formats = resolveFormats(selection);
      debug(`Building ${formats.join(', ')} with ${outputStyle} output`);

      try {
        buildMessages({ formats, outputStyle });
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Building messages');
        error(`Error: ${err.message}`);
        process.exit(1);
      }
    });
}
