/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { executeCollect, parseIndent, type CollectOptions } from './commands/collect.js';

export type CollectRunner = (options: CollectOptions) => Promise<number>;

export function createCLI(run: CollectRunner = executeCollect): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Interactively author a template configuration: globals, files and post-generation commands')
    .option('-o, --output <path>', 'Output destination path (stdout when omitted)')
    .option('-d, --dir <directory>', 'Project directory holding .tmplwiz.yaml', '.')
    .option('--indent <n>', 'Indent the JSON output by n spaces (0-8)', parseIndent)
    .option('--strict-answers', 'Fail on an answer other than yes/no to "Add next file"')
    .option('-v, --verbose', 'Pretty-print debug logs to stderr')
    .action(async (options: CollectOptions) => {
      process.exitCode = await run(options);
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exit(1);
  }
}
