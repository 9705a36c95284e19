/**
 * The wizard run behind `tmplwiz`: load config, collect globals, files and
 * commands from stdin, then write the document.
 *
 * Collection failures are fatal (exit code 1). A document that cannot be
 * written is reported but leaves the exit code at 0.
 */

import { resolve } from 'path';
import type { Logger } from 'pino';
import { InvalidArgumentError } from 'commander';
import { ConfigManager, type ConfigOverrides } from '../../core/config.js';
import { createLogger, getLogger, setLogger } from '../../core/logger.js';
import { WizardError } from '../../core/errors.js';
import type { WizardConfig, WizardDocument } from '../../core/types.js';
import { runWizard } from '../../wizard/session.js';
import { writeDocument } from '../../wizard/serializer.js';

export interface CollectOptions {
  output?: string;
  indent?: number;
  strictAnswers?: boolean;
  verbose?: boolean;
  dir: string;
}

export interface CollectStreams {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  /** Overrides ~/.tmplwiz as the global config location. */
  globalDir?: string;
}

export function parseIndent(value: string): number {
  const indent = Number(value);
  if (!Number.isInteger(indent) || indent < 0 || indent > 8) {
    throw new InvalidArgumentError('indent must be an integer from 0 to 8.');
  }
  return indent;
}

function toOverrides(options: CollectOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (options.strictAnswers) {
    overrides.answers = { policy: 'strict' };
  }
  if (options.indent !== undefined) {
    overrides.output = { indent: options.indent };
  }
  if (options.verbose) {
    overrides.ui = { verbose: true };
  }
  return overrides;
}

function resolveLogger(config: WizardConfig, streams: CollectStreams): Logger {
  if (streams.logger) {
    return streams.logger;
  }
  if (config.ui.verbose) {
    setLogger(createLogger('tmplwiz', true));
  }
  return getLogger();
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function executeCollect(
  options: CollectOptions,
  streams: CollectStreams = {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
  },
): Promise<number> {
  let config: WizardConfig;
  try {
    const configManager = new ConfigManager(resolve(options.dir), streams.globalDir);
    config = configManager.load(toOverrides(options), streams.env ?? process.env);
  } catch (err) {
    streams.stderr.write(`failed to load config: ${messageOf(err)}\n`);
    return 1;
  }

  const logger = resolveLogger(config, streams);

  let document: WizardDocument;
  try {
    document = await runWizard({
      input: streams.stdin,
      output: streams.stdout,
      logger,
      answers: { yes: config.answers.yes, no: config.answers.no },
      policy: config.answers.policy,
    });
  } catch (err) {
    const code = err instanceof WizardError ? err.code : 'UNKNOWN_ERROR';
    logger.error({ err, code }, 'wizard aborted');
    streams.stderr.write(`\nfailed to process config: ${messageOf(err)}\n`);
    return 1;
  }

  const result = writeDocument(document, {
    path: options.output,
    indent: config.output.indent,
    stdout: streams.stdout,
    logger,
  });
  if (!result.ok) {
    streams.stderr.write(`${result.error.message}\n`);
  }
  return 0;
}
