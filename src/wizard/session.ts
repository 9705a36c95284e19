import type { Logger } from 'pino';
import { nanoid } from 'nanoid';
import type { AnswerPolicy, WizardDocument } from '../core/types.js';
import { collectCommands, collectFiles, collectGlobals, type PromptIO } from './collectors.js';
import { LineReader } from './line-reader.js';
import type { AnswerTokens } from './prompts.js';

export interface WizardOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  logger: Logger;
  answers?: AnswerTokens;
  policy?: AnswerPolicy;
}

/**
 * Run globals, files and commands in order against one input stream and
 * return the assembled document. The first failing stage aborts the run.
 */
export async function runWizard(options: WizardOptions): Promise<WizardDocument> {
  const sessionId = nanoid(8);
  const logger = options.logger.child({ session: sessionId });
  const reader = new LineReader(options.input);

  const io: PromptIO = {
    lines: reader,
    out: options.output,
    answers: options.answers ?? { yes: 'y', no: 'n' },
    policy: options.policy ?? 'lenient',
    logger,
  };

  const document: WizardDocument = { global: null, files: [], commands: [] };
  logger.info({ policy: io.policy }, 'wizard session started');
  try {
    document.global = await collectGlobals(io);
    document.files = await collectFiles(io);
    document.commands = await collectCommands(io);
  } finally {
    reader.close();
  }

  logger.info(
    {
      globals: document.global ? Object.keys(document.global).length : 0,
      files: document.files.length,
      commands: document.commands.length,
    },
    'wizard session finished',
  );
  return document;
}
