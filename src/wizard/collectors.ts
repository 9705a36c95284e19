/**
 * The three collection stages. Each stage owns its prompts and reads from the
 * shared line source until the operator answers with the negative token.
 */

import type { Logger } from 'pino';
import {
  InputReadError,
  InputShapeError,
  withContext,
  type WizardStage,
} from '../core/errors.js';
import type {
  AnswerPolicy,
  CommandHook,
  FileSpec,
  ScalarValue,
  Variables,
} from '../core/types.js';
import { classifyToken } from './infer.js';
import type { LineSource } from './line-reader.js';
import {
  FILE_FIELD_PROMPTS,
  commandsBanner,
  filesBanner,
  globalsBanner,
  localsBanner,
  nextFilePrompt,
  nextValuePrompt,
  type AnswerTokens,
} from './prompts.js';

export interface PromptIO {
  lines: LineSource;
  out: NodeJS.WritableStream;
  answers: AnswerTokens;
  policy: AnswerPolicy;
  logger: Logger;
}

export function splitTokens(line: string): string[] {
  return line.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Read `name value` pairs until the negative answer or end of input.
 *
 * The affirmative answer is skipped wherever it appears, including as the
 * very first line, so "y" right after the banner is read as "go on" rather
 * than as data. Returns null when no pair was added.
 */
export async function collectVariables(
  io: PromptIO,
  banner: string,
  stage: WizardStage,
): Promise<Variables | null> {
  io.out.write(banner);

  const collected = new Map<string, ScalarValue>();
  for (;;) {
    const line = await io.lines.read();
    if (line === null || line === io.answers.no) {
      break;
    }
    if (line === io.answers.yes) {
      continue;
    }

    const parts = splitTokens(line);
    if (parts.length !== 2) {
      throw new InputShapeError('incorrect number of tokens', stage);
    }
    const [name, token] = parts;
    const { kind, value } = classifyToken(token);
    collected.set(name, value);
    io.logger.debug({ stage, name, kind }, 'variable stored');

    io.out.write(nextValuePrompt(io.answers));
  }

  // fromEntries defines own properties, so a "__proto__" name stays data
  return collected.size > 0 ? Object.fromEntries(collected) : null;
}

export async function collectGlobals(io: PromptIO): Promise<Variables | null> {
  io.logger.debug({ stage: 'globals' }, 'collecting global variables');
  try {
    return await collectVariables(io, globalsBanner(io.answers), 'globals');
  } catch (err) {
    throw withContext('global variables', 'globals', err);
  }
}

async function readRequired(io: PromptIO, prompt: string): Promise<string> {
  io.out.write(prompt);
  const line = await io.lines.read();
  if (line === null) {
    throw new InputReadError('unexpected end of input', 'files');
  }
  return line;
}

async function readField(io: PromptIO, prompt: string): Promise<string> {
  const parts = splitTokens(await readRequired(io, prompt));
  if (parts.length !== 1) {
    throw new InputShapeError(`wrong number of tokens: ${parts.length}`, 'files');
  }
  return parts[0];
}

async function readFile(io: PromptIO): Promise<FileSpec> {
  const name = await readField(io, FILE_FIELD_PROMPTS.name);
  const path = await readField(io, FILE_FIELD_PROMPTS.path);
  const template = await readField(io, FILE_FIELD_PROMPTS.template);

  io.out.write('\n');
  const local = await collectVariables(io, localsBanner(io.answers), 'files');
  return { name, path, template, local };
}

/**
 * Collect file descriptors. The first record is always read: there is no
 * y/n question before it.
 */
export async function collectFiles(io: PromptIO): Promise<FileSpec[]> {
  io.logger.debug({ stage: 'files', policy: io.policy }, 'collecting files');
  io.out.write(filesBanner());

  const files: FileSpec[] = [];
  try {
    for (;;) {
      const file = await readFile(io);
      files.push(file);
      io.logger.debug({ stage: 'files', file: file.name, template: file.template }, 'file added');

      const answer = (await readRequired(io, nextFilePrompt(io.answers))).trim();
      if (answer === io.answers.no) {
        break;
      }
      if (answer !== io.answers.yes) {
        if (io.policy === 'strict') {
          throw new InputShapeError(
            `unexpected answer "${answer}": expected ${io.answers.yes} or ${io.answers.no}`,
            'files',
          );
        }
        io.logger.debug({ stage: 'files', answer }, 'unrecognized answer, starting next file');
      }
    }
  } catch (err) {
    throw withContext('file parameters', 'files', err);
  }
  return files;
}

export async function collectCommands(io: PromptIO): Promise<CommandHook[]> {
  io.logger.debug({ stage: 'commands' }, 'collecting commands');
  io.out.write(commandsBanner(io.answers));

  const commands: CommandHook[] = [];
  try {
    for (;;) {
      const line = await io.lines.read();
      if (line === null || line === io.answers.no) {
        break;
      }
      if (line === io.answers.yes) {
        continue;
      }

      const [name, ...args] = splitTokens(line);
      if (name === undefined) {
        throw new InputShapeError('incorrect command declaration length', 'commands');
      }
      commands.push({ name, args });
      io.logger.debug({ stage: 'commands', command: name, argc: args.length }, 'command added');

      io.out.write(nextValuePrompt(io.answers));
    }
  } catch (err) {
    throw withContext('read commands', 'commands', err);
  }
  return commands;
}
