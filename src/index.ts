/**
 * tmplwiz — interactive authoring of template configuration documents
 * Public exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { runWizard, serializeDocument, getLogger } from 'tmplwiz';
 *
 * const doc = await runWizard({ input: process.stdin, output: process.stdout, logger: getLogger() });
 * process.stdout.write(serializeDocument(doc, 2));
 * ```
 */

// Core
export { ConfigManager, type ConfigOverrides } from './core/config.js';
export { createLogger, getLogger, setLogger } from './core/logger.js';
export {
  WizardError,
  InputShapeError,
  InputReadError,
  OutputError,
  ConfigError,
  DocumentFormatError,
  type WizardStage,
} from './core/errors.js';
export {
  WizardConfigSchema,
  WizardDocumentSchema,
  FileSpecSchema,
  CommandHookSchema,
  ScalarValueSchema,
  type WizardConfig,
  type WizardDocument,
  type FileSpec,
  type CommandHook,
  type ScalarValue,
  type Variables,
  type AnswerPolicy,
  type ValueKind,
} from './core/types.js';

// Wizard
export { runWizard, type WizardOptions } from './wizard/session.js';
export {
  collectVariables,
  collectGlobals,
  collectFiles,
  collectCommands,
  splitTokens,
  type PromptIO,
} from './wizard/collectors.js';
export {
  inferValue,
  classifyToken,
  parseBoolean,
  parseInteger,
  parseFloat64,
  type InferredValue,
} from './wizard/infer.js';
export { LineReader, type LineSource } from './wizard/line-reader.js';
export {
  serializeDocument,
  parseDocument,
  writeDocument,
  type WriteOptions,
  type WriteResult,
} from './wizard/serializer.js';
export type { AnswerTokens } from './wizard/prompts.js';

// CLI
export { createCLI, main } from './cli/index.js';

export { VERSION, NAME } from './version.js';
