/**
 * JSON encoding of the collected document.
 *
 * lossless-json carries 64-bit integers through both directions: bigint
 * values are written with every digit and integers beyond the safe range are
 * read back as bigint. Mapping keys are written in UTF-8 byte order; files
 * and commands keep their entry order.
 */

import { writeFileSync } from 'fs';
import { isInteger, parse, stringify } from 'lossless-json';
import type { Logger } from 'pino';
import { DocumentFormatError, OutputError } from '../core/errors.js';
import {
  WizardDocumentSchema,
  type ScalarValue,
  type Variables,
  type WizardDocument,
} from '../core/types.js';

type JsonValue = ScalarValue | null | JsonValue[] | { [key: string]: JsonValue };

function byUtf8(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf-8'), Buffer.from(b, 'utf-8'));
}

function checkedValue(value: ScalarValue): ScalarValue {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new Error(`json: unsupported value: ${value}`);
  }
  return value;
}

function sortedVariables(vars: Variables | null): JsonValue {
  if (vars === null) return null;
  return Object.fromEntries(
    Object.keys(vars).sort(byUtf8).map((key) => [key, checkedValue(vars[key])]),
  );
}

function toJsonValue(doc: WizardDocument): JsonValue {
  const out: { [key: string]: JsonValue } = { global: sortedVariables(doc.global) };
  if (doc.files.length > 0) {
    out.files = doc.files.map((f) => ({
      name: f.name,
      path: f.path,
      template: f.template,
      local: sortedVariables(f.local),
    }));
  }
  if (doc.commands.length > 0) {
    out.commands = doc.commands.map((c) => ({ name: c.name, args: [...c.args] }));
  }
  return out;
}

/** Same rule as inference: bigint only where a number would lose digits. */
function parseNumber(value: string): number | bigint {
  if (isInteger(value)) {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : BigInt(value);
  }
  return Number(value);
}

/** Render the document as JSON followed by a newline; indent 0 is compact. */
export function serializeDocument(doc: WizardDocument, indent: number = 0): string {
  const text = stringify(toJsonValue(doc), undefined, indent > 0 ? indent : undefined);
  if (text === undefined) {
    throw new Error('json: document produced no output');
  }
  return text + '\n';
}

/** Parse a serialized document back and validate its shape. */
export function parseDocument(text: string): WizardDocument {
  let raw: unknown;
  try {
    raw = parse(text, null, parseNumber);
  } catch (err) {
    throw new DocumentFormatError(
      `document is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      err instanceof Error ? err : undefined,
    );
  }
  const result = WizardDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new DocumentFormatError(`invalid document: ${issues}`, result.error);
  }
  return result.data;
}

export interface WriteOptions {
  /** File to create or truncate; stdout when absent. */
  path?: string;
  indent?: number;
  stdout: NodeJS.WritableStream;
  logger: Logger;
}

export type WriteResult =
  | { ok: true; destination: string; bytes: number }
  | { ok: false; error: OutputError };

/**
 * Write the finished document. Failures come back as an OutputError instead
 * of being thrown: they are reported, not fatal.
 */
export function writeDocument(doc: WizardDocument, options: WriteOptions): WriteResult {
  const destination = options.path || '<stdout>';
  try {
    const text = serializeDocument(doc, options.indent ?? 0);
    if (options.path) {
      writeFileSync(options.path, text, 'utf-8');
    } else {
      options.stdout.write(text);
    }
    options.logger.info({ destination, bytes: Buffer.byteLength(text) }, 'document written');
    return { ok: true, destination, bytes: Buffer.byteLength(text) };
  } catch (err) {
    const cause = err instanceof Error ? err : new Error(String(err));
    const error = new OutputError(`failed to produce output: ${cause.message}`, destination, cause);
    options.logger.error({ err: cause, destination }, error.message);
    return { ok: false, error };
  }
}
