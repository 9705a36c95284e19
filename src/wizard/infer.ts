/**
 * Scalar type inference for operator-typed tokens.
 *
 * Each parser is total: it returns a typed value or `undefined`, never throws.
 * Parsers run in a fixed order and the first match wins, so `1` is a boolean,
 * `42` an integer, `4.2` a float and anything else the original string.
 */

import type { ScalarValue, ValueKind } from '../core/types.js';

type Parser = (token: string) => ScalarValue | undefined;

const TRUE_LITERALS = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_LITERALS = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseBoolean(token: string): boolean | undefined {
  if (TRUE_LITERALS.has(token)) return true;
  if (FALSE_LITERALS.has(token)) return false;
  return undefined;
}

/** Base-10 signed 64-bit integer; bigint only when a number would lose digits. */
export function parseInteger(token: string): number | bigint | undefined {
  if (!INTEGER_PATTERN.test(token)) return undefined;
  const value = BigInt(token);
  if (value < INT64_MIN || value > INT64_MAX) return undefined;
  const asNumber = Number(value);
  return Number.isSafeInteger(asNumber) ? asNumber : value;
}

export function parseFloat64(token: string): number | undefined {
  if (!FLOAT_PATTERN.test(token)) return undefined;
  const value = Number(token);
  // 1e400 overflows to Infinity, which JSON cannot carry
  return Number.isFinite(value) ? value : undefined;
}

export interface InferredValue {
  kind: ValueKind;
  value: ScalarValue;
}

const PARSERS: ReadonlyArray<readonly [ValueKind, Parser]> = [
  ['boolean', parseBoolean],
  ['integer', parseInteger],
  ['float', parseFloat64],
];

/** Like {@link inferValue}, but also reports which parser matched. */
export function classifyToken(token: string): InferredValue {
  for (const [kind, parse] of PARSERS) {
    const value = parse(token);
    if (value !== undefined) {
      return { kind, value };
    }
  }
  return { kind: 'string', value: token };
}

export function inferValue(token: string): ScalarValue {
  return classifyToken(token).value;
}
