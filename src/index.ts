/**
 * Deep-TOON: compact, token-lean text form of JSON data for LLM prompts.
 *
 * `encode` / `decode` / `smartEncode` take and return plain JSON values; the
 * `*Value` variants work on the tagged `Value` tree, which also keeps the key
 * order of integer-like keys.
 */

import type { JsonValue } from './ast.js';
import { fromJson, toJson } from './ast.js';
import type { DecodeOptions, DecodeResult } from './decoder.js';
import { decodeValue, safeDecodeValue } from './decoder.js';
import type { EncodeOptions } from './encoder.js';
import { encodeValue } from './encoder.js';
import type { EncodingReport, SmartEncodeOptions } from './smart.js';
import { measureValue, smartEncodeValue } from './smart.js';

export * from './ast.js';
export * from './errors.js';
export { encodeValue, tabularFields, type EncodeOptions } from './encoder.js';
export { decodeValue, safeDecodeValue, parseHeader, DEFAULT_MAX_DEPTH, type ArrayHeader, type DecodeOptions, type DecodeResult } from './decoder.js';
export {
  smartEncodeValue,
  measureValue,
  lengthCost,
  DEFAULT_THRESHOLD,
  type CostFunction,
  type EncodingFormat,
  type EncodingReport,
  type SmartEncodeOptions,
} from './smart.js';
export { stringify, type StringifyOptions } from './stringify.js';
export { DEFAULT_DELIMITER, isValidDelimiter, formatNumber, isBareString } from './literal.js';

export function encode(value: JsonValue, options: EncodeOptions = {}): string {
  return encodeValue(fromJson(value), options);
}

export function decode(text: string, options: DecodeOptions = {}): JsonValue {
  return toJson(decodeValue(text, options));
}

export function safeDecode(text: string, options: DecodeOptions = {}): DecodeResult<JsonValue> {
  const result = safeDecodeValue(text, options);
  return result.ok ? { ok: true, value: toJson(result.value) } : result;
}

export function smartEncode(value: JsonValue, options: SmartEncodeOptions = {}): string {
  return smartEncodeValue(fromJson(value), options);
}

export function measure(value: JsonValue, options: SmartEncodeOptions = {}): EncodingReport {
  return measureValue(fromJson(value), options);
}
