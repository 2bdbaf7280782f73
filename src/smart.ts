/**
 * Smart encoding: use the compact form only when it beats baseline JSON by
 * at least a threshold under a caller-supplied cost function.
 */

import type { Value } from './ast.js';
import { valueEquals } from './ast.js';
import { safeDecodeValue } from './decoder.js';
import { encodeValue } from './encoder.js';
import { stringify } from './stringify.js';

/** Measures the size of a text, e.g. a token counter. */
export type CostFunction = (text: string) => number;

export interface SmartEncodeOptions {
  /** Minimum savings ratio for the compact form (default 0.1) */
  threshold?: number;
  /** Cost of a text (default: its length in characters) */
  costFunction?: CostFunction;
  /** Delimiter for the compact form (default ",") */
  delimiter?: string;
}

export const DEFAULT_THRESHOLD = 0.1;

export const lengthCost: CostFunction = (text) => text.length;

export type EncodingFormat = 'deep-toon' | 'json';

export interface EncodingReport {
  baselineText: string;
  compactText: string;
  baselineCost: number;
  compactCost: number;
  /** (baselineCost - compactCost) / baselineCost; 0 when the baseline costs nothing */
  savings: number;
  threshold: number;
  chosen: EncodingFormat;
  /** Whether the compact text decodes back to an equal value */
  roundTrip: boolean;
}

function compare(value: Value, options: SmartEncodeOptions) {
  const threshold = options.threshold ?? DEFAULT_THRESHOLD;
  const cost = options.costFunction ?? lengthCost;
  const baselineText = stringify(value);
  const compactText = encodeValue(value, { delimiter: options.delimiter });
  const baselineCost = cost(baselineText);
  const compactCost = cost(compactText);
  const savings = baselineCost > 0 ? (baselineCost - compactCost) / baselineCost : 0;
  const chosen: EncodingFormat = baselineCost > 0 && savings >= threshold ? 'deep-toon' : 'json';
  return { baselineText, compactText, baselineCost, compactCost, savings, threshold, chosen };
}

/**
 * Compact text when it saves at least `threshold` of the baseline cost,
 * baseline JSON otherwise.
 */
export function smartEncodeValue(value: Value, options: SmartEncodeOptions = {}): string {
  const result = compare(value, options);
  return result.chosen === 'deep-toon' ? result.compactText : result.baselineText;
}

/** Everything smartEncodeValue weighs, plus a round-trip check of the compact text. */
export function measureValue(value: Value, options: SmartEncodeOptions = {}): EncodingReport {
  const result = compare(value, options);
  const decoded = safeDecodeValue(result.compactText);
  return { ...result, roundTrip: decoded.ok && valueEquals(decoded.value, value) };
}
