/**
 * Ollama Helper Functions
 *
 * Timestamps, option mapping and image handling shared by the Ollama converters.
 */

import { isNumber, isRecord, isString, isStringArray } from '../../utils/typeGuards.js';

import type { CompletionParams, FinishReason } from '../../../types/index.js';

/**
 * Token ids Ollama clients expect in `context`. The upstream has no
 * equivalent, so this fixed sequence is returned unchanged every time.
 */
export const PLACEHOLDER_CONTEXT: readonly number[] = Object.freeze([128006, 882, 128007, 128006, 78191, 128007]);

export const DEFAULT_DONE_REASON = 'stop';

/**
 * RFC3339 timestamp in UTC with a `Z` suffix
 */
export function nowTimestamp(): string {
  return new Date().toISOString();
}

export function doneReasonOf(finishReason: FinishReason | null | undefined): string {
  return finishReason ?? DEFAULT_DONE_REASON;
}

export type SamplingParams = Pick<CompletionParams, 'temperature' | 'top_p' | 'seed' | 'max_tokens' | 'stop'>;

/**
 * Map Ollama `options` onto upstream sampling parameters.
 * Keys with no upstream counterpart (top_k, num_ctx, repeat_penalty, ...) are dropped.
 */
export function mapOptions(options: unknown): SamplingParams {
  if (!isRecord(options)) {
    return {};
  }

  const params: SamplingParams = {};
  const { temperature, top_p, seed, num_predict, stop } = options;

  if (isNumber(temperature)) {
    params.temperature = temperature;
  }
  if (isNumber(top_p)) {
    params.top_p = top_p;
  }
  if (isNumber(seed)) {
    params.seed = seed;
  }
  // -1 (unlimited) and -2 (fill context) have no upstream form; leave max_tokens unset
  if (isNumber(num_predict) && Number.isInteger(num_predict) && num_predict > 0) {
    params.max_tokens = num_predict;
  }
  if (isString(stop) || isStringArray(stop)) {
    params.stop = stop;
  }

  return params;
}

const IMAGE_SIGNATURES: ReadonlyArray<readonly [string, string]> = [
  ['iVBORw0KGgo', 'image/png'],
  ['/9j/', 'image/jpeg'],
  ['R0lGOD', 'image/gif'],
  ['UklGR', 'image/webp'],
];

/**
 * Ollama sends bare base64 images; the upstream wants data URLs
 */
export function toImageDataUrl(image: string): string {
  if (image.startsWith('data:')) {
    return image;
  }
  const mimeType = IMAGE_SIGNATURES.find(([signature]) => image.startsWith(signature))?.[1] ?? 'image/png';
  return `data:${mimeType};base64,${image}`;
}
