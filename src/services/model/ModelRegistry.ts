/**
 * Model Registry
 *
 * Static lookup tables describing upstream models: which ones are listed to
 * clients, how large they claim to be, and which local names alias them.
 * Everything here is a pure function of the model id.
 */

import { createHash } from 'crypto';

import type { OllamaModel, OllamaModelDetails } from '../../types/ollama.js';

/** Local model names some clients hardcode, mapped to upstream ids */
const MODEL_ALIASES: Readonly<Record<string, string>> = Object.freeze({
  llama2: 'gpt-3.5-turbo',
  mistral: 'gpt-3.5-turbo',
  codellama: 'gpt-3.5-turbo-16k',
});

const CHAT_MODELS: ReadonlySet<string> = new Set([
  'gpt-3.5-turbo',
  'gpt-3.5-turbo-16k',
  'gpt-4',
  'gpt-4-32k',
  'gpt-4-turbo',
  'gpt-4o',
  'gpt-4o-mini',
]);

const EMBEDDING_MODELS: ReadonlySet<string> = new Set([
  'text-embedding-ada-002',
  'text-embedding-3-small',
  'text-embedding-3-large',
]);

const INCLUDE_PREFIXES = ['gpt-', 'text-embedding-', 'chatgpt-', 'o1-', 'o3-'] as const;

const EXCLUDE_KEYWORDS = ['deprecated', 'preview', 'instruct', 'davinci', 'curie', 'babbage'] as const;

const EXCLUDE_PREFIXES = ['text-ada-', 'code-ada-', 'ada-'] as const;

/** Reported sizes in bytes; upstream models have no real on-disk size */
const MODEL_SIZES: Readonly<Record<string, number>> = Object.freeze({
  'gpt-3.5-turbo': 1_500_000_000,
  'gpt-3.5-turbo-16k': 1_600_000_000,
  'gpt-4': 20_000_000_000,
  'gpt-4-32k': 20_500_000_000,
  'gpt-4-turbo': 25_000_000_000,
  'text-embedding-ada-002': 350_000_000,
  'text-embedding-3-small': 100_000_000,
  'text-embedding-3-large': 600_000_000,
});

export const EMBEDDING_FAMILY_SIZE = 500_000_000;
export const LARGE_CHAT_FAMILY_SIZE = 20_000_000_000;
export const MEDIUM_CHAT_FAMILY_SIZE = 2_000_000_000;
export const DEFAULT_MODEL_SIZE = 1_000_000_000;

/** Checked in order, first substring match wins */
const PARAMETER_SIZES: ReadonlyArray<readonly [string, string]> = [
  ['gpt-3.5', '3.5B'],
  ['gpt-4', '175B'],
  ['text-embedding-ada-002', '1.3B'],
  ['text-embedding-3-small', '1.3B'],
  ['text-embedding-3-large', '3B'],
];

const DIGEST_NAMESPACE = 'openai:';
const DIGEST_LENGTH = 12;

export class ModelRegistry {
  /**
   * Decide whether an upstream model is listed to clients.
   * Exclusions win over everything else, including the known-model sets.
   */
  shouldInclude(modelId: string): boolean {
    const id = modelId.toLowerCase();

    if (EXCLUDE_KEYWORDS.some((keyword) => id.includes(keyword))) {
      return false;
    }
    if (EXCLUDE_PREFIXES.some((prefix) => id.startsWith(prefix))) {
      return false;
    }

    if (CHAT_MODELS.has(modelId) || EMBEDDING_MODELS.has(modelId)) {
      return true;
    }
    if (Object.values(MODEL_ALIASES).includes(modelId)) {
      return true;
    }

    return INCLUDE_PREFIXES.some((prefix) => id.startsWith(prefix));
  }

  estimateSize(modelId: string): number {
    const known = MODEL_SIZES[modelId];
    if (known !== undefined) {
      return known;
    }

    if (this.isEmbeddingModel(modelId)) {
      return EMBEDDING_FAMILY_SIZE;
    }
    const id = modelId.toLowerCase();
    if (id.includes('gpt-4')) {
      return LARGE_CHAT_FAMILY_SIZE;
    }
    if (id.includes('gpt-3.5')) {
      return MEDIUM_CHAT_FAMILY_SIZE;
    }
    return DEFAULT_MODEL_SIZE;
  }

  /**
   * Stable pseudo-digest in Ollama's `sha256:<hex>` shape
   */
  computeDigest(modelId: string): string {
    const hex = createHash('sha256').update(`${DIGEST_NAMESPACE}${modelId}`).digest('hex');
    return `sha256:${hex.slice(0, DIGEST_LENGTH)}`;
  }

  describeFamily(modelId: string): OllamaModelDetails {
    const isGpt = modelId.includes('gpt');
    const parameterSize = PARAMETER_SIZES.find(([key]) => modelId.includes(key))?.[1] ?? 'Unknown';

    return {
      parent_model: '',
      format: 'gguf',
      family: isGpt ? 'gpt' : 'unknown',
      families: isGpt ? ['gpt'] : [],
      parameter_size: parameterSize,
      quantization_level: 'Q4_K_M',
    };
  }

  /**
   * Build the /api/tags entry for an upstream model.
   * The only place an OllamaModel is constructed, so `name === model` holds everywhere.
   */
  toDescriptor(modelId: string, createdUnixSeconds: number): OllamaModel {
    const created = new Date(createdUnixSeconds * 1000);
    if (Number.isNaN(created.getTime())) {
      throw new RangeError(`Invalid creation timestamp for model ${modelId}: ${createdUnixSeconds}`);
    }

    return {
      name: modelId,
      model: modelId,
      modified_at: created.toISOString(),
      size: this.estimateSize(modelId),
      digest: this.computeDigest(modelId),
      details: this.describeFamily(modelId),
    };
  }

  /**
   * Map a client-facing model name to the upstream id; unknown names pass through
   */
  resolveAlias(modelId: string): string {
    return MODEL_ALIASES[modelId] ?? modelId;
  }

  isEmbeddingModel(modelId: string): boolean {
    return EMBEDDING_MODELS.has(modelId) || modelId.toLowerCase().includes('embedding');
  }
}

export const modelRegistry = new ModelRegistry();
