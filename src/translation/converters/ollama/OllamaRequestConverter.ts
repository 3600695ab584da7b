/**
 * Ollama Request Converter
 *
 * Validates Ollama request bodies and builds upstream chat-completion and
 * embedding parameters from them.
 */

import { modelRegistry } from '../../../services/model/ModelRegistry.js';
import { RequestValidationError } from '../../errors/RequestValidationError.js';
import {
  isBoolean,
  isNonEmptyString,
  isOllamaRole,
  isRecord,
  isString,
  isStringArray,
  type UnknownRecord,
} from '../../utils/typeGuards.js';

import { mapOptions, toImageDataUrl } from './OllamaHelpers.js';

import type {
  ChatCompletionContentPart,
  ChatCompletionMessageParam,
  CompletionParams,
  EmbeddingCreateParams,
} from '../../../types/index.js';

export interface ConvertedCompletionRequest {
  /** Model name as the client sent it; echoed back in responses */
  requestedModel: string;
  stream: boolean;
  params: CompletionParams;
}

export interface ConvertedEmbeddingRequest {
  requestedModel: string;
  params: EmbeddingCreateParams;
}

function requireBody(body: unknown): UnknownRecord {
  if (!isRecord(body)) {
    throw new RequestValidationError('Request body must be a JSON object', undefined, 'schema');
  }
  return body;
}

function requireModel(body: UnknownRecord): string {
  const model = body['model'];
  if (!isString(model)) {
    throw new RequestValidationError('model is required', 'model', 'schema');
  }
  if (!isNonEmptyString(model)) {
    throw new RequestValidationError('model is required', 'model');
  }
  return model;
}

function readImages(value: unknown, field: string): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!isStringArray(value)) {
    throw new RequestValidationError(`${field} must be an array of base64 strings`, field, 'schema');
  }
  return value;
}

function userMessage(text: string, images: string[]): ChatCompletionMessageParam {
  if (images.length === 0) {
    return { role: 'user', content: text };
  }

  const parts: ChatCompletionContentPart[] = [{ type: 'text', text }];
  for (const image of images) {
    parts.push({ type: 'image_url', image_url: { url: toImageDataUrl(image) } });
  }
  return { role: 'user', content: parts };
}

function convertMessage(raw: unknown, index: number): ChatCompletionMessageParam {
  if (!isRecord(raw)) {
    throw new RequestValidationError(`messages[${index}] must be an object`, 'messages', 'schema');
  }

  const { role, content } = raw;
  if (!isOllamaRole(role)) {
    throw new RequestValidationError(
      `messages[${index}].role must be one of system, user, assistant, tool`,
      'messages',
    );
  }
  if (!isString(content)) {
    throw new RequestValidationError(`messages[${index}].content must be a string`, 'messages', 'schema');
  }

  switch (role) {
    case 'system':
      return { role: 'system', content };
    case 'user':
      return userMessage(content, readImages(raw['images'], `messages[${index}].images`));
    case 'assistant':
      return { role: 'assistant', content };
    case 'tool': {
      const toolCallId = raw['tool_call_id'] ?? raw['tool_name'];
      return { role: 'tool', content, tool_call_id: isString(toolCallId) ? toolCallId : '' };
    }
  }
}

function buildParams(
  body: UnknownRecord,
  model: string,
  messages: ChatCompletionMessageParam[],
): CompletionParams {
  const params: CompletionParams = {
    model: modelRegistry.resolveAlias(model),
    messages,
    ...mapOptions(body['options']),
  };

  if (body['format'] === 'json') {
    params.response_format = { type: 'json_object' };
  }
  return params;
}

function readStreamFlag(body: UnknownRecord): boolean {
  const stream = body['stream'];
  if (stream === undefined || stream === null) {
    return false;
  }
  if (!isBoolean(stream)) {
    throw new RequestValidationError('stream must be a boolean', 'stream', 'schema');
  }
  return stream;
}

export class OllamaRequestConverter {
  /**
   * /api/generate → optional system message, then the prompt as a user message
   */
  fromGenerate(body: unknown): ConvertedCompletionRequest {
    const request = requireBody(body);
    const model = requireModel(request);

    const prompt = request['prompt'];
    if (!isString(prompt)) {
      throw new RequestValidationError('prompt is required', 'prompt', 'schema');
    }
    if (!isNonEmptyString(prompt)) {
      throw new RequestValidationError('prompt is required', 'prompt');
    }

    const messages: ChatCompletionMessageParam[] = [];
    const system = request['system'];
    if (isNonEmptyString(system)) {
      messages.push({ role: 'system', content: system });
    }
    messages.push(userMessage(prompt, readImages(request['images'], 'images')));

    return {
      requestedModel: model,
      stream: readStreamFlag(request),
      params: buildParams(request, model, messages),
    };
  }

  /**
   * /api/chat → messages in order, roles validated
   */
  fromChat(body: unknown): ConvertedCompletionRequest {
    const request = requireBody(body);
    const model = requireModel(request);

    const rawMessages = request['messages'];
    if (!Array.isArray(rawMessages)) {
      throw new RequestValidationError('messages must be a non-empty array', 'messages', 'schema');
    }
    if (rawMessages.length === 0) {
      throw new RequestValidationError('messages must be a non-empty array', 'messages');
    }

    const messages = rawMessages.map((message: unknown, index) => convertMessage(message, index));

    return {
      requestedModel: model,
      stream: readStreamFlag(request),
      params: buildParams(request, model, messages),
    };
  }

  /**
   * /api/embeddings takes `prompt`, /api/embed takes `input` (a string or the
   * first of several). Options and keep_alive have no upstream counterpart.
   */
  fromEmbeddings(body: unknown): ConvertedEmbeddingRequest {
    const request = requireBody(body);
    const model = requireModel(request);

    const input = this.readEmbeddingInput(request);
    if (input === undefined) {
      const absent = request['prompt'] === undefined && request['input'] === undefined;
      throw new RequestValidationError('prompt is required', 'prompt', absent ? 'schema' : 'semantic');
    }

    return {
      requestedModel: model,
      params: { model: modelRegistry.resolveAlias(model), input },
    };
  }

  private readEmbeddingInput(request: UnknownRecord): string | undefined {
    const prompt = request['prompt'];
    if (isNonEmptyString(prompt)) {
      return prompt;
    }

    const input = request['input'];
    if (isNonEmptyString(input)) {
      return input;
    }
    if (isStringArray(input) && isNonEmptyString(input[0])) {
      return input[0];
    }
    return undefined;
  }
}
