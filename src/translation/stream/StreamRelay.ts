/**
 * Stream Relay
 *
 * Pulls upstream chunks, converts each through a ChunkBuilder and hands them
 * to the HTTP layer in order. Exactly one record with `done: true` ends every
 * relay that is not cancelled:
 *
 *   started -> emitting* -> finalized
 *
 * - upstream finish reason: that chunk is the final record, upstream is closed
 * - upstream ends without one: a `done_reason: "stop"` record is synthesized
 * - upstream throws (including while opening): an error record is synthesized
 * - close(): the upstream is aborted (or, while opening, its retries stop)
 *   and nothing more is emitted
 */

import { logger } from '../../logging/index.js';
import { translateError } from '../errors/errorTranslator.js';

import type { ChunkStream } from '../../services/upstream/chunkStream.js';
import type { ChatCompletionChunk, OllamaStreamChunk } from '../../types/index.js';
import type { ChunkBuilder } from '../converters/ollama/OllamaStreamConverter.js';

export type RelayState = 'started' | 'emitting' | 'finalized';

export type OpenUpstream = (signal: AbortSignal) => Promise<ChunkStream<ChatCompletionChunk>>;

export class StreamRelay<TChunk extends OllamaStreamChunk> implements AsyncIterable<TChunk> {
  private relayState: RelayState = 'started';
  private upstream: ChunkStream<ChatCompletionChunk> | undefined;
  private readonly abortController = new AbortController();
  private cancelled = false;
  private iterated = false;
  private emitted = 0;

  constructor(
    private readonly open: OpenUpstream,
    private readonly builder: ChunkBuilder<TChunk>,
    private readonly model: string,
    private readonly correlationId: string,
  ) {}

  get state(): RelayState {
    return this.relayState;
  }

  get chunksEmitted(): number {
    return this.emitted;
  }

  /**
   * Cancel the relay, e.g. on client disconnect. Idempotent.
   */
  async close(): Promise<void> {
    if (this.cancelled) {
      return;
    }
    this.cancelled = true;
    this.relayState = 'finalized';
    this.abortController.abort();
    await this.closeUpstream();
  }

  [Symbol.asyncIterator](): AsyncIterator<TChunk> {
    if (this.iterated) {
      throw new Error('StreamRelay can only be consumed once');
    }
    this.iterated = true;
    return this.relay();
  }

  private async closeUpstream(): Promise<void> {
    const upstream = this.upstream;
    this.upstream = undefined;
    await upstream?.close();
  }

  private finalize(chunk: TChunk): TChunk {
    this.relayState = 'finalized';
    this.emitted += 1;
    logger.debug(
      `[STREAM] ${this.correlationId} finalized after ${this.emitted} chunks (done_reason=${chunk.done_reason ?? '-'}${chunk.error === undefined ? '' : ', error'})`,
    );
    return chunk;
  }

  private async *relay(): AsyncGenerator<TChunk, void, undefined> {
    try {
      const upstream = await this.open(this.abortController.signal);
      this.upstream = upstream;
      if (this.cancelled) {
        await this.closeUpstream();
        return;
      }

      for (;;) {
        const result = await upstream.next();
        if (this.cancelled) {
          return;
        }
        if (result.done === true) {
          break;
        }

        const chunk = this.builder.fromUpstream(result.value, this.model);
        if (chunk.done) {
          await this.closeUpstream();
          yield this.finalize(chunk);
          return;
        }

        this.relayState = 'emitting';
        this.emitted += 1;
        yield chunk;
        if (this.cancelled) {
          return;
        }
      }

      await this.closeUpstream();
      yield this.finalize(this.builder.finalChunk(this.model));
    } catch (error: unknown) {
      if (this.cancelled) {
        logger.debug(`[STREAM] ${this.correlationId} upstream aborted after cancel`);
        return;
      }
      await this.closeUpstream();
      const envelope = translateError(error, this.model, this.correlationId);
      yield this.finalize(this.builder.errorChunk(this.model, envelope.message, envelope.correlationId));
    } finally {
      await this.closeUpstream();
    }
  }
}
