/**
 * Pull-based, single-pass view over an upstream chunk sequence.
 *
 * `close()` aborts the underlying request; after it, `next()` reports done.
 */
export interface ChunkStream<T> extends AsyncIterable<T> {
  next(): Promise<IteratorResult<T, undefined>>;
  close(): Promise<void>;
  readonly closed: boolean;
}

export class IteratorChunkStream<T> implements ChunkStream<T> {
  private iterator: AsyncIterator<T> | undefined;
  private iterated = false;
  private isClosed = false;

  constructor(
    private readonly source: AsyncIterable<T>,
    private readonly abort?: () => void,
  ) {}

  get closed(): boolean {
    return this.isClosed;
  }

  async next(): Promise<IteratorResult<T, undefined>> {
    if (this.isClosed) {
      return { done: true, value: undefined };
    }
    this.iterator ??= this.source[Symbol.asyncIterator]();

    const result = await this.iterator.next();
    if (result.done === true) {
      this.isClosed = true;
      return { done: true, value: undefined };
    }
    return result;
  }

  async close(): Promise<void> {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    this.abort?.();
    await this.iterator?.return?.();
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    if (this.iterated) {
      throw new Error('ChunkStream can only be iterated once');
    }
    this.iterated = true;

    return {
      next: () => this.next(),
      return: async () => {
        await this.close();
        return { done: true, value: undefined };
      },
    };
  }
}
