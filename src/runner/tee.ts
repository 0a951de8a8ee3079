import type { Readable } from 'node:stream';

/** Bytes of a child's stderr kept for the details replay */
export const MAX_CAPTURE_BYTES = 1024 * 1024;

export type ChunkSink = (chunk: Buffer) => void;

/**
 * Keeps the last `limit` bytes written to it
 */
export class TailBuffer {
  private chunks: Buffer[] = [];
  private size = 0;
  private dropped = false;

  constructor(readonly limit: number = MAX_CAPTURE_BYTES) {}

  /** Whether older output was discarded */
  get truncated(): boolean {
    return this.dropped;
  }

  readonly push: ChunkSink = (chunk) => {
    this.chunks.push(chunk);
    this.size += chunk.length;
    while (this.chunks.length > 1 && this.size - this.chunks[0].length >= this.limit) {
      this.size -= this.chunks[0].length;
      this.chunks.shift();
      this.dropped = true;
    }
  };

  toBuffer(): Buffer {
    const all = Buffer.concat(this.chunks);
    if (all.length <= this.limit) {
      return all;
    }
    this.dropped = true;
    return all.subarray(all.length - this.limit);
  }

  toString(): string {
    return this.toBuffer().toString('utf-8');
  }
}

/**
 * Copy every chunk of `source` to each sink, in order. Resolves when the
 * source ends.
 */
export function tee(source: Readable, sinks: ChunkSink[]): Promise<void> {
  return new Promise((resolve, reject) => {
    source.on('data', (chunk: Buffer | string) => {
      const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      for (const sink of sinks) {
        sink(bytes);
      }
    });
    source.once('end', () => resolve());
    source.once('error', reject);
  });
}
