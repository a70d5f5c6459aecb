import type { Destination } from "../destination";

export type ChannelKind = "stream" | "datagram";

export interface ChannelReader {
  readonly kind: ChannelKind;
  /**
   * Next chunk (stream) or datagram. Resolves null once the peer has closed
   * or the channel was closed locally; rejects with E_CHANNEL_IO on I/O
   * failure.
   */
  read(): Promise<Buffer | null>;
}

export interface ChannelWriter {
  write(data: Buffer): Promise<void>;
}

/**
 * The resolved connection for one destination. Reader and writer may be the
 * same object; either may be absent (write-only UDP has no reader). Owned by
 * exactly one runtime, which closes it when it stops.
 */
export interface ChannelPair {
  readonly destination: Destination;
  readonly reader?: ChannelReader;
  readonly writer?: ChannelWriter;
  /** Idempotent. */
  close(): Promise<void>;
}

export interface PullReaderOptions {
  /** Buffered chunk count above which `pause` is called. */
  highWaterMark?: number;
  pause?: () => void;
  resume?: () => void;
}

type PendingRead<T> = {
  resolve: (value: T | null) => void;
  reject: (err: Error) => void;
};

/**
 * Turns push-style socket events into a pull-style `read()`. Chunks queue
 * until read; `end` resolves pending and future reads with null once the
 * queue is drained.
 */
export class PullReader<T> {
  private readonly chunks: T[] = [];
  private readonly pending: Array<PendingRead<T>> = [];
  private readonly highWaterMark: number;
  private readonly pause?: () => void;
  private readonly resume?: () => void;
  private ended = false;
  private failure?: Error;
  private paused = false;

  constructor(options: PullReaderOptions = {}) {
    this.highWaterMark = options.highWaterMark ?? 64;
    this.pause = options.pause;
    this.resume = options.resume;
  }

  push(chunk: T): void {
    if (this.ended) return;
    const waiting = this.pending.shift();
    if (waiting) {
      waiting.resolve(chunk);
      return;
    }
    this.chunks.push(chunk);
    if (!this.paused && this.chunks.length >= this.highWaterMark && this.pause) {
      this.paused = true;
      this.pause();
    }
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    for (const waiting of this.pending.splice(0)) waiting.resolve(null);
  }

  fail(err: Error): void {
    if (this.ended || this.failure) return;
    this.failure = err;
    for (const waiting of this.pending.splice(0)) waiting.reject(err);
  }

  read(): Promise<T | null> {
    const next = this.chunks.shift();
    if (next !== undefined) {
      if (this.paused && this.chunks.length < this.highWaterMark / 2) {
        this.paused = false;
        this.resume?.();
      }
      return Promise.resolve(next);
    }
    if (this.failure) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve(null);
    return new Promise<T | null>((resolve, reject) => {
      this.pending.push({ resolve, reject });
    });
  }
}
