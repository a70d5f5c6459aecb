import { MessageChannel, receiveMessageOnPort, type MessagePort } from "node:worker_threads";
import type { Logger } from "pino";
import { delay } from "./qos";

/**
 * FIFO hand-off between a producer and a consumer. `get` resolves undefined
 * when nothing arrives within `timeoutMs` or the signal aborts.
 */
export interface EventQueue<T> {
  put(item: T): Promise<void>;
  get(timeoutMs?: number, signal?: AbortSignal): Promise<T | undefined>;
  readonly size: number;
}

export interface BoundedQueueOptions<T> {
  /** 0 means unbounded. */
  capacity?: number;
  onOverflow?: (dropped: T) => void;
  log?: Logger;
  name?: string;
}

type Waiter<T> = (item: T | undefined) => void;

/**
 * In-process queue. When full, `put` drops the oldest item so the newest
 * position reports always get through.
 */
export class BoundedQueue<T> implements EventQueue<T> {
  private items: T[] = [];
  private readonly waiters: Array<Waiter<T>> = [];
  private readonly capacity: number;
  private readonly onOverflow?: (dropped: T) => void;
  private readonly log?: Logger;
  private readonly name: string;
  private droppedCount = 0;

  constructor(options: BoundedQueueOptions<T> = {}) {
    this.capacity = Math.max(0, options.capacity ?? 0);
    this.onOverflow = options.onOverflow;
    this.log = options.log;
    this.name = options.name ?? "queue";
  }

  get size(): number {
    return this.items.length;
  }

  /** Items discarded by overflow since construction. */
  get dropped(): number {
    return this.droppedCount;
  }

  async put(item: T): Promise<void> {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return;
    }
    if (this.capacity > 0 && this.items.length >= this.capacity) {
      const dropped = this.items.shift();
      this.droppedCount += 1;
      this.log?.warn(
        { queue: this.name, capacity: this.capacity, dropped: this.droppedCount },
        "Queue full; dropped oldest item",
      );
      if (dropped !== undefined) this.onOverflow?.(dropped);
    }
    this.items.push(item);
  }

  get(timeoutMs?: number, signal?: AbortSignal): Promise<T | undefined> {
    if (this.items.length > 0) return Promise.resolve(this.items.shift());
    if (timeoutMs === 0 || signal?.aborted) return Promise.resolve(undefined);

    return new Promise<T | undefined>(resolve => {
      let timer: NodeJS.Timeout | undefined;
      const settle: Waiter<T> = item => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        resolve(item);
      };
      const onAbort = () => {
        this.removeWaiter(settle);
        settle(undefined);
      };
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.removeWaiter(settle);
          settle(undefined);
        }, timeoutMs);
      }
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(settle);
    });
  }

  private removeWaiter(waiter: Waiter<T>): void {
    const index = this.waiters.indexOf(waiter);
    if (index >= 0) this.waiters.splice(index, 1);
  }
}

export interface MessagePortQueueOptions<T> {
  /** Rebuilds an item from its structured clone; undefined drops it. */
  revive: (message: unknown) => T | undefined;
  pollIntervalMs?: number;
  log?: Logger;
}

/**
 * Queue spanning two threads over a `MessageChannel`. Each side wraps its own
 * port: `put` posts to the partner port and `get` polls this one with
 * `receiveMessageOnPort`, so it never needs the port's event listener.
 * There is no bound; the receiving side drains at its own pace.
 */
export class MessagePortQueue<T> implements EventQueue<T> {
  private readonly port: MessagePort;
  private readonly revive: (message: unknown) => T | undefined;
  private readonly pollIntervalMs: number;
  private readonly log?: Logger;
  private closed = false;

  constructor(port: MessagePort, options: MessagePortQueueOptions<T>) {
    this.port = port;
    this.revive = options.revive;
    this.pollIntervalMs = options.pollIntervalMs ?? 5;
    this.log = options.log;
    this.port.unref();
  }

  /** Not observable across threads; always 0. */
  get size(): number {
    return 0;
  }

  async put(item: T): Promise<void> {
    if (this.closed) return;
    this.port.postMessage(item);
  }

  async get(timeoutMs?: number, signal?: AbortSignal): Promise<T | undefined> {
    const deadline = timeoutMs === undefined ? undefined : Date.now() + timeoutMs;
    while (!this.closed && !signal?.aborted) {
      const received = receiveMessageOnPort(this.port);
      if (received) {
        const item = this.revive(received.message);
        if (item !== undefined) return item;
        this.log?.warn("Discarded cross-thread queue message of unknown shape");
        continue;
      }
      if (deadline !== undefined && Date.now() >= deadline) return undefined;
      const wait =
        deadline === undefined
          ? this.pollIntervalMs
          : Math.min(this.pollIntervalMs, deadline - Date.now());
      await delay(wait, signal);
    }
    return undefined;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.port.close();
  }
}

/** Local end of a cross-thread queue; hand `remotePort` to the other thread. */
export function createMessagePortQueue<T>(
  options: MessagePortQueueOptions<T>,
): { queue: MessagePortQueue<T>; remotePort: MessagePort } {
  const { port1, port2 } = new MessageChannel();
  return { queue: new MessagePortQueue(port1, options), remotePort: port2 };
}
