import type { Logger } from "pino";
import {
  decodeFrame,
  encodeOutbound,
  type CodecOptions,
  type InboundItem,
  type OutboundItem,
} from "./codecs";
import { DEFAULT_QUEUE_GET_TIMEOUT_MS } from "./constants";
import type { CotWireError } from "./errors";
import { CotFramer } from "./framing";
import type { Pacer } from "./qos";
import type { EventQueue } from "./queue";
import type { ChannelReader, ChannelWriter } from "./transport/channel";
import { TypedEventEmitter } from "./typedEmitter";

export type WorkerState = "idle" | "running" | "stopped";

interface WorkerEvents {
  state: WorkerState;
  error: Error;
}

/**
 * A loop bound to one channel direction. Runs at most once; cancellation is
 * checked between iterations.
 */
export abstract class Worker extends TypedEventEmitter<WorkerEvents> {
  readonly name: string;
  protected readonly log: Logger;
  private current: WorkerState = "idle";

  protected constructor(name: string, log: Logger) {
    super();
    this.name = name;
    this.log = log.child({ component: name });
  }

  get state(): WorkerState {
    return this.current;
  }

  async run(signal: AbortSignal): Promise<void> {
    if (this.current !== "idle") {
      throw new Error(`${this.name} has already run`);
    }
    this.setState("running");
    try {
      while (!signal.aborted) {
        if (!(await this.iterate(signal))) break;
      }
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.log.error({ err: error }, "Worker failed");
      if (this.hasListeners("error")) this.emit("error", error);
      throw error;
    } finally {
      this.setState("stopped");
    }
  }

  /** One unit of work. Resolves false when the loop should end normally. */
  protected abstract iterate(signal: AbortSignal): Promise<boolean>;

  private setState(state: WorkerState): void {
    this.current = state;
    this.log.debug({ state }, "Worker state");
    this.emit("state", state);
  }
}

export interface TxWorkerOptions {
  queue: EventQueue<OutboundItem>;
  writer: ChannelWriter;
  codec: CodecOptions;
  pacer: Pacer;
  log: Logger;
  getTimeoutMs?: number;
}

/** Drains the outbound queue: encode, write, pace. Write failures are fatal. */
export class TxWorker extends Worker {
  private readonly options: TxWorkerOptions;
  private sentCount = 0;

  constructor(options: TxWorkerOptions) {
    super("tx-worker", options.log);
    this.options = options;
  }

  get sent(): number {
    return this.sentCount;
  }

  protected async iterate(signal: AbortSignal): Promise<boolean> {
    const { queue, writer, codec, pacer } = this.options;
    const item = await queue.get(
      this.options.getTimeoutMs ?? DEFAULT_QUEUE_GET_TIMEOUT_MS,
      signal,
    );
    if (item === undefined) {
      await pacer.yield(signal);
      return true;
    }
    const data = encodeOutbound(item, codec, this.log);
    await writer.write(data);
    this.sentCount += 1;
    this.log.trace({ bytes: data.length }, "Sent");
    await pacer.pace(signal);
    return true;
  }
}

export interface RxWorkerOptions {
  queue: EventQueue<InboundItem>;
  reader: ChannelReader;
  codec: CodecOptions;
  pacer: Pacer;
  log: Logger;
  maxFrameLength?: number;
}

/**
 * Reads frames and queues them decoded. Stream reads pass through a framer;
 * each datagram is one frame. A closed peer ends the worker normally.
 */
export class RxWorker extends Worker {
  private readonly options: RxWorkerOptions;
  private readonly framer?: CotFramer;
  private readonly frames: Buffer[] = [];
  private receivedCount = 0;

  constructor(options: RxWorkerOptions) {
    super("rx-worker", options.log);
    this.options = options;
    if (options.reader.kind === "stream") {
      const framer = new CotFramer({ maxFrameLength: options.maxFrameLength });
      framer.on("message", (frame: Buffer) => this.frames.push(frame));
      framer.on("error", (err: CotWireError) => this.log.warn({ code: err.code }, err.message));
      this.framer = framer;
    }
  }

  get received(): number {
    return this.receivedCount;
  }

  protected async iterate(signal: AbortSignal): Promise<boolean> {
    const chunk = await this.options.reader.read();
    if (chunk === null) {
      this.log.info("Peer closed the channel");
      return false;
    }
    if (this.framer) {
      this.framer.push(chunk);
    } else if (chunk.length > 0) {
      this.frames.push(chunk);
    }
    for (const frame of this.frames.splice(0)) {
      await this.options.queue.put(decodeFrame(frame, this.options.codec));
      this.receivedCount += 1;
    }
    await this.options.pacer.yield(signal);
    return true;
  }
}
