import type { Logger } from "pino";
import type { CodecOptions, InboundItem, OutboundItem } from "./codecs";
import type { CotWireConfig } from "./config";
import { CotWireError } from "./errors";
import { helloEvent, type CotEvent } from "./events";
import {
  codecOptionsFromConfig,
  createChannelPair,
  createQueues,
  createRxWorker,
  createTxWorker,
  type PipelineDeps,
} from "./factory";
import type { EventQueue } from "./queue";
import type { ChannelPair } from "./transport/channel";

export const DEFAULT_DESTINATION = "default";

/** Anything the runtime runs alongside its workers. Must honor `signal`. */
export interface RuntimeTask {
  readonly name: string;
  run(signal: AbortSignal): Promise<void>;
}

/** A named destination with its own configuration, queues and channel. */
export interface DestinationPipeline {
  readonly name: string;
  readonly config: CotWireConfig;
  readonly txQueue: EventQueue<OutboundItem>;
  readonly rxQueue: EventQueue<InboundItem>;
  readonly channel?: ChannelPair;
  readonly codec?: CodecOptions;
}

export interface DestinationConfig {
  name: string;
  config: CotWireConfig;
}

export interface CotRuntimeOptions extends PipelineDeps {
  config: CotWireConfig;
  /** Name of the default destination. */
  name?: string;
  txQueue?: EventQueue<OutboundItem>;
  rxQueue?: EventQueue<InboundItem>;
  /** Use an already resolved channel instead of connecting `COT_URL`. */
  channel?: ChannelPair;
  /** Further destinations, each with its own queues and worker pair. */
  destinations?: DestinationConfig[];
}

interface Pipeline {
  name: string;
  config: CotWireConfig;
  txQueue: EventQueue<OutboundItem>;
  rxQueue: EventQueue<InboundItem>;
  injected?: ChannelPair;
  channel?: ChannelPair;
  codec?: CodecOptions;
}

/**
 * Owns one channel per destination and the workers bound to them. The first
 * destination is the default one that `txQueue` and `rxQueue` belong to.
 * `run` starts every task and ends when the first one finishes or fails; the
 * others are cancelled and every channel is closed. There is no reconnect: a
 * new runtime is needed.
 */
export class CotRuntime {
  readonly txQueue: EventQueue<OutboundItem>;
  readonly rxQueue: EventQueue<InboundItem>;
  private readonly options: CotRuntimeOptions;
  private readonly log: Logger;
  private readonly tasks: RuntimeTask[] = [];
  private readonly pipelines = new Map<string, Pipeline>();
  private readonly primary: Pipeline;
  private ready = false;
  private controller?: AbortController;

  constructor(options: CotRuntimeOptions) {
    this.options = options;
    this.log = options.log.child({ component: "runtime" });
    const queues = createQueues(options.config, this.log);
    this.txQueue = options.txQueue ?? queues.txQueue;
    this.rxQueue = options.rxQueue ?? queues.rxQueue;
    this.primary = {
      name: options.name ?? DEFAULT_DESTINATION,
      config: options.config,
      txQueue: this.txQueue,
      rxQueue: this.rxQueue,
      injected: options.channel,
    };
    this.pipelines.set(this.primary.name, this.primary);
    for (const destination of options.destinations ?? []) {
      this.addDestination(destination.name, destination.config);
    }
  }

  get channel(): ChannelPair | undefined {
    return this.primary.channel;
  }

  get codec(): CodecOptions | undefined {
    return this.primary.codec;
  }

  get isRunning(): boolean {
    return this.controller !== undefined;
  }

  get destinations(): string[] {
    return [...this.pipelines.keys()];
  }

  destination(name: string): DestinationPipeline | undefined {
    return this.pipelines.get(name);
  }

  /**
   * Registers another destination with queues of its own. Must happen before
   * `setup`.
   */
  addDestination(name: string, config: CotWireConfig): DestinationPipeline {
    if (this.ready) {
      throw new Error(`Cannot add destination ${name} after setup`);
    }
    if (this.pipelines.has(name)) {
      throw new CotWireError("E_CONFIG", `Destination ${name} is already registered`);
    }
    const pipeline: Pipeline = { name, config, ...createQueues(config, this.log) };
    this.pipelines.set(name, pipeline);
    return pipeline;
  }

  /**
   * Resolves every destination's channel and registers its transmit and
   * receive workers. Channels opened before a failure are closed again.
   */
  async setup(): Promise<void> {
    if (this.ready) return;
    const opened: ChannelPair[] = [];
    const tasks: RuntimeTask[] = [];
    try {
      for (const pipeline of this.pipelines.values()) {
        const { config } = pipeline;
        const deps: PipelineDeps = {
          ...this.options,
          log: this.options.log.child({ destination: pipeline.name }),
        };
        const channel = pipeline.injected ?? (await createChannelPair(config, deps));
        opened.push(channel);
        const codec = codecOptionsFromConfig(config, channel.destination, deps);

        tasks.push(createTxWorker(config, channel, pipeline.txQueue, codec, deps));
        const rx = createRxWorker(config, channel, pipeline.rxQueue, codec, deps);
        if (rx) tasks.push(rx);

        pipeline.channel = channel;
        pipeline.codec = codec;
        this.log.info(
          {
            name: pipeline.name,
            destination: channel.destination.raw,
            protocolVersion: codec.protocolVersion,
            receive: Boolean(rx),
          },
          "Pipeline ready",
        );
      }
    } catch (err) {
      for (const pipeline of this.pipelines.values()) {
        pipeline.channel = undefined;
        pipeline.codec = undefined;
      }
      await Promise.all(opened.map(channel => channel.close()));
      throw err;
    }
    this.tasks.unshift(...tasks);
    this.ready = true;
  }

  addTask(task: RuntimeTask): void {
    this.tasks.push(task);
  }

  addTasks(tasks: Iterable<RuntimeTask>): void {
    for (const task of tasks) this.addTask(task);
  }

  helloEvent(): CotEvent {
    return helloEvent(this.options.config.COT_HOST_ID);
  }

  /**
   * Runs until the first task settles or `signal` aborts. Rejects with the
   * error of the first task to fail.
   */
  async run(signal?: AbortSignal): Promise<void> {
    if (this.controller) throw new Error("CotRuntime is already running");
    await this.setup();
    const channels: ChannelPair[] = [];
    for (const pipeline of this.pipelines.values()) {
      if (pipeline.channel) channels.push(pipeline.channel);
    }

    const controller = new AbortController();
    this.controller = controller;
    const onAbort = () => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    for (const pipeline of this.pipelines.values()) {
      if (!pipeline.config.PYTAK_NO_HELLO) {
        await pipeline.txQueue.put(helloEvent(pipeline.config.COT_HOST_ID));
      }
    }

    const running = this.tasks.map(task =>
      task.run(controller.signal).then(
        () => ({ task, error: undefined }),
        (error: unknown) => ({ task, error }),
      ),
    );
    const aborted = new Promise<{ task?: RuntimeTask; error?: unknown }>(resolve => {
      if (controller.signal.aborted) resolve({});
      controller.signal.addEventListener("abort", () => resolve({}), { once: true });
    });

    try {
      const first = await Promise.race([...running, aborted]);
      if (first.task) {
        this.log.info(
          { task: first.task.name, failed: first.error !== undefined },
          "Task finished; stopping pipeline",
        );
      }
      controller.abort();
      await Promise.all(channels.map(channel => channel.close()));
      await Promise.all(running);
      if (first.error !== undefined) throw first.error;
    } finally {
      signal?.removeEventListener("abort", onAbort);
      this.controller = undefined;
    }
  }

  stop(): void {
    this.controller?.abort();
  }
}
