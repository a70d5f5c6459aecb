import net from "node:net";
import type { TLSSocket } from "node:tls";
import { CotWireError, errnoCode } from "../errors";
import { PullReader, type ChannelReader, type ChannelWriter } from "./channel";

const BIND_ERRORS = new Set(["EADDRINUSE", "EADDRNOTAVAIL", "EACCES"]);

export interface TcpConnectOptions {
  host: string;
  port: number;
  localAddress?: string;
  family?: 4 | 6;
  timeoutMs?: number;
}

/**
 * Opens a TCP connection. Local bind failures map to E_BIND; refusal,
 * unreachable hosts and timeouts map to E_ADDRESS.
 */
export function connectTcp(options: TcpConnectOptions): Promise<net.Socket> {
  return new Promise<net.Socket>((resolve, reject) => {
    let settled = false;
    let connectTimer: NodeJS.Timeout | undefined;
    const target = `${options.host}:${options.port}`;

    let socket: net.Socket;
    try {
      socket = net.createConnection(
        {
          host: options.host,
          port: options.port,
          localAddress: options.localAddress,
          family: options.family,
        },
        () => {
          if (settled) return;
          settled = true;
          if (connectTimer) clearTimeout(connectTimer);
          socket.off("error", onError);
          resolve(socket);
        },
      );
    } catch (err) {
      // Malformed options are rejected synchronously, before any socket exists.
      const bind = errnoCode(err) === "ERR_INVALID_IP_ADDRESS";
      reject(
        new CotWireError(
          bind ? "E_BIND" : "E_ADDRESS",
          `Cannot open a connection to ${target}: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err },
        ),
      );
      return;
    }

    const onError = (err: Error) => {
      if (settled) return;
      settled = true;
      if (connectTimer) clearTimeout(connectTimer);
      socket.destroy();
      const code = errnoCode(err);
      if (code && BIND_ERRORS.has(code)) {
        reject(
          new CotWireError(
            "E_BIND",
            `Cannot bind local address ${options.localAddress ?? "*"} for ${target}: ${err.message}`,
            { cause: err },
          ),
        );
        return;
      }
      reject(
        new CotWireError("E_ADDRESS", `Cannot connect to ${target}: ${err.message}`, {
          cause: err,
        }),
      );
    };
    socket.on("error", onError);

    if (options.timeoutMs && options.timeoutMs > 0) {
      connectTimer = setTimeout(() => {
        if (settled) return;
        settled = true;
        socket.destroy();
        reject(
          new CotWireError(
            "E_ADDRESS",
            `Connection to ${target} timed out after ${options.timeoutMs} ms`,
          ),
        );
      }, options.timeoutMs);
    }
  });
}

export interface StreamChannelOptions {
  /** How long `close` waits for a graceful FIN before destroying the socket. */
  closeGraceMs?: number;
}

/** Reader and writer over one connected TCP or TLS socket. */
export class StreamChannel implements ChannelReader, ChannelWriter {
  readonly kind = "stream";
  private readonly socket: net.Socket | TLSSocket;
  private readonly reader: PullReader<Buffer>;
  private readonly closeGraceMs: number;
  private closing?: Promise<void>;

  constructor(socket: net.Socket | TLSSocket, options: StreamChannelOptions = {}) {
    this.socket = socket;
    this.closeGraceMs = options.closeGraceMs ?? 1000;
    this.reader = new PullReader<Buffer>({
      pause: () => socket.pause(),
      resume: () => socket.resume(),
    });
    socket.on("data", (chunk: Buffer) => this.reader.push(chunk));
    socket.on("end", () => this.reader.end());
    socket.on("close", () => this.reader.end());
    socket.on("error", err =>
      this.reader.fail(
        new CotWireError("E_CHANNEL_IO", `Stream error: ${err.message}`, { cause: err }),
      ),
    );
  }

  get remote(): string {
    return `${this.socket.remoteAddress ?? "?"}:${this.socket.remotePort ?? "?"}`;
  }

  read(): Promise<Buffer | null> {
    return this.reader.read();
  }

  write(data: Buffer): Promise<void> {
    if (this.closing || this.socket.destroyed || !this.socket.writable) {
      return Promise.reject(
        new CotWireError("E_CHANNEL_IO", `Cannot write to closed stream ${this.remote}`),
      );
    }
    return new Promise<void>((resolve, reject) => {
      this.socket.write(data, err => {
        if (err) {
          reject(
            new CotWireError("E_CHANNEL_IO", `Write failed: ${err.message}`, { cause: err }),
          );
          return;
        }
        resolve();
      });
    });
  }

  close(): Promise<void> {
    if (this.closing) return this.closing;
    this.reader.end();
    this.closing = new Promise<void>(resolve => {
      if (this.socket.destroyed) {
        resolve();
        return;
      }
      const timer = setTimeout(() => this.socket.destroy(), this.closeGraceMs);
      timer.unref();
      this.socket.once("close", () => {
        clearTimeout(timer);
        resolve();
      });
      this.socket.end();
    });
    return this.closing;
  }
}
