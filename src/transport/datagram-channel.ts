import dgram from "node:dgram";
import { CotWireError, errnoCode } from "../errors";
import { PullReader, type ChannelReader, type ChannelWriter } from "./channel";

export interface DatagramTarget {
  address: string;
  port: number;
}

export interface DatagramChannelOptions {
  /** Set for sockets that were not `connect`ed; every send goes here. */
  target?: DatagramTarget;
  /** Whether incoming datagrams are surfaced through `read`. */
  readable: boolean;
}

/** Binds a UDP socket; any failure is reported as E_BIND. */
export function bindDatagram(
  socket: dgram.Socket,
  options: { address?: string; port?: number },
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => {
      reject(
        new CotWireError(
          "E_BIND",
          `Cannot bind UDP ${options.address ?? "*"}:${options.port ?? 0}: ${err.message}`,
          { cause: err },
        ),
      );
    };
    socket.once("error", onError);
    socket.bind({ address: options.address, port: options.port ?? 0 }, () => {
      socket.off("error", onError);
      resolve();
    });
  });
}

/** Fixes the peer of a UDP socket; failures are reported as E_ADDRESS. */
export function connectDatagram(
  socket: dgram.Socket,
  target: DatagramTarget,
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => {
      const code = errnoCode(err);
      reject(
        new CotWireError(
          code === "EADDRINUSE" || code === "EACCES" ? "E_BIND" : "E_ADDRESS",
          `Cannot connect UDP socket to ${target.address}:${target.port}: ${err.message}`,
          { cause: err },
        ),
      );
    };
    socket.once("error", onError);
    socket.connect(target.port, target.address, () => {
      socket.off("error", onError);
      resolve();
    });
  });
}

/**
 * Reader and writer over one UDP socket. Each `read` yields exactly one
 * datagram. Connected sockets send to their peer; others to `target`.
 */
export class DatagramChannel implements ChannelReader, ChannelWriter {
  readonly kind = "datagram";
  private readonly socket: dgram.Socket;
  private readonly target?: DatagramTarget;
  private readonly reader = new PullReader<Buffer>({ highWaterMark: 1024 });
  private closing?: Promise<void>;
  private socketClosed = false;

  constructor(socket: dgram.Socket, options: DatagramChannelOptions) {
    this.socket = socket;
    this.target = options.target;
    if (options.readable) {
      socket.on("message", (message: Buffer) => this.reader.push(message));
    }
    socket.on("close", () => {
      this.socketClosed = true;
      this.reader.end();
    });
    socket.on("error", err =>
      this.reader.fail(
        new CotWireError("E_CHANNEL_IO", `Datagram error: ${err.message}`, { cause: err }),
      ),
    );
  }

  read(): Promise<Buffer | null> {
    return this.reader.read();
  }

  write(data: Buffer): Promise<void> {
    if (this.closing) {
      return Promise.reject(
        new CotWireError("E_CHANNEL_IO", "Cannot write to closed datagram socket"),
      );
    }
    return new Promise<void>((resolve, reject) => {
      const done = (err: Error | null) => {
        if (err) {
          reject(
            new CotWireError("E_CHANNEL_IO", `Send failed: ${err.message}`, { cause: err }),
          );
          return;
        }
        resolve();
      };
      if (this.target) {
        this.socket.send(data, this.target.port, this.target.address, done);
      } else {
        this.socket.send(data, done);
      }
    });
  }

  close(): Promise<void> {
    if (this.closing) return this.closing;
    this.reader.end();
    this.closing = new Promise<void>(resolve => {
      if (this.socketClosed) {
        resolve();
        return;
      }
      this.socket.close(() => resolve());
    });
    return this.closing;
  }
}
