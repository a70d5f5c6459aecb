import type { Writable } from "node:stream";
import type { LogTarget } from "../destination";
import { CotWireError } from "../errors";
import type { ChannelWriter } from "./channel";

export interface LogStreams {
  stdout: Writable;
  stderr: Writable;
}

/** Writes encoded events verbatim to stdout or stderr. Never closes them. */
export class LogWriter implements ChannelWriter {
  private readonly stream: Writable;
  private closed = false;

  constructor(target: LogTarget, streams: LogStreams = process) {
    this.stream = target === "stderr" ? streams.stderr : streams.stdout;
  }

  write(data: Buffer): Promise<void> {
    if (this.closed) {
      return Promise.reject(new CotWireError("E_CHANNEL_IO", "Log sink is closed"));
    }
    return new Promise<void>((resolve, reject) => {
      this.stream.write(data, err => {
        if (err) {
          reject(
            new CotWireError("E_CHANNEL_IO", `Log write failed: ${err.message}`, {
              cause: err,
            }),
          );
          return;
        }
        resolve();
      });
    });
  }

  close(): void {
    this.closed = true;
  }
}
