import { once } from "node:events";
import {
  type Options,
  type RotatingFileStream,
  createStream,
} from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./Logger";

export type RfsTransportOptions = {
  filename: string;
  rfs?: Options;
};

/**
 * 以 rotating-file-stream 寫出 JSON Lines 格式的 log 檔。
 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;
  private closed = false;

  constructor(options: RfsTransportOptions) {
    this.stream = createStream(options.filename, options.rfs ?? {});
  }

  write(record: LogRecord): void {
    if (this.closed) return;
    this.stream.write(`${JSON.stringify(record)}\n`);
  }

  async [Symbol.asyncDispose]() {
    if (this.closed) return;
    this.closed = true;
    const finished = once(this.stream, "finish");
    this.stream.end();
    await finished;
  }
}
