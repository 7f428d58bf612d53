/**
 * Receive buffer shared by connection implementations.
 * Incoming bytes are appended by push(); pending reads are served in
 * the order they were requested.
 */

import { ReadTimeoutError } from "../errors";

type Extractor = (buffer: Buffer) => number; // bytes to take, 0 = not yet

interface PendingRead {
  extract: Extractor;
  resolve: (data: Buffer) => void;
  reject: (err: Error) => void;
  timer?: ReturnType<typeof setTimeout>;
}

export class ReadBuffer {
  private buffer: Buffer = Buffer.alloc(0);
  private pending: PendingRead[] = [];
  private failure: Error | null = null;

  constructor(private readonly path: string) {}

  get size(): number {
    return this.buffer.length;
  }

  push(data: Uint8Array): void {
    this.buffer = Buffer.concat([this.buffer, data]);
    this.flush();
  }

  read(length: number, timeout?: number): Promise<Buffer> {
    if (!Number.isInteger(length) || length < 0) {
      return Promise.reject(new RangeError(`Invalid read length ${length}`));
    }
    if (length === 0) return Promise.resolve(Buffer.alloc(0));
    return this.enqueue((buf) => (buf.length >= length ? length : 0), timeout);
  }

  readUntil(byte: number, timeout?: number): Promise<Buffer> {
    return this.enqueue((buf) => buf.indexOf(byte) + 1, timeout);
  }

  /**
   * Reject every pending and future read with `err`
   */
  fail(err: Error): void {
    this.failure = err;
    const pending = this.pending;
    this.pending = [];
    for (const read of pending) {
      if (read.timer) clearTimeout(read.timer);
      read.reject(err);
    }
  }

  private enqueue(extract: Extractor, timeout?: number): Promise<Buffer> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise<Buffer>((resolve, reject) => {
      const read: PendingRead = { extract, resolve, reject };

      if (timeout !== undefined) {
        read.timer = setTimeout(() => {
          this.pending = this.pending.filter((r) => r !== read);
          reject(new ReadTimeoutError(this.path, timeout));
        }, timeout);
      }

      this.pending.push(read);
      this.flush();
    });
  }

  private flush(): void {
    while (this.pending.length > 0) {
      const read = this.pending[0];
      const count = read.extract(this.buffer);
      if (count === 0) return;

      this.pending.shift();
      if (read.timer) clearTimeout(read.timer);
      const chunk = this.buffer.subarray(0, count);
      this.buffer = this.buffer.subarray(count);
      read.resolve(Buffer.from(chunk));
    }
  }
}
