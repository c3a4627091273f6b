import { once } from 'events';
import { Writable } from 'stream';

import BufferCursor from './BufferCursor';
import { QOIError } from './errors';
import { ByteSink, ByteSource } from './types';

/**
 * Collects encoder output in fixed-size chunks so the synchronous encoder can
 * run between asynchronous writes to a stream.
 */
export class StreamByteSink implements ByteSink {
  private ready: Uint8Array[] = [];
  private cursor: BufferCursor;

  constructor(private destination: Writable, private chunkSize: number) {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new RangeError(`Chunk size must be a positive integer, got ${chunkSize}`);
    }
    this.cursor = new BufferCursor(chunkSize);
  }

  /** Bytes written but not yet handed to the stream. */
  get pending() {
    return this.ready.length * this.chunkSize + this.cursor.tell();
  }

  write(bytes: Uint8Array) {
    let offset = 0;
    while (offset < bytes.length) {
      const count = Math.min(this.cursor.remaining, bytes.length - offset);
      this.cursor.writeArray(bytes.subarray(offset, offset + count));
      offset += count;

      if (this.cursor.remaining === 0) {
        this.ready.push(this.cursor.array);
        this.cursor = new BufferCursor(this.chunkSize);
      }
    }
  }

  async flush() {
    if (this.cursor.tell() > 0) {
      this.ready.push(this.cursor.slice());
      this.cursor.seek(0);
    }

    const chunks = this.ready;
    this.ready = [];
    for (const chunk of chunks) {
      if (!this.destination.write(chunk)) {
        await once(this.destination, 'drain');
      }
    }
  }
}

/**
 * Buffers chunks pulled from an async source. Call `ensure()` before a batch
 * of synchronous reads; reads beyond what has been buffered raise
 * `EndOfStream`.
 */
export class StreamByteSource implements ByteSource {
  private iterator: AsyncIterator<Uint8Array>;
  private buffer: Uint8Array = new Uint8Array(0);
  private offset = 0;
  private done = false;

  constructor(source: AsyncIterable<Uint8Array>) {
    this.iterator = source[Symbol.asyncIterator]();
  }

  get available() {
    return this.buffer.length - this.offset;
  }

  /**
   * Pulls chunks until at least `count` bytes are buffered or the source is
   * exhausted. Returns the number of buffered bytes.
   */
  async ensure(count: number) {
    while (this.available < count && !this.done) {
      const next = await this.iterator.next();
      if (next.done) {
        this.done = true;
        break;
      }
      this.append(next.value);
    }
    return this.available;
  }

  private append(chunk: Uint8Array) {
    if (this.available === 0) {
      this.buffer = chunk;
      this.offset = 0;
      return;
    }

    const merged = new Uint8Array(this.available + chunk.length);
    merged.set(this.buffer.subarray(this.offset));
    merged.set(chunk, this.available);
    this.buffer = merged;
    this.offset = 0;
  }

  readByte() {
    if (this.available < 1) {
      throw new QOIError('EndOfStream', 'Stream ended in the middle of an opcode');
    }
    const value = this.buffer[this.offset];
    this.offset += 1;
    return value;
  }

  read(length: number) {
    if (this.available < length) {
      throw new QOIError(
        'EndOfStream',
        `Needed ${length} bytes, stream has only ${this.available} left`,
      );
    }
    const bytes = this.buffer.subarray(this.offset, this.offset + length);
    this.offset += length;
    return bytes;
  }
}
