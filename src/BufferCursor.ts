import { QOIError } from './errors';
import { ByteSink, ByteSource } from './types';

export default class BufferCursor implements ByteSink, ByteSource {
  private p = 0;
  array: Uint8Array;

  constructor(source: number | Uint8Array) {
    this.array = typeof source === 'number' ? new Uint8Array(source) : source;
  }

  public get length() {
    return this.array.length;
  }

  public get remaining() {
    return this.array.length - this.p;
  }

  public seek(offset: number) {
    this.p = offset;
  }

  public tell() {
    return this.p;
  }

  public slice(from = 0, to = this.tell()) {
    return this.array.slice(from, to);
  }

  private reserve(count: number) {
    if (this.p + count > this.array.length) {
      throw new QOIError(
        'OutOfMemory',
        `Cannot write ${count} bytes at offset ${this.p} of a ${this.array.length} byte buffer`,
      );
    }
  }

  public write(bytes: Uint8Array) {
    this.writeArray(bytes);
  }

  public writeArray(arr: Uint8Array) {
    this.reserve(arr.length);
    this.array.set(arr, this.p);
    this.p += arr.length;
  }

  public writeByte(value: number) {
    this.reserve(1);
    this.array[this.p] = value;
    this.p += 1;
  }

  public readByte() {
    if (this.p >= this.array.length) {
      throw new QOIError('EndOfStream', `Unexpected end of data at offset ${this.p}`);
    }
    const value = this.array[this.p];
    this.p += 1;
    return value;
  }

  public read(length: number) {
    if (this.remaining < length) {
      throw new QOIError(
        'EndOfStream',
        `Needed ${length} bytes at offset ${this.p}, only ${this.remaining} left`,
      );
    }
    const bytes = this.array.subarray(this.p, this.p + length);
    this.p += length;
    return bytes;
  }
}
