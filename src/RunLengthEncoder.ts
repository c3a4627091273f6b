import { MAX_RUN_LENGTH, QOI_OP_RUN } from './opcodes';
import { ByteSink } from './types';

export default class RunLengthEncoder {
  private runLength = 0;
  private readonly op = new Uint8Array(1);

  constructor(private destination: ByteSink) {}

  get length() {
    return this.runLength;
  }

  /** Counts one more repeat of the previous pixel. */
  extend() {
    this.runLength += 1;
    if (this.runLength === MAX_RUN_LENGTH) this.flush();
  }

  flush() {
    if (this.runLength === 0) return;

    this.op[0] = QOI_OP_RUN | (this.runLength - 1);
    this.destination.write(this.op);
    this.runLength = 0;
  }
}
