import ColorCache, { colorsEqual } from './ColorCache';
import { QOI_END_MARKER } from './header';
import {
  DIFF_BIAS,
  inDiffRange,
  inLumaGreenRange,
  inLumaRBRange,
  LUMA_GREEN_BIAS,
  LUMA_RB_BIAS,
  MAX_OPCODE_LENGTH,
  packBiased,
  QOI_OP_DIFF,
  QOI_OP_INDEX,
  QOI_OP_LUMA,
  QOI_OP_RGB,
  QOI_OP_RGBA,
  wrappingDelta,
} from './opcodes';
import RunLengthEncoder from './RunLengthEncoder';
import { ByteSink, Color } from './types';

export const INITIAL_PIXEL: Color = Object.freeze({ r: 0, g: 0, b: 0, a: 255 });

/**
 * Turns a sequence of pixels into opcodes, one pixel at a time. Output goes to
 * the sink as soon as it is known; a run stays open until a different pixel
 * arrives, it reaches the maximum length, or `finish()` is called.
 */
export default class PixelEncoder {
  private readonly cache = new ColorCache();
  private readonly rle: RunLengthEncoder;
  private previous = INITIAL_PIXEL;
  private finished = false;

  private readonly op = new Uint8Array(MAX_OPCODE_LENGTH);

  constructor(private destination: ByteSink) {
    this.rle = new RunLengthEncoder(destination);
  }

  private emit(length: number) {
    this.destination.write(this.op.subarray(0, length));
  }

  push(pixel: Color) {
    if (this.finished) {
      throw new Error('Cannot push pixels after the encoder has finished');
    }

    if (colorsEqual(pixel, this.previous)) {
      this.rle.extend();
      return;
    }
    this.rle.flush();

    const px: Color = { r: pixel.r, g: pixel.g, b: pixel.b, a: pixel.a };
    const prev = this.previous;
    this.previous = px;

    const hash = ColorCache.hash(px);
    if (colorsEqual(this.cache.lookup(hash), px)) {
      this.op[0] = QOI_OP_INDEX | hash;
      this.emit(1);
      return;
    }
    this.cache.store(hash, px);

    if (px.a !== prev.a) {
      this.op[0] = QOI_OP_RGBA;
      this.op[1] = px.r;
      this.op[2] = px.g;
      this.op[3] = px.b;
      this.op[4] = px.a;
      this.emit(5);
      return;
    }

    const dr = wrappingDelta(prev.r, px.r);
    const dg = wrappingDelta(prev.g, px.g);
    const db = wrappingDelta(prev.b, px.b);

    if (inDiffRange(dr) && inDiffRange(dg) && inDiffRange(db)) {
      this.op[0] =
        QOI_OP_DIFF |
        (packBiased(dr, DIFF_BIAS) << 4) |
        (packBiased(dg, DIFF_BIAS) << 2) |
        packBiased(db, DIFF_BIAS);
      this.emit(1);
      return;
    }

    const drg = dr - dg;
    const dbg = db - dg;
    if (inLumaGreenRange(dg) && inLumaRBRange(drg) && inLumaRBRange(dbg)) {
      this.op[0] = QOI_OP_LUMA | packBiased(dg, LUMA_GREEN_BIAS);
      this.op[1] =
        (packBiased(drg, LUMA_RB_BIAS) << 4) | packBiased(dbg, LUMA_RB_BIAS);
      this.emit(2);
      return;
    }

    this.op[0] = QOI_OP_RGB;
    this.op[1] = px.r;
    this.op[2] = px.g;
    this.op[3] = px.b;
    this.emit(4);
  }

  /** Closes any open run and writes the end marker. */
  finish() {
    if (this.finished) return;
    this.rle.flush();
    this.destination.write(QOI_END_MARKER);
    this.finished = true;
  }

  snapshotCache() {
    return this.cache.snapshot();
  }
}
