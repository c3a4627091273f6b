import ColorCache from './ColorCache';
import {
  classifyOpcode,
  DIFF_BIAS,
  LUMA_GREEN_BIAS,
  LUMA_RB_BIAS,
  Opcode,
  opcodeLength,
  QOI_MASK_2,
  unpackBiased,
  wrappingAdd,
} from './opcodes';
import { INITIAL_PIXEL } from './PixelEncoder';
import { ByteSource, Color, PixelRun } from './types';

/**
 * Reads one opcode at a time from a byte source. Each call to `fetch()`
 * consumes exactly the bytes of one opcode and reports the color it produces
 * and how many pixels it covers.
 */
export default class PixelDecoder {
  private readonly cache = new ColorCache();
  private current = INITIAL_PIXEL;

  constructor(private source: ByteSource) {}

  private readColor(b1: number, opcode: Opcode): Color {
    const prev = this.current;

    switch (opcode) {
      case 'rgb': {
        const [r, g, b] = this.source.read(opcodeLength(opcode));
        return { r, g, b, a: prev.a };
      }
      case 'rgba': {
        const [r, g, b, a] = this.source.read(opcodeLength(opcode));
        return { r, g, b, a };
      }
      case 'index':
        return this.cache.lookup(b1);
      case 'diff':
        return {
          r: wrappingAdd(prev.r, unpackBiased(b1 >> 4, DIFF_BIAS)),
          g: wrappingAdd(prev.g, unpackBiased(b1 >> 2, DIFF_BIAS)),
          b: wrappingAdd(prev.b, unpackBiased(b1, DIFF_BIAS)),
          a: prev.a,
        };
      case 'luma': {
        const b2 = this.source.readByte();
        const dg = unpackBiased(b1, LUMA_GREEN_BIAS);
        return {
          r: wrappingAdd(prev.r, dg + unpackBiased(b2 >> 4, LUMA_RB_BIAS)),
          g: wrappingAdd(prev.g, dg),
          b: wrappingAdd(prev.b, dg + unpackBiased(b2, LUMA_RB_BIAS)),
          a: prev.a,
        };
      }
      case 'run':
        return prev;
    }
  }

  fetch(): PixelRun {
    const b1 = this.source.readByte();
    const opcode = classifyOpcode(b1);
    const color = this.readColor(b1, opcode);

    // A run stores too; this only matters for a leading run of opaque black.
    this.cache.store(ColorCache.hash(color), color);
    this.current = color;
    return { color, count: opcode === 'run' ? (b1 & ~QOI_MASK_2) + 1 : 1 };
  }

  snapshotCache() {
    return this.cache.snapshot();
  }
}
