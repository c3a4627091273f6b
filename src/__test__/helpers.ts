import fs from 'fs';
import path from 'path';

import { ByteSink, Color } from '../types';

export function testResourcePath(...paths: string[]) {
  return path.resolve(__dirname, ...paths);
}

export function loadTestResource(...paths: string[]) {
  return fs.readFileSync(testResourcePath(...paths));
}

/** Runs `fn` and returns what it threw. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected the function to throw');
}

export class CollectingSink implements ByteSink {
  bytes: number[] = [];

  write(bytes: Uint8Array) {
    this.bytes.push(...bytes);
  }
}

/** Small seeded generator (mulberry32) so failures reproduce. */
export function createRandom(seed: number) {
  let state = seed >>> 0;
  const next = () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  return {
    next,
    int(max: number) {
      return Math.floor(next() * max);
    },
    byte() {
      return Math.floor(next() * 256);
    },
    bytes(length: number) {
      const out = new Uint8Array(length);
      for (let i = 0; i < length; i += 1) out[i] = Math.floor(next() * 256);
      return out;
    },
  };
}

export type Random = ReturnType<typeof createRandom>;

export function rgba(r: number, g: number, b: number, a = 255): Color {
  return { r, g, b, a };
}

export function pixelsToData(pixels: Color[]) {
  const data = new Uint8Array(pixels.length * 4);
  pixels.forEach((px, i) => data.set([px.r, px.g, px.b, px.a], i * 4));
  return data;
}
