import { Color } from './types';

export const CACHE_SIZE = 64;

const ZERO: Color = Object.freeze({ r: 0, g: 0, b: 0, a: 0 });

export function colorsEqual(a: Color, b: Color) {
  return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;
}

/**
 * Table of recently seen colors, one slot per hash value. The encoder and
 * decoder of a stream each own one and must update it identically.
 */
export default class ColorCache {
  private slots: Color[] = new Array<Color>(CACHE_SIZE).fill(ZERO);

  static hash(color: Color) {
    return (color.r * 3 + color.g * 5 + color.b * 7 + color.a * 11) % CACHE_SIZE;
  }

  lookup(index: number) {
    return this.slots[index & (CACHE_SIZE - 1)];
  }

  store(index: number, color: Color) {
    this.slots[index & (CACHE_SIZE - 1)] = color;
  }

  snapshot(): Color[] {
    return this.slots.map(({ r, g, b, a }) => ({ r, g, b, a }));
  }
}
