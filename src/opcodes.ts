export const QOI_OP_INDEX = 0x00; // 00xxxxxx
export const QOI_OP_DIFF = 0x40; // 01xxxxxx
export const QOI_OP_LUMA = 0x80; // 10xxxxxx
export const QOI_OP_RUN = 0xc0; // 11xxxxxx
export const QOI_OP_RGB = 0xfe; // 11111110
export const QOI_OP_RGBA = 0xff; // 11111111

export const QOI_MASK_2 = 0xc0;

// Run lengths 63 and 64 would collide with QOI_OP_RGB and QOI_OP_RGBA.
export const MAX_RUN_LENGTH = 62;

// Longest opcode is QOI_OP_RGBA: tag plus four channels.
export const MAX_OPCODE_LENGTH = 5;

export type Opcode = 'index' | 'diff' | 'luma' | 'run' | 'rgb' | 'rgba';

// Indexed by the two high bits of a tag byte.
const PREFIX_OPCODES: readonly [Opcode, Opcode, Opcode, Opcode] = [
  'index',
  'diff',
  'luma',
  'run',
];

/**
 * Classifies the first byte of an opcode. The two full-byte tags are checked
 * before the two-bit prefixes they share with QOI_OP_RUN.
 */
export function classifyOpcode(byte: number): Opcode {
  if (byte === QOI_OP_RGB) return 'rgb';
  if (byte === QOI_OP_RGBA) return 'rgba';
  return PREFIX_OPCODES[(byte & QOI_MASK_2) >> 6];
}

/** Bytes that follow the tag byte for each opcode. */
export function opcodeLength(opcode: Opcode) {
  switch (opcode) {
    case 'index':
    case 'diff':
    case 'run':
      return 0;
    case 'luma':
      return 1;
    case 'rgb':
      return 3;
    case 'rgba':
      return 4;
  }
}

/** Signed difference b - a between two channel values, wrapped to -128..127. */
export function wrappingDelta(a: number, b: number) {
  return (((b - a) << 24) >> 24);
}

/** Adds a signed delta to a channel value, wrapping modulo 256. */
export function wrappingAdd(value: number, delta: number) {
  return (value + delta) & 0xff;
}

// Biased bit-field packing: a signed value v in [-bias, bias - 1] is stored
// as the unsigned field v + bias.

export const DIFF_BIAS = 2;
export const LUMA_GREEN_BIAS = 32;
export const LUMA_RB_BIAS = 8;

function inBiasedRange(value: number, bias: number) {
  return value >= -bias && value < bias;
}

export function inDiffRange(value: number) {
  return inBiasedRange(value, DIFF_BIAS);
}

export function inLumaGreenRange(value: number) {
  return inBiasedRange(value, LUMA_GREEN_BIAS);
}

export function inLumaRBRange(value: number) {
  return inBiasedRange(value, LUMA_RB_BIAS);
}

export function packBiased(value: number, bias: number) {
  if (!inBiasedRange(value, bias)) {
    throw new RangeError(`${value} does not fit a field biased by ${bias}`);
  }
  return value + bias;
}

export function unpackBiased(field: number, bias: number) {
  return (field & (bias * 2 - 1)) - bias;
}
