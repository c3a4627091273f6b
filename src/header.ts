import { QOIError } from './errors';
import { MAX_RUN_LENGTH } from './opcodes';
import { ByteSource, ChannelFormat, Colorspace, QOIHeader } from './types';

export const QOI_MAGIC = 0x716f6966; // "qoif"
export const QOI_HEADER_LENGTH = 14;
export const QOI_END_MARKER = Uint8Array.of(0, 0, 0, 0, 0, 0, 0, 1);

const MAX_DIMENSION = 0xffffffff;

function isDimension(value: number) {
  return Number.isInteger(value) && value >= 0 && value <= MAX_DIMENSION;
}

function toChannelFormat(value: number): ChannelFormat | undefined {
  switch (value) {
    case ChannelFormat.RGB:
      return ChannelFormat.RGB;
    case ChannelFormat.RGBA:
      return ChannelFormat.RGBA;
  }
  return undefined;
}

function toColorspace(value: number): Colorspace | undefined {
  switch (value) {
    case Colorspace.SRGB:
      return Colorspace.SRGB;
    case Colorspace.Linear:
      return Colorspace.Linear;
  }
  return undefined;
}

export function encodeHeader(header: QOIHeader) {
  const { width, height } = header;
  if (!isDimension(width) || !isDimension(height)) {
    throw new QOIError(
      'InvalidData',
      `Image dimensions ${width}x${height} do not fit in 32 bits`,
    );
  }

  const result = new Uint8Array(QOI_HEADER_LENGTH);
  const dv = new DataView(result.buffer);
  dv.setUint32(0, QOI_MAGIC);
  dv.setUint32(4, width);
  dv.setUint32(8, height);
  dv.setUint8(12, header.channels);
  dv.setUint8(13, header.colorspace);
  return result;
}

export function decodeHeader(bytes: Uint8Array): QOIHeader {
  if (bytes.length < QOI_HEADER_LENGTH) {
    throw new QOIError(
      'EndOfStream',
      `Header needs ${QOI_HEADER_LENGTH} bytes, got ${bytes.length}`,
    );
  }

  const dv = new DataView(bytes.buffer, bytes.byteOffset, QOI_HEADER_LENGTH);
  const magic = dv.getUint32(0);
  if (magic !== QOI_MAGIC) {
    throw new QOIError(
      'InvalidMagic',
      `Bad magic 0x${magic.toString(16).padStart(8, '0')}`,
    );
  }

  const channels = toChannelFormat(dv.getUint8(12));
  if (channels === undefined) {
    throw new QOIError('InvalidTag', `Unknown channel format ${dv.getUint8(12)}`);
  }
  const colorspace = toColorspace(dv.getUint8(13));
  if (colorspace === undefined) {
    throw new QOIError('InvalidTag', `Unknown colorspace ${dv.getUint8(13)}`);
  }

  return {
    width: dv.getUint32(4),
    height: dv.getUint32(8),
    channels,
    colorspace,
  };
}

/**
 * Reads and parses the header block from a byte source. Any problem with the
 * block's contents is reported as `InvalidData`, with the specific header
 * error attached as its cause.
 */
export function readHeader(source: ByteSource) {
  const block = source.read(QOI_HEADER_LENGTH);
  try {
    return decodeHeader(block);
  } catch (err) {
    throw new QOIError(
      'InvalidData',
      `Invalid header: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
}

export function pixelCount(header: Pick<QOIHeader, 'width' | 'height'>) {
  return header.width * header.height;
}

/**
 * Smallest container a header can describe: every opcode covers at most one
 * full run, and the end marker is always present.
 */
export function minContainerLength(header: QOIHeader) {
  return (
    QOI_HEADER_LENGTH +
    Math.ceil(pixelCount(header) / MAX_RUN_LENGTH) +
    QOI_END_MARKER.length
  );
}
