import { Writable } from 'stream';

import BufferCursor from './BufferCursor';
import { QOIError } from './errors';
import { encodeHeader, QOI_END_MARKER, QOI_HEADER_LENGTH } from './header';
import { MAX_OPCODE_LENGTH } from './opcodes';
import PixelEncoder from './PixelEncoder';
import { StreamByteSink } from './stream';
import {
  ChannelFormat,
  Colorspace,
  ImageData,
  QOIEncoderOptions,
  QOIHeader,
} from './types';

const INPUT_FORMAT_BPP = 4;

export const DEFAULT_STREAM_CHUNK_SIZE = 64 * 1024;

function validateImage(image: ImageData) {
  const { width, height, data } = image;
  const expected = width * height * INPUT_FORMAT_BPP;
  if (data.length !== expected) {
    throw new QOIError(
      'InvalidData',
      `Expected ${expected} bytes of RGBA data for a ${width}x${height} image, got ${data.length}`,
    );
  }
}

/** RGBA if any pixel is not fully opaque, RGB otherwise. */
export function detectChannels(image: ImageData) {
  const { data } = image;
  for (let i = 3; i < data.length; i += INPUT_FORMAT_BPP) {
    if (data[i] !== 0xff) return ChannelFormat.RGBA;
  }
  return ChannelFormat.RGB;
}

function buildHeader(image: ImageData, options: QOIEncoderOptions): QOIHeader {
  const channels =
    options.channels === undefined || options.channels === 'auto'
      ? detectChannels(image)
      : options.channels;

  return {
    width: image.width,
    height: image.height,
    channels,
    colorspace: options.colorspace ?? image.colorspace ?? Colorspace.SRGB,
  };
}

// Worst case: every pixel is a QOI_OP_RGBA.
function maxOutputSize(image: ImageData) {
  const { width, height } = image;
  return (
    QOI_HEADER_LENGTH +
    width * height * MAX_OPCODE_LENGTH +
    QOI_END_MARKER.length
  );
}

function allocateOutput(image: ImageData) {
  const size = maxOutputSize(image);
  try {
    return new BufferCursor(size);
  } catch (err) {
    throw new QOIError(
      'OutOfMemory',
      `Cannot allocate ${size} bytes to encode a ${image.width}x${image.height} image`,
      { cause: err },
    );
  }
}

function pushRow(image: ImageData, y: number, encoder: PixelEncoder) {
  const { width, data } = image;
  const end = (y + 1) * width * INPUT_FORMAT_BPP;

  for (let idx = y * width * INPUT_FORMAT_BPP; idx < end; idx += INPUT_FORMAT_BPP) {
    encoder.push({
      r: data[idx],
      g: data[idx + 1],
      b: data[idx + 2],
      a: data[idx + 3],
    });
  }
}

export function encode(image: ImageData, options: QOIEncoderOptions = {}) {
  const header = encodeHeader(buildHeader(image, options));
  validateImage(image);

  const cursor = allocateOutput(image);
  cursor.writeArray(header);

  const encoder = new PixelEncoder(cursor);
  for (let y = 0; y < image.height; y += 1) pushRow(image, y, encoder);
  encoder.finish();

  return cursor.slice();
}

/**
 * Encodes an image to a writable stream. Produces the same bytes as
 * `encode()`, written in chunks of roughly `chunkSize` bytes.
 */
export async function encodeStream(
  image: ImageData,
  destination: Writable,
  options: QOIEncoderOptions = {},
  chunkSize = DEFAULT_STREAM_CHUNK_SIZE,
) {
  const header = encodeHeader(buildHeader(image, options));
  validateImage(image);

  const sink = new StreamByteSink(destination, chunkSize);
  sink.write(header);

  const encoder = new PixelEncoder(sink);
  for (let y = 0; y < image.height; y += 1) {
    pushRow(image, y, encoder);
    if (sink.pending >= chunkSize) await sink.flush();
  }
  encoder.finish();

  await sink.flush();
}
