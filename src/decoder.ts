import BufferCursor from './BufferCursor';
import { QOIError } from './errors';
import {
  decodeHeader,
  minContainerLength,
  pixelCount,
  QOI_HEADER_LENGTH,
  readHeader,
} from './header';
import { MAX_OPCODE_LENGTH } from './opcodes';
import PixelDecoder from './PixelDecoder';
import { StreamByteSource } from './stream';
import { QOIDecoderOptions, QOIHeader, QOIImage } from './types';

const OUTPUT_FORMAT_BPP = 4;

// Same ceiling as qoi.h.
export const DEFAULT_MAX_PIXELS = 400_000_000;

/**
 * Returns true if `bytes` start with a valid header and are long enough to
 * hold the image it describes. The opcodes themselves are not checked.
 */
export function isValidContainer(bytes: Uint8Array) {
  if (bytes.length < QOI_HEADER_LENGTH) return false;
  try {
    const header = decodeHeader(bytes);
    return bytes.length >= minContainerLength(header);
  } catch {
    return false;
  }
}

function checkPixelLimit(header: QOIHeader, options: QOIDecoderOptions) {
  const maxPixels = options.maxPixels ?? DEFAULT_MAX_PIXELS;
  const count = pixelCount(header);

  if (!Number.isSafeInteger(count * OUTPUT_FORMAT_BPP) || count > maxPixels) {
    throw new QOIError(
      'OutOfMemory',
      `Image of ${header.width}x${header.height} pixels exceeds the limit of ${maxPixels} pixels`,
    );
  }
  return count;
}

/**
 * Checks the declared dimensions against the pixel limit and allocates the
 * output image. Nothing is allocated when the check fails.
 */
function allocateImage(header: QOIHeader, options: QOIDecoderOptions): QOIImage {
  const count = checkPixelLimit(header, options);

  let data: Uint8Array;
  try {
    data = new Uint8Array(count * OUTPUT_FORMAT_BPP);
  } catch (err) {
    throw new QOIError(
      'OutOfMemory',
      `Cannot allocate a ${header.width}x${header.height} image`,
      { cause: err },
    );
  }

  return { ...header, data };
}

/** Tracks where the next decoded pixels go in the output buffer. */
class PixelWriter {
  private index = 0;
  private readonly total: number;

  constructor(private image: QOIImage) {
    this.total = image.data.length / OUTPUT_FORMAT_BPP;
  }

  get done() {
    return this.index >= this.total;
  }

  write(decoder: PixelDecoder) {
    const { color, count } = decoder.fetch();
    if (this.index + count > this.total) {
      throw new QOIError(
        'InvalidData',
        `Run of ${count} pixels at pixel ${this.index} overruns the ${this.total} pixel image`,
      );
    }

    const { data } = this.image;
    const end = (this.index + count) * OUTPUT_FORMAT_BPP;
    for (let p = this.index * OUTPUT_FORMAT_BPP; p < end; p += OUTPUT_FORMAT_BPP) {
      data[p] = color.r;
      data[p + 1] = color.g;
      data[p + 2] = color.b;
      data[p + 3] = color.a;
    }
    this.index += count;
  }
}

export function decode(bytes: Uint8Array, options: QOIDecoderOptions = {}) {
  const cursor = new BufferCursor(bytes);
  if (bytes.length < QOI_HEADER_LENGTH) {
    throw new QOIError(
      'InvalidData',
      `${bytes.length} bytes is too short for a QOI header`,
    );
  }

  const header = readHeader(cursor);
  checkPixelLimit(header, options);
  const minLength = minContainerLength(header);
  if (bytes.length < minLength) {
    throw new QOIError(
      'InvalidData',
      `A ${header.width}x${header.height} image needs at least ${minLength} bytes, got ${bytes.length}`,
    );
  }

  const image = allocateImage(header, options);
  const writer = new PixelWriter(image);
  const decoder = new PixelDecoder(cursor);
  while (!writer.done) writer.write(decoder);

  return image;
}

/**
 * Decodes an image from a stream of chunks, such as a `Readable`. Reads only
 * as far as needed to produce the declared number of pixels, give or take
 * the last chunk pulled from the source.
 */
export async function decodeStream(
  source: AsyncIterable<Uint8Array>,
  options: QOIDecoderOptions = {},
) {
  const reader = new StreamByteSource(source);
  await reader.ensure(QOI_HEADER_LENGTH);
  const header = readHeader(reader);

  const image = allocateImage(header, options);
  const writer = new PixelWriter(image);
  const decoder = new PixelDecoder(reader);
  while (!writer.done) {
    if (reader.available < MAX_OPCODE_LENGTH) {
      await reader.ensure(MAX_OPCODE_LENGTH);
    }
    writer.write(decoder);
  }

  return image;
}
