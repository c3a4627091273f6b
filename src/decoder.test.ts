import { Readable } from 'stream';

import { decode, decodeStream, isValidContainer } from './decoder';
import { encode } from './encoder';
import { isQOIError } from './errors';
import { encodeHeader } from './header';
import { ChannelFormat, Colorspace, ImageData, QOIImage } from './types';
import {
  captureError,
  createRandom,
  loadTestResource,
  Random,
} from './__test__/helpers';

const END_MARKER = [0, 0, 0, 0, 0, 0, 0, 1];

function container(width: number, height: number, body: number[]) {
  const header = encodeHeader({
    width,
    height,
    channels: ChannelFormat.RGBA,
    colorspace: Colorspace.SRGB,
  });
  return Uint8Array.from([...header, ...body]);
}

function chunked(bytes: Uint8Array, size: number) {
  const chunks: Buffer[] = [];
  for (let i = 0; i < bytes.length; i += size) {
    chunks.push(Buffer.from(bytes.subarray(i, i + size)));
  }
  return Readable.from(chunks);
}

describe('decode', () => {
  const reference = loadTestResource('reference.qoi');
  const referencePixels = loadTestResource('reference.rgba');

  it('decodes the reference stream', () => {
    const image = decode(reference);
    expect(image.width).toBe(40);
    expect(image.height).toBe(6);
    expect(image.channels).toBe(ChannelFormat.RGBA);
    expect(image.colorspace).toBe(Colorspace.SRGB);
    expect(referencePixels.compare(Buffer.from(image.data))).toBe(0);
  });

  it('decodes a hand-assembled stream using every opcode', () => {
    const body = [
      0xfe, 10, 20, 30, // rgb
      0x79, // diff +1 0 -1
      0xa5, 0x5a, // luma dg +5, dr-dg -3, db-dg +2
      0xc2, // run of 3
      0xff, 200, 100, 50, 128, // rgba
      0x09, // index of (10, 20, 30, 255)
      ...END_MARKER,
    ];
    expect(Array.from(decode(container(8, 1, body)).data)).toEqual([
      10, 20, 30, 255,
      11, 20, 29, 255,
      13, 25, 36, 255,
      13, 25, 36, 255,
      13, 25, 36, 255,
      13, 25, 36, 255,
      200, 100, 50, 128,
      10, 20, 30, 255,
    ]);
  });

  it('finds opaque black in the cache after a leading run', () => {
    const image = decode(container(2, 1, [0xc0, 0x35, ...END_MARKER]));
    expect(Array.from(image.data)).toEqual([0, 0, 0, 255, 0, 0, 0, 255]);
  });

  it('ignores bytes after the last pixel', () => {
    const padded = Uint8Array.from([...reference, 0xfe, 1, 2, 3]);
    expect(decode(padded).data).toEqual(decode(reference).data);
  });

  it('decodes an empty image', () => {
    const image = decode(container(0, 7, END_MARKER));
    expect(image.width).toBe(0);
    expect(image.height).toBe(7);
    expect(image.data.length).toBe(0);
  });

  it('rejects a buffer shorter than a header', () => {
    expect(captureError(() => decode(reference.subarray(0, 13)))).toMatchObject({
      code: 'InvalidData',
    });
  });

  it('rejects a bad signature as invalid data', () => {
    const bytes = Uint8Array.from(reference);
    bytes[3] = 0;
    const err = captureError(() => decode(bytes));
    expect(err).toMatchObject({ code: 'InvalidData' });
    expect(err).toHaveProperty('cause.code', 'InvalidMagic');
  });

  it('rejects an unknown colorspace as invalid data', () => {
    const bytes = Uint8Array.from(reference);
    bytes[13] = 7;
    const err = captureError(() => decode(bytes));
    expect(err).toMatchObject({ code: 'InvalidData' });
    expect(err).toHaveProperty('cause.code', 'InvalidTag');
  });

  it('rejects a buffer too short for the declared size', () => {
    expect(captureError(() => decode(container(62, 2, [0xfd])))).toMatchObject({
      code: 'InvalidData',
      message: 'A 62x2 image needs at least 24 bytes, got 15',
    });
  });

  it('rejects a run that overruns the image', () => {
    expect(captureError(() => decode(container(2, 1, [0xc2, ...END_MARKER])))).toMatchObject({
      code: 'InvalidData',
      message: 'Run of 3 pixels at pixel 0 overruns the 2 pixel image',
    });
  });

  it('reports a stream that ends before the last pixel', () => {
    const body = [0xff, 1, 2, 3, 4, 0xff, 1, 2, 3, 5];
    expect(captureError(() => decode(container(100, 1, body)))).toMatchObject({
      code: 'EndOfStream',
    });
  });

  it('refuses dimensions whose pixel count overflows before allocating', () => {
    const bytes = container(0xffffffff, 0xffffffff, END_MARKER);
    expect(captureError(() => decode(bytes))).toMatchObject({ code: 'OutOfMemory' });
  });

  it('applies the configured pixel limit', () => {
    // 161 full runs plus a run of 18 cover exactly 10000 pixels.
    const body = [...new Array<number>(161).fill(0xfd), 0xd1, ...END_MARKER];
    const bytes = container(100, 100, body);
    expect(decode(bytes).data.length).toBe(40000);
    expect(captureError(() => decode(bytes, { maxPixels: 9999 }))).toMatchObject({
      code: 'OutOfMemory',
      message: 'Image of 100x100 pixels exceeds the limit of 9999 pixels',
    });
  });
});

describe('decodeStream', () => {
  const reference = loadTestResource('reference.qoi');

  it.each([1, 5, 64, 4096])('decodes the reference in %i-byte chunks', async (size) => {
    const image = await decodeStream(chunked(reference, size));
    expect(image).toEqual(decode(reference));
  });

  it('reports a stream that ends mid-opcode', async () => {
    await expect(decodeStream(chunked(container(1, 1, [0xfe, 1]), 3))).rejects.toMatchObject({
      code: 'EndOfStream',
    });
  });

  it('reports a stream that ends inside the header', async () => {
    await expect(decodeStream(chunked(reference.subarray(0, 10), 4))).rejects.toMatchObject({
      code: 'EndOfStream',
    });
  });

  it('refuses oversized images before reading pixels', async () => {
    const bytes = container(0x10000, 0x10000, []);
    await expect(decodeStream(chunked(bytes, 14))).rejects.toMatchObject({
      code: 'OutOfMemory',
    });
  });

  it('propagates errors from the source', async () => {
    const source = new Readable({
      read() {
        this.destroy(new Error('disk on fire'));
      },
    });
    await expect(decodeStream(source)).rejects.toThrow('disk on fire');
  });
});

describe('isValidContainer', () => {
  const reference = loadTestResource('reference.qoi');

  it('accepts a complete container', () => {
    expect(isValidContainer(reference)).toBe(true);
  });

  it('rejects short, mislabelled and truncated buffers', () => {
    expect(isValidContainer(reference.subarray(0, 13))).toBe(false);

    const badMagic = Uint8Array.from(reference);
    badMagic[0] = 0;
    expect(isValidContainer(badMagic)).toBe(false);

    const badTag = Uint8Array.from(reference);
    badTag[12] = 0;
    expect(isValidContainer(badTag)).toBe(false);
  });

  it('compares against the smallest possible body for the dimensions', () => {
    expect(isValidContainer(container(62, 2, new Array<number>(10).fill(0)))).toBe(true);
    expect(isValidContainer(container(62, 2, new Array<number>(9).fill(0)))).toBe(false);
  });
});

type ImageGenerator = (random: Random, width: number, height: number) => Uint8Array;

const generators: Record<string, ImageGenerator> = {
  noise: (random, width, height) => random.bytes(width * height * 4),
  palette: (random, width, height) => {
    const colors = Array.from({ length: 6 }, () => random.bytes(4));
    const data = new Uint8Array(width * height * 4);
    for (let i = 0; i < width * height; i += 1) {
      data.set(colors[random.int(random.int(3) === 0 ? colors.length : 2)], i * 4);
    }
    return data;
  },
  gradient: (random, width, height) => {
    const data = new Uint8Array(width * height * 4);
    const base = random.bytes(4);
    for (let y = 0; y < height; y += 1) {
      for (let x = 0; x < width; x += 1) {
        const idx = (y * width + x) * 4;
        data[idx] = (base[0] + x * 3) & 0xff;
        data[idx + 1] = (base[1] + x + y) & 0xff;
        data[idx + 2] = (base[2] - y * 2) & 0xff;
        data[idx + 3] = x % 50 === 0 ? random.byte() : 255;
      }
    }
    return data;
  },
};

describe('round trip', () => {
  const random = createRandom(0x1337);
  const sizes = [
    [1, 1],
    [3, 5],
    [62, 1],
    [63, 2],
    [64, 64],
    [7, 129],
    [251, 49],
  ];

  for (const [name, generate] of Object.entries(generators)) {
    it.each(sizes)(`restores a %ix%i ${name} image`, (width, height) => {
      const image: ImageData = {
        width,
        height,
        data: generate(random, width, height),
        colorspace: random.int(2) ? Colorspace.Linear : Colorspace.SRGB,
      };

      const decoded = decode(encode(image));
      expect(decoded.width).toBe(width);
      expect(decoded.height).toBe(height);
      expect(decoded.colorspace).toBe(image.colorspace);
      expect(Buffer.from(decoded.data).compare(Buffer.from(image.data))).toBe(0);
    });
  }
});

describe('fuzzed input', () => {
  function checkOutcome(bytes: Uint8Array) {
    let image: QOIImage | undefined;
    try {
      image = decode(bytes, { maxPixels: 1 << 22 });
    } catch (err) {
      expect(isQOIError(err)).toBe(true);
    }
    if (image) expect(image.data.length).toBe(image.width * image.height * 4);
  }

  it('returns an image or a decode error for random bytes', () => {
    const random = createRandom(0xdecade);
    for (let round = 0; round < 32; round += 1) {
      const size = round % 8 === 1 ? 1 << 20 : 1 << 14;
      const bytes = random.bytes(size);

      // Three quarters of the inputs get a plausible header.
      if (round % 4 !== 0) {
        bytes.set(
          encodeHeader({
            width: random.int(1 << 12),
            height: random.int(1 << 8),
            channels: random.int(2) ? ChannelFormat.RGB : ChannelFormat.RGBA,
            colorspace: random.int(2) ? Colorspace.SRGB : Colorspace.Linear,
          }),
        );
      }
      checkOutcome(bytes);
    }
  });

  it('returns an image or a decode error for corrupted streams', () => {
    const random = createRandom(7);
    const source = encode({ width: 64, height: 64, data: generators.palette(random, 64, 64) });
    for (let round = 0; round < 200; round += 1) {
      const bytes = Uint8Array.from(source);
      for (let flips = 0; flips < 4; flips += 1) {
        bytes[14 + random.int(bytes.length - 14)] = random.byte();
      }
      checkOutcome(bytes.subarray(0, bytes.length - random.int(40)));
    }
  });
});
