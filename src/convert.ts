import { once } from 'events';
import fs from 'fs';
import path from 'path';
import { finished } from 'stream/promises';

import { PNG } from 'pngjs';

import { decodeStream } from './decoder';
import { encodeStream } from './encoder';
import { ImageData } from './types';

const INPUT_FORMAT_BPP = 4;

function asBuffer(data: Uint8Array | Uint8ClampedArray) {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

export function fromPNG(buffer: Buffer): ImageData {
  const png = PNG.sync.read(buffer);
  return {
    width: png.width,
    height: png.height,
    data: new Uint8Array(png.data),
  };
}

export function toPNG(image: ImageData) {
  const png = new PNG({ width: image.width, height: image.height });
  png.data = Buffer.from(asBuffer(image.data));
  return PNG.sync.write(png);
}

/** Binary portable pixmap; alpha is dropped. */
export function toPPM(image: ImageData) {
  const { width, height, data } = image;
  const header = Buffer.from(`P6 ${width} ${height} 255\n`, 'ascii');
  const body = Buffer.alloc(width * height * 3);

  for (let src = 0, dst = 0; src < data.length; src += INPUT_FORMAT_BPP, dst += 3) {
    body[dst] = data[src];
    body[dst + 1] = data[src + 1];
    body[dst + 2] = data[src + 2];
  }
  return Buffer.concat([header, body]);
}

/** Portable arbitrary map with an RGBA tuple per pixel. */
export function toPAM(image: ImageData) {
  const header = Buffer.from(
    [
      'P7',
      `WIDTH ${image.width}`,
      `HEIGHT ${image.height}`,
      'DEPTH 4',
      'MAXVAL 255',
      'TUPLTYPE RGB_ALPHA',
      'ENDHDR',
      '',
    ].join('\n'),
    'ascii',
  );
  return Buffer.concat([header, asBuffer(image.data)]);
}

function extensionOf(filePath: string) {
  return path.extname(filePath).toLowerCase();
}

async function readImage(inputPath: string): Promise<ImageData> {
  const ext = extensionOf(inputPath);
  switch (ext) {
    case '.qoi':
      return decodeStream(fs.createReadStream(inputPath));
    case '.png':
      return fromPNG(await fs.promises.readFile(inputPath));
  }
  throw new Error(`Unsupported input format '${ext}'`);
}

async function writeImage(image: ImageData, outputPath: string) {
  const ext = extensionOf(outputPath);
  switch (ext) {
    case '.qoi': {
      const destination = fs.createWriteStream(outputPath);
      try {
        await encodeStream(image, destination);
      } catch (err) {
        destination.destroy();
        if (!destination.closed) await once(destination, 'close');
        await fs.promises.rm(outputPath, { force: true });
        throw err;
      }
      destination.end();
      await finished(destination);
      return;
    }
    case '.png':
      return fs.promises.writeFile(outputPath, toPNG(image));
    case '.ppm':
      return fs.promises.writeFile(outputPath, toPPM(image));
    case '.pam':
      return fs.promises.writeFile(outputPath, toPAM(image));
  }
  throw new Error(`Unsupported output format '${ext}'`);
}

/** Converts between image files, choosing formats by file extension. */
export async function convertFile(inputPath: string, outputPath: string) {
  const ext = extensionOf(outputPath);
  if (!['.qoi', '.png', '.ppm', '.pam'].includes(ext)) {
    throw new Error(`Unsupported output format '${ext}'`);
  }

  const image = await readImage(inputPath);
  await writeImage(image, outputPath);
  return image;
}
