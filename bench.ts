import benchmark from 'benchmark';

import * as qoi from './src';
import { logError, logInfo, styleKV } from './src/logger';

const WIDTH = 512;
const HEIGHT = 512;

// Horizontal gradient with flat bands and a soft alpha ramp, so every opcode
// shows up in the stream.
function makeImage(): qoi.ImageData {
  const data = new Uint8Array(WIDTH * HEIGHT * 4);
  for (let y = 0; y < HEIGHT; y += 1) {
    for (let x = 0; x < WIDTH; x += 1) {
      const idx = (y * WIDTH + x) * 4;
      const band = (x >> 5) % 2 === 0;
      data[idx] = band ? 200 : x & 0xff;
      data[idx + 1] = band ? 40 : (x + y) & 0xff;
      data[idx + 2] = (y * 3) & 0xff;
      data[idx + 3] = y < HEIGHT / 2 ? 255 : 255 - (x & 0x3f);
    }
  }
  return { width: WIDTH, height: HEIGHT, data };
}

const inputImage = makeImage();
const encoded = qoi.encode(inputImage);

logInfo(styleKV('Raw size', inputImage.data.length));
logInfo(styleKV('Encoded size', encoded.length));

const suite = new benchmark.Suite();

suite
  .add('encode', () => {
    qoi.encode(inputImage);
  })
  .add('decode', () => {
    qoi.decode(encoded);
  })
  .on('cycle', (event: benchmark.Event) => {
    logInfo(String(event.target));
    const mean = event.target.stats?.mean;
    if (mean !== undefined) logInfo(`${(mean * 1000).toFixed(2)} ms/run`);
  })
  .on('error', (event: benchmark.Event) => {
    logError(`Error running ${event.target.name ?? String(event.target)}`);
  })
  .run({ async: true });
