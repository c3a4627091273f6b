export { encode, encodeStream, detectChannels } from './encoder';
export { decode, decodeStream, isValidContainer, DEFAULT_MAX_PIXELS } from './decoder';
export {
  decodeHeader,
  encodeHeader,
  QOI_END_MARKER,
  QOI_HEADER_LENGTH,
  QOI_MAGIC,
} from './header';
export { QOIError, isQOIError } from './errors';
export type { QOIErrorCode } from './errors';
export { default as PixelEncoder } from './PixelEncoder';
export { default as PixelDecoder } from './PixelDecoder';
export { default as ColorCache } from './ColorCache';
export { StreamByteSink, StreamByteSource } from './stream';
export * from './types';
