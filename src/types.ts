export interface Color {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

export enum Colorspace {
  /** sRGB color channels, linear alpha. */
  SRGB = 0,
  /** Every channel is linear. */
  Linear = 1,
}

export enum ChannelFormat {
  RGB = 3,
  RGBA = 4,
}

/** Read-only RGBA view of an image to encode. */
export interface ImageData {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array | Uint8ClampedArray;
  readonly colorspace?: Colorspace;
}

export interface QOIImage {
  width: number;
  height: number;
  channels: ChannelFormat;
  colorspace: Colorspace;
  data: Uint8Array;
}

export interface QOIHeader {
  width: number;
  height: number;
  channels: ChannelFormat;
  colorspace: Colorspace;
}

export interface QOIEncoderOptions {
  channels?: ChannelFormat | 'auto';
  colorspace?: Colorspace;
}

export interface QOIDecoderOptions {
  maxPixels?: number;
}

export interface PixelRun {
  color: Color;
  count: number;
}

export interface ByteSink {
  write(bytes: Uint8Array): void;
}

export interface ByteSource {
  readByte(): number;
  read(length: number): Uint8Array;
}
