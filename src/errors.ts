export type QOIErrorCode =
  | 'InvalidMagic'
  | 'InvalidTag'
  | 'InvalidData'
  | 'EndOfStream'
  | 'OutOfMemory';

export class QOIError extends Error {
  constructor(
    public readonly code: QOIErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'QOIError';
  }
}

export function isQOIError(err: unknown, code?: QOIErrorCode): err is QOIError {
  return err instanceof QOIError && (code === undefined || err.code === code);
}
