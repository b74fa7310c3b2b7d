export type ScreenshotErrorCode = 'IMAGE_LOAD' | 'OCR_FAILURE';

export class ImageLoadError extends Error {
  readonly code = 'IMAGE_LOAD' as const;

  constructor(filePath: string, options?: { cause?: unknown }) {
    super(`Could not read image ${filePath}`, options);
    this.name = 'ImageLoadError';
  }
}

export class OcrFailure extends Error {
  readonly code = 'OCR_FAILURE' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OcrFailure';
  }
}

export function hasErrorCode(err: unknown, code: string): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    (err as { code?: unknown }).code === code
  );
}

export function describeError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
  return `${err.message}${cause}`;
}
