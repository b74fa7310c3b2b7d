import { describeError, OcrFailure } from '@/lib/errors';
import type {
  ImageVariant,
  OcrDevice,
  OcrEngine,
  OcrEngineFactory,
  RawFragment,
} from '@/lib/ocr/types';

export async function createOcrEngineWithFallback(
  factory: OcrEngineFactory,
  device: OcrDevice,
): Promise<OcrEngine> {
  try {
    return await factory(device);
  } catch (err) {
    if (device === 'cpu') {
      throw new OcrFailure('OCR engine failed to start', { cause: err });
    }
    console.warn(
      `[ocr] ${device} engine failed to start (${describeError(err)}); falling back to cpu`,
    );
  }

  try {
    return await factory('cpu');
  } catch (err) {
    throw new OcrFailure('OCR engine failed to start on cpu', { cause: err });
  }
}

/**
 * Retries an image once on a cpu engine when the preferred engine throws or
 * reads nothing. The cpu engine is started on first need and then shared.
 */
export class FallbackOcrEngine implements OcrEngine {
  private fallback: Promise<OcrEngine> | null = null;
  private fallbackEngine: OcrEngine | null = null;

  constructor(
    private readonly primary: OcrEngine,
    private readonly factory: OcrEngineFactory,
  ) {}

  get device(): OcrDevice {
    return this.primary.device;
  }

  async detect(image: Buffer, variant: ImageVariant): Promise<RawFragment[]> {
    let primaryError: unknown = null;
    try {
      const fragments = await this.primary.detect(image, variant);
      if (fragments.length > 0 || this.primary.device === 'cpu') {
        return fragments;
      }
    } catch (err) {
      if (this.primary.device === 'cpu') {
        throw new OcrFailure(`OCR failed on the ${variant} image`, {
          cause: err,
        });
      }
      primaryError = err;
    }

    const reason = primaryError
      ? describeError(primaryError)
      : 'no text detected';
    console.warn(
      `[ocr] ${this.primary.device} engine: ${reason}; retrying ${variant} image on cpu`,
    );

    try {
      const fallback = await this.getFallback();
      return await fallback.detect(image, variant);
    } catch (err) {
      throw new OcrFailure(`OCR failed on the ${variant} image after cpu retry`, {
        cause: err,
      });
    }
  }

  async terminate(): Promise<void> {
    await this.primary.terminate();
    if (this.fallbackEngine) {
      await this.fallbackEngine.terminate();
      this.fallbackEngine = null;
    }
  }

  private getFallback(): Promise<OcrEngine> {
    this.fallback ??= this.factory('cpu').then((engine) => {
      this.fallbackEngine = engine;
      return engine;
    });
    return this.fallback;
  }
}
