import { z } from 'zod';

export const fragmentRegionSchema = z.object({
  left: z.number(),
  top: z.number(),
  width: z.number().min(0),
  height: z.number().min(0),
});

export type FragmentRegion = z.infer<typeof fragmentRegionSchema>;

export const imageVariantSchema = z.enum(['original', 'enhanced']);

export type ImageVariant = z.infer<typeof imageVariantSchema>;

export const rawFragmentSchema = z.object({
  text: z.string(),
  region: fragmentRegionSchema,
  confidence: z.number().min(0).max(1),
  source: imageVariantSchema,
});

export type RawFragment = Readonly<z.infer<typeof rawFragmentSchema>>;

// `text` holds the numeric-corrected reading; `originalText` is what OCR returned.
export type CorrectedFragment = RawFragment & {
  readonly originalText: string;
};

export const ocrDeviceSchema = z.enum(['accelerated', 'cpu']);

export type OcrDevice = z.infer<typeof ocrDeviceSchema>;

export interface OcrEngine {
  readonly device: OcrDevice;
  /**
   * Recognize one preprocessed image. Fragments come back in reading order,
   * tagged with the variant they were read from.
   */
  detect(image: Buffer, variant: ImageVariant): Promise<RawFragment[]>;
  terminate(): Promise<void>;
}

export type OcrEngineFactory = (device: OcrDevice) => Promise<OcrEngine>;
