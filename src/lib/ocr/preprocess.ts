import sharp from 'sharp';

import { ImageLoadError } from '@/lib/errors';

export type CropRect = {
  left: number;
  top: number;
  width: number;
  height: number;
};

export type PreprocessOptions = {
  cropTop: number;
  cropBottom: number;
  maxWidth: number;
};

export type PreparedScreenshot = {
  // Crop only (downscaled when too wide). Thin chart lines stay thin here.
  original: Buffer;
  // Same crop with contrast boost, denoise and sharpening.
  enhanced: Buffer;
  width: number;
  height: number;
  crop: CropRect;
  scale: number;
};

export function computeCrop(
  width: number,
  height: number,
  options: Pick<PreprocessOptions, 'cropTop' | 'cropBottom'>,
): CropRect {
  const top = Math.round(height * options.cropTop);
  const bottom = Math.round(height * (1 - options.cropBottom));
  return { left: 0, top, width, height: Math.max(1, bottom - top) };
}

export async function prepareScreenshot(
  input: Buffer,
  options: PreprocessOptions,
  label = 'image buffer',
): Promise<PreparedScreenshot> {
  let width: number | undefined;
  let height: number | undefined;
  try {
    const meta = await sharp(input).metadata();
    width = meta.width;
    height = meta.height;
  } catch (err) {
    throw new ImageLoadError(label, { cause: err });
  }
  if (!width || !height) {
    throw new ImageLoadError(label, {
      cause: new Error('Missing image dimensions'),
    });
  }

  // Taskbar and browser chrome sit in the cropped bands; their clock and
  // tab titles otherwise compete with the chart's own timestamp.
  const crop = computeCrop(width, height, options);
  const scale = crop.width > options.maxWidth ? options.maxWidth / crop.width : 1;
  const outWidth = Math.max(1, Math.round(crop.width * scale));
  const outHeight = Math.max(1, Math.round(crop.height * scale));

  let base = sharp(input).extract(crop);
  if (scale < 1) {
    base = base.resize({ width: outWidth, height: outHeight, fit: 'fill' });
  }

  try {
    const [original, enhanced] = await Promise.all([
      base.clone().png().toBuffer(),
      base.clone().grayscale().normalize().median(3).sharpen().png().toBuffer(),
    ]);
    return {
      original,
      enhanced,
      width: outWidth,
      height: outHeight,
      crop,
      scale,
    };
  } catch (err) {
    throw new ImageLoadError(label, { cause: err });
  }
}
