import sharp from 'sharp';
import { describe, expect, it } from 'vitest';

import { ImageLoadError } from '@/lib/errors';
import { computeCrop, prepareScreenshot } from '@/lib/ocr/preprocess';

const options = { cropTop: 0.08, cropBottom: 0.2, maxWidth: 1600 };

function noiseImage(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: 255, g: 255, b: 255 },
      noise: { type: 'gaussian', mean: 128, sigma: 40 },
    },
  })
    .png()
    .toBuffer();
}

describe('computeCrop', () => {
  it('drops the top and bottom bands', () => {
    expect(computeCrop(1000, 500, options)).toEqual({
      left: 0,
      top: 40,
      width: 1000,
      height: 360,
    });
  });

  it('never returns an empty rectangle', () => {
    expect(computeCrop(10, 1, options).height).toBe(1);
  });
});

describe('prepareScreenshot', () => {
  it('crops without resizing when the crop fits', async () => {
    const prepared = await prepareScreenshot(await noiseImage(1000, 500), options);
    expect(prepared.width).toBe(1000);
    expect(prepared.height).toBe(360);
    expect(prepared.scale).toBe(1);

    for (const variant of [prepared.original, prepared.enhanced]) {
      const meta = await sharp(variant).metadata();
      expect([meta.format, meta.width, meta.height]).toEqual(['png', 1000, 360]);
    }
  });

  it('downscales wide crops to the maximum width', async () => {
    const prepared = await prepareScreenshot(await noiseImage(2000, 1000), {
      ...options,
      maxWidth: 1000,
    });
    expect(prepared.crop).toEqual({ left: 0, top: 80, width: 2000, height: 720 });
    expect(prepared.scale).toBe(0.5);
    const meta = await sharp(prepared.original).metadata();
    expect([meta.width, meta.height]).toEqual([1000, 360]);
  });

  it('turns undecodable input into an ImageLoadError', async () => {
    const attempt = prepareScreenshot(Buffer.from('not an image'), options, 'broken.png');
    await expect(attempt).rejects.toBeInstanceOf(ImageLoadError);
    await expect(attempt).rejects.toThrow('Could not read image broken.png');
  });
});
