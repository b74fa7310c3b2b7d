import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { OcrFailure } from '@/lib/errors';
import { createOcrEngineWithFallback, FallbackOcrEngine } from '@/lib/ocr/fallback';
import type { OcrDevice, OcrEngine, RawFragment } from '@/lib/ocr/types';

import { fragment } from '../helpers/fragments';

function fakeEngine(
  device: OcrDevice,
  detect: () => Promise<RawFragment[]>,
): OcrEngine {
  return {
    device,
    detect: vi.fn(detect),
    terminate: vi.fn(async () => {}),
  };
}

const image = Buffer.from('image');

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createOcrEngineWithFallback', () => {
  it('uses the preferred engine when it starts', async () => {
    const engine = fakeEngine('accelerated', async () => []);
    const factory = vi.fn(async () => engine);
    await expect(createOcrEngineWithFallback(factory, 'accelerated')).resolves.toBe(engine);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('falls back to cpu when the preferred engine fails to start', async () => {
    const cpu = fakeEngine('cpu', async () => []);
    const factory = vi.fn(async (device: OcrDevice) => {
      if (device === 'accelerated') throw new Error('no accelerator');
      return cpu;
    });
    await expect(createOcrEngineWithFallback(factory, 'accelerated')).resolves.toBe(cpu);
    expect(factory.mock.calls).toEqual([['accelerated'], ['cpu']]);
  });

  it('fails when cpu cannot start either', async () => {
    const factory = vi.fn(async () => {
      throw new Error('missing language data');
    });
    await expect(createOcrEngineWithFallback(factory, 'cpu')).rejects.toBeInstanceOf(OcrFailure);
    expect(factory).toHaveBeenCalledTimes(1);
  });
});

describe('FallbackOcrEngine', () => {
  it('returns the primary result when it finds text', async () => {
    const primary = fakeEngine('accelerated', async () => [fragment('PFC')]);
    const factory = vi.fn(async () => fakeEngine('cpu', async () => []));
    const engine = new FallbackOcrEngine(primary, factory);

    await expect(engine.detect(image, 'original')).resolves.toEqual([fragment('PFC')]);
    expect(factory).not.toHaveBeenCalled();
  });

  it('retries on one shared cpu engine when the primary reads nothing or throws', async () => {
    let calls = 0;
    const primary = fakeEngine('accelerated', async () => {
      calls += 1;
      if (calls === 1) return [];
      throw new Error('device lost');
    });
    const cpu = fakeEngine('cpu', async () => [fragment('400')]);
    const factory = vi.fn(async () => cpu);
    const engine = new FallbackOcrEngine(primary, factory);

    await expect(engine.detect(image, 'original')).resolves.toEqual([fragment('400')]);
    await expect(engine.detect(image, 'enhanced')).resolves.toEqual([fragment('400')]);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(cpu.detect).toHaveBeenCalledTimes(2);

    await engine.terminate();
    expect(primary.terminate).toHaveBeenCalledTimes(1);
    expect(cpu.terminate).toHaveBeenCalledTimes(1);
  });

  it('does not retry when the primary already runs on cpu', async () => {
    const primary = fakeEngine('cpu', async () => {
      throw new Error('worker crashed');
    });
    const factory = vi.fn(async () => fakeEngine('cpu', async () => []));
    const engine = new FallbackOcrEngine(primary, factory);

    await expect(engine.detect(image, 'original')).rejects.toThrow(
      'OCR failed on the original image',
    );
    expect(factory).not.toHaveBeenCalled();
  });

  it('reports a failed retry as an OcrFailure', async () => {
    const primary = fakeEngine('accelerated', async () => {
      throw new Error('device lost');
    });
    const cpu = fakeEngine('cpu', async () => {
      throw new Error('out of memory');
    });
    const engine = new FallbackOcrEngine(primary, async () => cpu);

    const attempt = engine.detect(image, 'enhanced');
    await expect(attempt).rejects.toBeInstanceOf(OcrFailure);
    await expect(attempt).rejects.toThrow('OCR failed on the enhanced image after cpu retry');
  });
});
