import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { processScreenshot, type ProcessSettings } from '@/lib/batch/process';
import { runBatch, type BatchSettings } from '@/lib/batch/run';
import { createCompanySet } from '@/lib/companies/companySet';
import type { ImageVariant, OcrEngine, RawFragment } from '@/lib/ocr/types';

import { extractionSettings, fragment } from '../helpers/fragments';
import { blankPng, makeTempDir, removeTempDir } from '../helpers/tmp';

const companies = createCompanySet(['PFC', 'TCS']);

const settings: ProcessSettings = {
  ...extractionSettings,
  cropTop: 0.08,
  cropBottom: 0.2,
  maxWidth: 1600,
};

function engineReading(
  read: (variant: ImageVariant) => Promise<RawFragment[]>,
): OcrEngine {
  return {
    device: 'cpu',
    detect: vi.fn((_image: Buffer, variant: ImageVariant) => read(variant)),
    terminate: vi.fn(async () => {}),
  };
}

// The enhanced pass reads nothing so each case controls the text exactly.
function engineWithText(text: string): OcrEngine {
  return engineReading(async (variant) => (variant === 'original' ? [fragment(text)] : []));
}

let dir: string;
let imagePath: string;

beforeEach(async () => {
  dir = await makeTempDir();
  imagePath = path.join(dir, 'Screenshot 1.png');
  await writeFile(imagePath, await blankPng());
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await removeTempDir(dir);
});

describe('processScreenshot', () => {
  it('accepts a screenshot whose text holds every field', async () => {
    const engine = engineWithText('PFC 400 PE 14:35');
    const outcome = await processScreenshot({
      filePath: imagePath,
      engine,
      companies,
      date: '12-03-2024',
      settings,
    });

    expect(outcome).toEqual({
      status: 'accepted',
      filePath: imagePath,
      record: {
        date: '12-03-2024',
        company: 'PFC',
        strike: 400,
        optionType: 'PE',
        time: '14:35',
      },
      timeStrategy: 'direct-separator',
      fragmentCount: 1,
    });
    expect(engine.detect).toHaveBeenCalledTimes(2);
  });

  it('rejects a screenshot with a missing field', async () => {
    const outcome = await processScreenshot({
      filePath: imagePath,
      engine: engineWithText('PFC 400 PE'),
      companies,
      date: '12-03-2024',
      settings,
    });
    expect(outcome).toEqual({
      status: 'rejected',
      filePath: imagePath,
      reasons: ['MissingTimestamp'],
      detail: 'Could not find valid time (not found)',
      fragmentCount: 1,
    });
  });

  it('fails with IMAGE_LOAD for a missing file', async () => {
    const missing = path.join(dir, 'Screenshot 9.png');
    const outcome = await processScreenshot({
      filePath: missing,
      engine: engineWithText('PFC'),
      companies,
      date: '12-03-2024',
      settings,
    });
    expect(outcome.status).toBe('failed');
    expect(outcome.status === 'failed' && outcome.errorCode).toBe('IMAGE_LOAD');
    expect(outcome.status === 'failed' && outcome.message).toMatch(
      /^Could not read image .*Screenshot 9\.png: ENOENT/,
    );
  });

  it('fails with IMAGE_LOAD for a file that is not an image', async () => {
    const broken = path.join(dir, 'Screenshot 2.png');
    await writeFile(broken, 'not an image');
    const outcome = await processScreenshot({
      filePath: broken,
      engine: engineWithText('PFC'),
      companies,
      date: '12-03-2024',
      settings,
    });
    expect(outcome.status === 'failed' && outcome.errorCode).toBe('IMAGE_LOAD');
  });

  it('fails with OCR_FAILURE when no text is read', async () => {
    const outcome = await processScreenshot({
      filePath: imagePath,
      engine: engineReading(async () => []),
      companies,
      date: '12-03-2024',
      settings,
    });
    expect(outcome).toEqual({
      status: 'failed',
      filePath: imagePath,
      errorCode: 'OCR_FAILURE',
      message: `OCR returned no text for ${imagePath}`,
    });
  });

  it('fails with UNEXPECTED when the engine throws a plain error', async () => {
    const outcome = await processScreenshot({
      filePath: imagePath,
      engine: engineReading(async () => {
        throw new Error('boom');
      }),
      companies,
      date: '12-03-2024',
      settings,
    });
    expect(outcome).toEqual({
      status: 'failed',
      filePath: imagePath,
      errorCode: 'UNEXPECTED',
      message: 'boom',
    });
  });
});

describe('runBatch', () => {
  it('isolates failures and returns outcomes in file name order', async () => {
    const second = path.join(dir, 'Screenshot 3.png');
    await writeFile(second, await blankPng());
    const missing = path.join(dir, 'Screenshot 2.png');

    const batchSettings: BatchSettings = {
      ...settings,
      concurrency: 2,
      batchSize: 2,
      imageThreads: 2,
    };
    const outcomes = await runBatch({
      files: [second, missing, imagePath],
      engine: engineWithText('TCS 3500 CE 10:05'),
      companies,
      date: '12-03-2024',
      settings: batchSettings,
    });

    expect(outcomes.map((o) => [path.basename(o.filePath), o.status])).toEqual([
      ['Screenshot 1.png', 'accepted'],
      ['Screenshot 2.png', 'failed'],
      ['Screenshot 3.png', 'accepted'],
    ]);
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});
