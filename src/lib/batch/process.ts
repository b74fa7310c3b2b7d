import { readFile } from 'node:fs/promises';

import type { CompanySet } from '@/lib/companies/companySet';
import { isDebugEnabled } from '@/lib/env';
import { describeError, hasErrorCode, ImageLoadError, OcrFailure } from '@/lib/errors';
import { extractTradeRecord, type ExtractionSettings } from '@/lib/extract/extract';
import type { FailureCode, ScreenshotOutcome } from '@/lib/batch/types';
import { prepareScreenshot, type PreprocessOptions } from '@/lib/ocr/preprocess';
import type { OcrEngine, RawFragment } from '@/lib/ocr/types';

export type ProcessSettings = ExtractionSettings & PreprocessOptions;

async function readImageFile(filePath: string): Promise<Buffer> {
  try {
    return await readFile(filePath);
  } catch (err) {
    throw new ImageLoadError(filePath, { cause: err });
  }
}

function failureCode(err: unknown): FailureCode {
  if (hasErrorCode(err, 'IMAGE_LOAD')) return 'IMAGE_LOAD';
  if (hasErrorCode(err, 'OCR_FAILURE')) return 'OCR_FAILURE';
  return 'UNEXPECTED';
}

export function failedOutcome(filePath: string, err: unknown): ScreenshotOutcome {
  return {
    status: 'failed',
    filePath,
    errorCode: failureCode(err),
    message: describeError(err),
  };
}

function logFragments(filePath: string, fragments: readonly RawFragment[]): void {
  console.log(`[ocr] ${filePath}: ${fragments.length} fragments`);
  for (const fragment of fragments) {
    const { left, top } = fragment.region;
    console.log(
      `[ocr]   ${fragment.source} @${Math.round(left)},${Math.round(top)} ${fragment.confidence.toFixed(2)} ${JSON.stringify(fragment.text)}`,
    );
  }
}

/**
 * One unit of batch work: file → preprocess → OCR on both variants →
 * extraction. Every failure is folded into the returned outcome.
 */
export async function processScreenshot(params: {
  filePath: string;
  engine: OcrEngine;
  companies: CompanySet;
  date: string;
  settings: ProcessSettings;
}): Promise<ScreenshotOutcome> {
  const { filePath, engine, settings } = params;
  try {
    const input = await readImageFile(filePath);
    const prepared = await prepareScreenshot(input, settings, filePath);

    const [fromOriginal, fromEnhanced] = await Promise.all([
      engine.detect(prepared.original, 'original'),
      engine.detect(prepared.enhanced, 'enhanced'),
    ]);
    const fragments = [...fromOriginal, ...fromEnhanced];
    if (fragments.length === 0) {
      throw new OcrFailure(`OCR returned no text for ${filePath}`);
    }
    if (isDebugEnabled()) logFragments(filePath, fragments);

    const extraction = extractTradeRecord(fragments, {
      companies: params.companies,
      date: params.date,
      settings,
    });

    if (extraction.result.ok) {
      return {
        status: 'accepted',
        filePath,
        record: extraction.result.record,
        timeStrategy: extraction.timestamp.best?.strategy ?? 'unknown',
        fragmentCount: fragments.length,
      };
    }

    return {
      status: 'rejected',
      filePath,
      reasons: extraction.result.reasons,
      detail: extraction.result.detail,
      fragmentCount: fragments.length,
    };
  } catch (err) {
    return failedOutcome(filePath, err);
  }
}
