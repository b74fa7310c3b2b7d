import path from 'node:path';

import sharp from 'sharp';

import { chunk, runPool } from '@/lib/batch/pool';
import {
  failedOutcome,
  processScreenshot,
  type ProcessSettings,
} from '@/lib/batch/process';
import type { ScreenshotOutcome } from '@/lib/batch/types';
import type { CompanySet } from '@/lib/companies/companySet';
import type { OcrEngine } from '@/lib/ocr/types';

export type BatchSettings = ProcessSettings & {
  concurrency: number;
  batchSize: number;
  imageThreads: number;
};

function describeOutcome(outcome: ScreenshotOutcome): string {
  const name = path.basename(outcome.filePath);
  switch (outcome.status) {
    case 'accepted': {
      const { company, strike, optionType, time } = outcome.record;
      return `[batch] ok       ${name} -> ${company} ${strike} ${optionType} ${time}`;
    }
    case 'rejected':
      return `[batch] rejected ${name}: ${outcome.detail}`;
    case 'failed':
      return `[batch] failed   ${name}: ${outcome.errorCode} ${outcome.message}`;
  }
}

export async function runBatch(params: {
  files: readonly string[];
  engine: OcrEngine;
  companies: CompanySet;
  date: string;
  settings: BatchSettings;
  verbose?: boolean;
}): Promise<ScreenshotOutcome[]> {
  const { settings } = params;
  sharp.concurrency(settings.imageThreads);

  const outcomes: ScreenshotOutcome[] = [];
  const chunks = chunk(params.files, settings.batchSize);

  for (const [index, files] of chunks.entries()) {
    if (chunks.length > 1) {
      console.log(
        `[batch] chunk ${index + 1}/${chunks.length} (${files.length} file(s))`,
      );
    }

    await runPool(
      files,
      settings.concurrency,
      (filePath) =>
        processScreenshot({
          filePath,
          engine: params.engine,
          companies: params.companies,
          date: params.date,
          settings,
        }),
      (result, filePath) => {
        const outcome =
          result.status === 'fulfilled'
            ? result.value
            : failedOutcome(filePath, result.reason);
        outcomes.push(outcome);
        if (params.verbose || outcome.status !== 'accepted') {
          const line = describeOutcome(outcome);
          if (outcome.status === 'failed') console.error(line);
          else console.log(line);
        }
      },
    );
  }

  // Completion order varies run to run; filing goes by file name.
  return outcomes.sort((a, b) => a.filePath.localeCompare(b.filePath));
}
