import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  buildBatchReport,
  formatBatchSummary,
  getReportsDir,
  saveBatchReport,
} from '@/lib/batch/report';
import type { FilingAction, ScreenshotOutcome } from '@/lib/batch/types';

import { makeTempDir, removeTempDir } from '../helpers/tmp';

const outcomes: ScreenshotOutcome[] = [
  {
    status: 'accepted',
    filePath: '/shots/Screenshot 1.png',
    record: { date: '12-03-2024', company: 'PFC', strike: 400, optionType: 'PE', time: '14:35' },
    timeStrategy: 'direct-separator',
    fragmentCount: 12,
  },
  {
    status: 'rejected',
    filePath: '/shots/Screenshot 2.png',
    reasons: ['InvalidTimestamp'],
    detail: "Could not find valid time (invalid value: '71:50')",
    fragmentCount: 8,
  },
  {
    status: 'failed',
    filePath: '/shots/Screenshot 3.png',
    errorCode: 'IMAGE_LOAD',
    message: 'Could not read image /shots/Screenshot 3.png',
  },
];

const filings: FilingAction[] = [
  {
    kind: 'move',
    from: '/shots/Screenshot 1.png',
    to: '/shots/400 PE PFC/12-03-2024 PFC 400 PE 14;35.png',
    replaces: false,
  },
  { kind: 'keep', from: '/shots/Screenshot 2.png' },
  { kind: 'keep', from: '/shots/Screenshot 3.png' },
];

function report() {
  return buildBatchReport({
    batchId: 'batch-1',
    date: '12-03-2024',
    inputDir: '/shots',
    dryRun: false,
    outcomes,
    filings,
    now: new Date('2024-03-12T10:00:00.000Z'),
  });
}

describe('buildBatchReport', () => {
  it('counts outcomes by status', () => {
    expect(report().totals).toEqual({ accepted: 1, rejected: 1, failed: 1 });
    expect(report().createdAt).toBe('2024-03-12T10:00:00.000Z');
  });
});

describe('formatBatchSummary', () => {
  it('lists renamed, rejected and failed files', () => {
    expect(formatBatchSummary(report(), ';')).toEqual([
      'Processed 3 screenshot(s): 1 renamed, 1 rejected, 1 failed.',
      'Renamed:',
      '  Screenshot 1.png -> 12-03-2024 PFC 400 PE 14;35',
      'Rejected:',
      "  Screenshot 2.png: InvalidTimestamp (Could not find valid time (invalid value: '71:50'))",
      'Failed:',
      '  Screenshot 3.png: IMAGE_LOAD Could not read image /shots/Screenshot 3.png',
    ]);
  });

  it('prints only the totals line for an empty batch', () => {
    const empty = buildBatchReport({
      batchId: 'batch-2',
      date: '12-03-2024',
      inputDir: '/shots',
      dryRun: true,
      outcomes: [],
      filings: [],
    });
    expect(formatBatchSummary(empty, ';')).toEqual([
      'Processed 0 screenshot(s): 0 renamed, 0 rejected, 0 failed.',
    ]);
  });
});

describe('saveBatchReport', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('writes the report as JSON named after the batch', async () => {
    const saved = await saveBatchReport(report(), dir);
    expect(saved).toBe(path.join(dir, 'batch-1.json'));
    expect(JSON.parse(await readFile(saved, 'utf8'))).toEqual(report());
  });

  it('defaults to a reports folder inside the input directory', async () => {
    expect(getReportsDir('/shots')).toBe(path.join('/shots', 'reports'));
    expect(getReportsDir('/shots', 'out/reports')).toBe(path.resolve('out/reports'));

    const saved = await saveBatchReport({ ...report(), inputDir: dir });
    expect(saved).toBe(path.join(dir, 'reports', 'batch-1.json'));
  });

  it('refuses a report that does not validate', async () => {
    await expect(saveBatchReport({ ...report(), batchId: '' }, dir)).rejects.toThrow(
      'Refusing to persist invalid batch report.',
    );
  });
});
