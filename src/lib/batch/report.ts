import { mkdir, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';

import {
  batchReportSchema,
  type BatchReport,
  type FilingAction,
  type ScreenshotOutcome,
} from '@/lib/batch/types';
import { formatFileStem } from '@/lib/files/filer';

// Reports sit next to the screenshots they describe unless a directory is set.
export function getReportsDir(inputDir: string, reportDir?: string): string {
  return reportDir
    ? path.resolve(reportDir)
    : path.join(inputDir, 'reports');
}

export function buildBatchReport(params: {
  batchId: string;
  date: string;
  inputDir: string;
  dryRun: boolean;
  outcomes: ScreenshotOutcome[];
  filings: FilingAction[];
  now?: Date;
}): BatchReport {
  const count = (status: ScreenshotOutcome['status']) =>
    params.outcomes.filter((outcome) => outcome.status === status).length;

  return {
    batchId: params.batchId,
    createdAt: (params.now ?? new Date()).toISOString(),
    date: params.date,
    inputDir: params.inputDir,
    dryRun: params.dryRun,
    totals: {
      accepted: count('accepted'),
      rejected: count('rejected'),
      failed: count('failed'),
    },
    outcomes: params.outcomes,
    filings: params.filings,
  };
}

export function formatBatchSummary(
  report: BatchReport,
  timeSeparator: string,
): string[] {
  const { totals } = report;
  const total = totals.accepted + totals.rejected + totals.failed;
  const lines = [
    `Processed ${total} screenshot(s): ${totals.accepted} renamed, ${totals.rejected} rejected, ${totals.failed} failed.`,
  ];

  const accepted = report.outcomes.flatMap((o) =>
    o.status === 'accepted' ? [o] : [],
  );
  const rejected = report.outcomes.flatMap((o) =>
    o.status === 'rejected' ? [o] : [],
  );
  const failed = report.outcomes.flatMap((o) =>
    o.status === 'failed' ? [o] : [],
  );

  if (accepted.length > 0) {
    lines.push('Renamed:');
    for (const outcome of accepted) {
      lines.push(
        `  ${path.basename(outcome.filePath)} -> ${formatFileStem(outcome.record, timeSeparator)}`,
      );
    }
  }
  if (rejected.length > 0) {
    lines.push('Rejected:');
    for (const outcome of rejected) {
      lines.push(
        `  ${path.basename(outcome.filePath)}: ${outcome.reasons.join(', ')} (${outcome.detail})`,
      );
    }
  }
  if (failed.length > 0) {
    lines.push('Failed:');
    for (const outcome of failed) {
      lines.push(
        `  ${path.basename(outcome.filePath)}: ${outcome.errorCode} ${outcome.message}`,
      );
    }
  }

  return lines;
}

function serialize(value: BatchReport): string {
  return JSON.stringify(value, null, 2) + '\n';
}

export async function saveBatchReport(
  report: BatchReport,
  reportDir?: string,
): Promise<string> {
  const parsed = batchReportSchema.safeParse(report);
  if (!parsed.success) throw new Error('Refusing to persist invalid batch report.');

  const dir = getReportsDir(report.inputDir, reportDir);
  const filePath = path.join(dir, `${report.batchId}.json`);
  const tmpPath = path.join(
    dir,
    `${report.batchId}.tmp.${process.pid}.${Date.now()}.json`,
  );

  await mkdir(dir, { recursive: true });
  await writeFile(tmpPath, serialize(parsed.data), 'utf8');
  await rename(tmpPath, filePath);
  return filePath;
}
