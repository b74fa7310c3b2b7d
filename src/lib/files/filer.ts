import { copyFile, mkdir, rename, stat, unlink } from 'node:fs/promises';
import path from 'node:path';

import type { FilingAction, ScreenshotOutcome } from '@/lib/batch/types';
import { hasErrorCode } from '@/lib/errors';
import type { TradeRecord } from '@/lib/extract/types';

export type FilingOptions = {
  outputDir: string;
  flat: boolean;
  timeSeparator: string;
  onDuplicate: 'replace' | 'skip';
  onRejected: 'keep' | 'delete';
};

function sanitizeSegment(value: string): string {
  return value.replaceAll(/[\\/:*?"<>|]/g, '-').trim();
}

export function formatFileStem(
  record: TradeRecord,
  timeSeparator = ';',
): string {
  const time = record.time.replace(':', timeSeparator);
  return `${sanitizeSegment(record.date)} ${sanitizeSegment(record.company)} ${record.strike} ${record.optionType} ${time}`;
}

export function formatFolderName(record: TradeRecord): string {
  return `${record.strike} ${record.optionType} ${sanitizeSegment(record.company)}`;
}

export function targetPathFor(
  filePath: string,
  record: TradeRecord,
  options: Pick<FilingOptions, 'outputDir' | 'flat' | 'timeSeparator'>,
): string {
  const ext = path.extname(filePath).toLowerCase() || '.png';
  const dir = options.flat
    ? options.outputDir
    : path.join(options.outputDir, formatFolderName(record));
  return path.join(dir, `${formatFileStem(record, options.timeSeparator)}${ext}`);
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return false;
    throw err;
  }
}

/**
 * Decides what happens to one processed file. `claimed` holds targets
 * already taken earlier in the same batch so dry runs report replacements
 * the same way a real run performs them.
 */
export async function planFiling(
  outcome: ScreenshotOutcome,
  options: FilingOptions,
  claimed: Set<string> = new Set(),
): Promise<FilingAction> {
  if (outcome.status === 'failed') {
    return { kind: 'keep', from: outcome.filePath };
  }
  if (outcome.status === 'rejected') {
    return options.onRejected === 'delete'
      ? { kind: 'delete', from: outcome.filePath }
      : { kind: 'keep', from: outcome.filePath };
  }

  const to = targetPathFor(outcome.filePath, outcome.record, options);
  if (path.resolve(to) === path.resolve(outcome.filePath)) {
    return { kind: 'keep', from: outcome.filePath };
  }

  const taken = claimed.has(to) || (await exists(to));
  claimed.add(to);
  if (taken && options.onDuplicate === 'skip') {
    return { kind: 'skip-duplicate', from: outcome.filePath, to };
  }
  return { kind: 'move', from: outcome.filePath, to, replaces: taken };
}

async function moveFile(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (err) {
    // rename cannot cross devices
    if (!hasErrorCode(err, 'EXDEV')) throw err;
    await copyFile(from, to);
    await unlink(from);
  }
}

export async function applyFiling(action: FilingAction): Promise<void> {
  switch (action.kind) {
    case 'move':
      await mkdir(path.dirname(action.to), { recursive: true });
      await moveFile(action.from, action.to);
      return;
    case 'delete':
      await unlink(action.from);
      return;
    case 'skip-duplicate':
    case 'keep':
      return;
  }
}

export function describeFiling(action: FilingAction): string {
  switch (action.kind) {
    case 'move':
      return `${action.replaces ? 'replace' : 'move'} ${action.from} -> ${action.to}`;
    case 'skip-duplicate':
      return `skip ${action.from} (${action.to} exists)`;
    case 'delete':
      return `delete ${action.from}`;
    case 'keep':
      return `keep ${action.from}`;
  }
}

export async function fileOutcomes(
  outcomes: readonly ScreenshotOutcome[],
  options: FilingOptions,
  dryRun: boolean,
): Promise<FilingAction[]> {
  const claimed = new Set<string>();
  const actions: FilingAction[] = [];

  for (const outcome of outcomes) {
    const action = await planFiling(outcome, options, claimed);
    actions.push(action);
    if (action.kind === 'keep') continue;

    if (dryRun) {
      console.log(`[filer] would ${describeFiling(action)}`);
      continue;
    }
    try {
      await applyFiling(action);
      console.log(`[filer] ${describeFiling(action)}`);
    } catch (err) {
      console.error(
        `[filer] could not ${describeFiling(action)}: ${err instanceof Error ? err.message : String(err)}`,
      );
      actions[actions.length - 1] = { kind: 'keep', from: outcome.filePath };
    }
  }

  return actions;
}
