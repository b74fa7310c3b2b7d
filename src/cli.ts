import { randomUUID } from 'node:crypto';
import path from 'node:path';
import { parseArgs } from 'node:util';

import {
  buildBatchReport,
  formatBatchSummary,
  saveBatchReport,
} from '@/lib/batch/report';
import { runBatch } from '@/lib/batch/run';
import type { ScreenshotOutcome } from '@/lib/batch/types';
import { loadCompanySet } from '@/lib/companies/companySet';
import { resolveBatchDate } from '@/lib/date';
import { loadSettings } from '@/lib/env';
import { describeError } from '@/lib/errors';
import { discoverScreenshots } from '@/lib/files/discover';
import { fileOutcomes } from '@/lib/files/filer';
import {
  createOcrEngineWithFallback,
  FallbackOcrEngine,
} from '@/lib/ocr/fallback';
import { createTesseractEngine } from '@/lib/ocr/tesseract';
import type { OcrEngineFactory } from '@/lib/ocr/types';

const cliOptions = {
  files: { type: 'string' },
  date: { type: 'string' },
  companies: { type: 'string' },
  output: { type: 'string' },
  flat: { type: 'boolean' },
  'dry-run': { type: 'boolean' },
  'no-report': { type: 'boolean' },
  'delete-rejected': { type: 'boolean' },
  'keep-duplicates': { type: 'boolean' },
  device: { type: 'string' },
  concurrency: { type: 'string' },
  workers: { type: 'string' },
  'batch-size': { type: 'string' },
  'crop-top': { type: 'string' },
  'crop-bottom': { type: 'string' },
  'max-width': { type: 'string' },
  'company-match': { type: 'string' },
  'no-strike-recovery': { type: 'boolean' },
  verbose: { type: 'boolean', short: 'v' },
  help: { type: 'boolean', short: 'h' },
} as const;

function parseCli(argv: string[]) {
  const { values, positionals } = parseArgs({
    args: argv,
    options: cliOptions,
    allowPositionals: true,
    strict: true,
  });
  const [command, ...rest] = positionals;
  return { command, values, positionals: rest };
}

type CliValues = ReturnType<typeof parseCli>['values'];

function splitList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

async function handleRun(values: CliValues, positionals: string[]): Promise<void> {
  const settings = loadSettings({
    ocrDevice: values.device,
    concurrency: values.concurrency,
    ocrWorkers: values.workers,
    batchSize: values['batch-size'],
    cropTop: values['crop-top'],
    cropBottom: values['crop-bottom'],
    maxWidth: values['max-width'],
    companyMatch: values['company-match'],
    recoverDroppedDecimal: values['no-strike-recovery'] ? false : undefined,
  });

  const inputDir = path.resolve(process.cwd(), positionals[0] ?? '.');
  const explicitFiles = splitList(values.files).map((file) =>
    path.resolve(process.cwd(), file),
  );
  const files =
    explicitFiles.length > 0
      ? explicitFiles
      : await discoverScreenshots(inputDir, settings.filePrefix);

  if (files.length === 0) {
    console.log(
      `No '${settings.filePrefix}...' images (.png, .jpg, .jpeg) found in ${inputDir}.`,
    );
    return;
  }

  const companiesPath = path.resolve(
    process.cwd(),
    values.companies ?? path.join(inputDir, 'companies.txt'),
  );
  const companies = await loadCompanySet(companiesPath);
  const date = resolveBatchDate(values.date, settings);
  const dryRun = values['dry-run'] ?? false;

  console.log(
    `[batch] ${files.length} file(s), ${companies.tickers.length} ticker(s), date ${date}${dryRun ? ' (dry run)' : ''}`,
  );

  const factory: OcrEngineFactory = (device) =>
    createTesseractEngine({
      device,
      workers: settings.ocrWorkers,
      language: settings.ocrLanguage,
      langPath: settings.ocrLangPath,
    });
  console.log(`[ocr] starting ${settings.ocrWorkers} worker(s) on ${settings.ocrDevice}`);
  const primary = await createOcrEngineWithFallback(factory, settings.ocrDevice);
  const engine = new FallbackOcrEngine(primary, factory);

  let outcomes: ScreenshotOutcome[];
  try {
    outcomes = await runBatch({
      files,
      engine,
      companies,
      date,
      settings,
      verbose: values.verbose,
    });
  } finally {
    await engine.terminate();
  }

  const filings = await fileOutcomes(
    outcomes,
    {
      outputDir: values.output
        ? path.resolve(process.cwd(), values.output)
        : inputDir,
      flat: values.flat ?? false,
      timeSeparator: settings.timeSeparator,
      onDuplicate: values['keep-duplicates'] ? 'skip' : 'replace',
      onRejected: values['delete-rejected'] ? 'delete' : 'keep',
    },
    dryRun,
  );

  const report = buildBatchReport({
    batchId: randomUUID(),
    date,
    inputDir,
    dryRun,
    outcomes,
    filings,
  });

  console.log('');
  for (const line of formatBatchSummary(report, settings.timeSeparator)) {
    console.log(line);
  }

  if (!dryRun && !values['no-report']) {
    const reportPath = await saveBatchReport(report, settings.reportDir);
    console.log(`Report saved to ${reportPath}`);
  }

  if (report.totals.failed > 0) {
    process.exitCode = 1;
  }
}

function printHelp(): void {
  console.log(`
Usage: screenshot-sorter <command> [options]

Commands:
  run [dir]   Read every 'Screenshot*' image in dir (default: current directory),
              extract company, strike, option type and time, and rename each file to
              "{Date} {Company} {Strike} {OptionType} {Time}" inside a
              "{Strike} {OptionType} {Company}" folder.
  help        Show this help.

Options for run:
  --files a.png,b.png      Process these files instead of scanning dir
  --date <date>            Batch date (default: today, format dd-MM-yyyy)
  --companies <path>       Ticker list, one per line (default: dir/companies.txt)
  --output <dir>           Where renamed files go (default: dir)
  --flat                   Do not create per-contract folders
  --dry-run                Print the plan; move, delete and save nothing
  --no-report              Do not save the JSON batch report (default: dir/reports)
  --delete-rejected        Delete screenshots that failed validation
  --keep-duplicates        Leave an existing target in place instead of replacing it
  --device accelerated|cpu OCR engine preference (falls back to cpu)
  --concurrency <n>        Images in flight
  --workers <n>            OCR workers
  --batch-size <n>         Images per chunk
  --crop-top <fraction>    Top band to drop (default 0.08)
  --crop-bottom <fraction> Bottom band to drop (default 0.20)
  --max-width <px>         Downscale wider crops to this width (default 1600)
  --company-match exact|substring
  --no-strike-recovery     Keep 40000 as read instead of treating it as 400.00
  -v, --verbose            Log every file, not only problems

Every option also reads from SORTER_* environment variables, e.g. SORTER_CROP_TOP.
Set SORTER_DEBUG=1 to print every OCR fragment.
`);
}

async function main(): Promise<void> {
  const { command, values, positionals } = parseCli(process.argv.slice(2));

  if (values.help) {
    printHelp();
    return;
  }

  switch (command) {
    case 'run':
      await handleRun(values, positionals);
      break;
    case 'help':
    case undefined:
      printHelp();
      break;
    default:
      console.error(`Unknown command: ${command}`);
      printHelp();
      process.exitCode = 1;
  }
}

void main().catch((error: unknown) => {
  console.error('Command failed:', describeError(error));
  process.exitCode = 1;
});
