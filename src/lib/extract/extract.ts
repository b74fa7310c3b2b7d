import type { CompanySet } from '@/lib/companies/companySet';
import { classifyFragments, type ClassifyContext } from '@/lib/extract/classify';
import { correctFragments } from '@/lib/extract/correct';
import { buildTradeRecord, type BuildRecordResult } from '@/lib/extract/record';
import {
  resolveTimestamp,
  type TimestampResolution,
  type TimestampSettings,
} from '@/lib/extract/timestamp';
import type { CandidateSet } from '@/lib/extract/types';
import type { RawFragment } from '@/lib/ocr/types';

export type ExtractionSettings = TimestampSettings &
  Omit<ClassifyContext, 'companies'>;

export type Extraction = {
  result: BuildRecordResult;
  candidates: CandidateSet;
  timestamp: TimestampResolution;
};

export function extractTradeRecord(
  fragments: readonly RawFragment[],
  params: {
    companies: CompanySet;
    date: string;
    settings: ExtractionSettings;
  },
): Extraction {
  const corrected = correctFragments(fragments);
  const classified = classifyFragments(corrected, {
    companies: params.companies,
    strikeMin: params.settings.strikeMin,
    strikeMax: params.settings.strikeMax,
    companyMatch: params.settings.companyMatch,
    recoverDroppedDecimal: params.settings.recoverDroppedDecimal,
  });
  const timestamp = resolveTimestamp(fragments, corrected, params.settings);

  const candidates: CandidateSet = {
    ...classified,
    timestamp: timestamp.best
      ? [
          {
            kind: 'timestamp',
            value: timestamp.best.time,
            sourceConfidence: timestamp.best.confidence,
            strategy: timestamp.best.strategy,
            fragmentIndex: timestamp.best.fragmentIndex,
          },
        ]
      : [],
  };

  const result = buildTradeRecord({
    candidates,
    date: params.date,
    rejectedTimestamps: timestamp.rejected.map((candidate) => candidate.reading),
  });

  return { result, candidates, timestamp };
}
