import {
  tradeRecordSchema,
  type CandidateSet,
  type RejectionReason,
  type TradeRecord,
} from '@/lib/extract/types';

export type BuildRecordInput = {
  candidates: CandidateSet;
  date: string;
  // Readings the timestamp resolver discarded, e.g. "71:50".
  rejectedTimestamps?: readonly string[];
};

export type BuildRecordResult =
  | { ok: true; record: TradeRecord }
  | { ok: false; reasons: RejectionReason[]; detail: string };

function reasonForField(field: unknown): RejectionReason | null {
  switch (field) {
    case 'date':
      return 'InvalidDate';
    case 'company':
      return 'MissingCompany';
    case 'strike':
      return 'MissingStrike';
    case 'optionType':
      return 'MissingOptionType';
    case 'time':
      return 'InvalidTimestamp';
    default:
      return null;
  }
}

function describeReasons(
  reasons: readonly RejectionReason[],
  rejectedTimestamps: readonly string[],
): string {
  const parts = reasons.map((reason) => {
    switch (reason) {
      case 'MissingCompany':
        return 'company';
      case 'MissingStrike':
        return 'strike';
      case 'MissingOptionType':
        return 'option type';
      case 'MissingTimestamp':
        return 'time (not found)';
      case 'InvalidTimestamp': {
        const readings = Array.from(new Set(rejectedTimestamps));
        return readings.length > 0
          ? `time (invalid value: ${readings.map((r) => `'${r}'`).join(', ')})`
          : 'time (invalid value)';
      }
      case 'InvalidDate':
        return 'date';
    }
  });
  return `Could not find valid ${parts.join(', ')}`;
}

/**
 * Takes the top-ranked candidate of each kind. Either every field is present
 * and passes `tradeRecordSchema`, or the result lists why not.
 */
export function buildTradeRecord(input: BuildRecordInput): BuildRecordResult {
  const rejectedTimestamps = input.rejectedTimestamps ?? [];
  const company = input.candidates.company[0];
  const strike = input.candidates.strike[0];
  const optionType = input.candidates.optionType[0];
  const timestamp = input.candidates.timestamp[0];

  const reasons: RejectionReason[] = [];
  if (!company) reasons.push('MissingCompany');
  if (!strike) reasons.push('MissingStrike');
  if (!optionType) reasons.push('MissingOptionType');
  if (!timestamp) {
    reasons.push(
      rejectedTimestamps.length > 0 ? 'InvalidTimestamp' : 'MissingTimestamp',
    );
  }

  if (!company || !strike || !optionType || !timestamp) {
    return {
      ok: false,
      reasons,
      detail: describeReasons(reasons, rejectedTimestamps),
    };
  }

  const parsed = tradeRecordSchema.safeParse({
    date: input.date,
    company: company.value,
    strike: strike.value,
    optionType: optionType.value,
    time: timestamp.value,
  });
  if (!parsed.success) {
    const failed = new Set<RejectionReason>();
    for (const issue of parsed.error.issues) {
      const reason = reasonForField(issue.path[0]);
      if (reason) failed.add(reason);
    }
    const list: RejectionReason[] =
      failed.size > 0 ? Array.from(failed) : ['InvalidTimestamp'];
    return {
      ok: false,
      reasons: list,
      detail: describeReasons(list, [timestamp.value]),
    };
  }

  return { ok: true, record: parsed.data };
}
