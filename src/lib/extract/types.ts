import { z } from 'zod';

export const optionTypeSchema = z.enum(['CE', 'PE']);

export type OptionType = z.infer<typeof optionTypeSchema>;

export const tradeRecordSchema = z.object({
  date: z.string().min(1),
  company: z.string().min(1),
  strike: z.number().int().positive(),
  optionType: optionTypeSchema,
  time: z
    .string()
    .regex(/^\d{2}:\d{2}$/, 'Expected HH:mm')
    .refine((value) => {
      const [h, m] = value.split(':').map((part) => Number(part));
      return h >= 0 && h <= 23 && m >= 0 && m <= 59;
    }, 'Invalid time'),
});

export type TradeRecord = z.infer<typeof tradeRecordSchema>;

export const rejectionReasonSchema = z.enum([
  'MissingCompany',
  'MissingStrike',
  'MissingOptionType',
  'MissingTimestamp',
  'InvalidTimestamp',
  'InvalidDate',
]);

export type RejectionReason = z.infer<typeof rejectionReasonSchema>;

export type FieldKind = 'company' | 'strike' | 'optionType' | 'timestamp';

export type FieldCandidate<K extends FieldKind, V> = {
  kind: K;
  value: V;
  sourceConfidence: number;
  strategy: string;
  fragmentIndex: number;
};

export type CompanyCandidate = FieldCandidate<'company', string>;
export type StrikeCandidate = FieldCandidate<'strike', number>;
export type OptionTypeCandidate = FieldCandidate<'optionType', OptionType>;
export type TimestampFieldCandidate = FieldCandidate<'timestamp', string>;

// Each list is ranked best-first.
export type CandidateSet = {
  company: CompanyCandidate[];
  strike: StrikeCandidate[];
  optionType: OptionTypeCandidate[];
  timestamp: TimestampFieldCandidate[];
};

export type ClassifiedCandidates = Omit<CandidateSet, 'timestamp'>;
