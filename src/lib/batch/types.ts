import { z } from 'zod';

import {
  rejectionReasonSchema,
  tradeRecordSchema,
} from '@/lib/extract/types';

export const failureCodeSchema = z.enum([
  'IMAGE_LOAD',
  'OCR_FAILURE',
  'UNEXPECTED',
]);

export type FailureCode = z.infer<typeof failureCodeSchema>;

export const screenshotOutcomeSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('accepted'),
    filePath: z.string().min(1),
    record: tradeRecordSchema,
    timeStrategy: z.string().min(1),
    fragmentCount: z.number().int().min(0),
  }),
  z.object({
    status: z.literal('rejected'),
    filePath: z.string().min(1),
    reasons: z.array(rejectionReasonSchema).min(1),
    detail: z.string(),
    fragmentCount: z.number().int().min(0),
  }),
  z.object({
    status: z.literal('failed'),
    filePath: z.string().min(1),
    errorCode: failureCodeSchema,
    message: z.string(),
  }),
]);

export type ScreenshotOutcome = z.infer<typeof screenshotOutcomeSchema>;

export const filingActionSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('move'),
    from: z.string().min(1),
    to: z.string().min(1),
    replaces: z.boolean(),
  }),
  z.object({
    kind: z.literal('skip-duplicate'),
    from: z.string().min(1),
    to: z.string().min(1),
  }),
  z.object({ kind: z.literal('delete'), from: z.string().min(1) }),
  z.object({ kind: z.literal('keep'), from: z.string().min(1) }),
]);

export type FilingAction = z.infer<typeof filingActionSchema>;

export const batchReportSchema = z.object({
  batchId: z.string().min(1),
  createdAt: z.string().min(1),
  date: z.string().min(1),
  inputDir: z.string().min(1),
  dryRun: z.boolean(),
  totals: z.object({
    accepted: z.number().int().min(0),
    rejected: z.number().int().min(0),
    failed: z.number().int().min(0),
  }),
  outcomes: z.array(screenshotOutcomeSchema),
  filings: z.array(filingActionSchema),
});

export type BatchReport = z.infer<typeof batchReportSchema>;
