import { findCompany, type CompanySet } from '@/lib/companies/companySet';
import {
  correctNumericToken,
  correctOptionType,
  correctTextToken,
  tokensOf,
  type OptionTypeReading,
} from '@/lib/extract/correct';
import type {
  ClassifiedCandidates,
  CompanyCandidate,
  OptionTypeCandidate,
  StrikeCandidate,
} from '@/lib/extract/types';
import type { CorrectedFragment, ImageVariant } from '@/lib/ocr/types';

export type ClassifyContext = {
  companies: CompanySet;
  strikeMin: number;
  strikeMax: number;
  companyMatch: 'exact' | 'substring';
  // Read 40000 as 400 when OCR dropped the point of "400.00".
  recoverDroppedDecimal: boolean;
};

type Ranked<C> = { candidate: C; rank: number; order: number };

type TokenSlot = {
  fragmentIndex: number;
  source: ImageVariant;
  confidence: number;
  original: string;
  corrected: string;
};

const strikeTokenRegex = /^(\d{3,6})(?:\.0{1,2})?$/;
const gluedOptionRegex = /^(.+?)([A-Z(\[€]{2})$/;

function byRank<C extends { sourceConfidence: number; fragmentIndex: number }>(
  a: Ranked<C>,
  b: Ranked<C>,
): number {
  return (
    a.rank - b.rank ||
    b.candidate.sourceConfidence - a.candidate.sourceConfidence ||
    a.candidate.fragmentIndex - b.candidate.fragmentIndex ||
    a.order - b.order
  );
}

type StrikeReading = { value: number; recovered: boolean };

function parseStrike(
  token: string,
  context: ClassifyContext,
): StrikeReading | null {
  const match = token.match(strikeTokenRegex);
  if (!match) return null;
  const digits = match[1] ?? '';
  const recovered =
    context.recoverDroppedDecimal &&
    !token.includes('.') &&
    digits.length > 4 &&
    digits.endsWith('00');
  const value = recovered ? Number(digits) / 100 : Number(digits);
  if (!Number.isInteger(value)) return null;
  if (value < context.strikeMin || value > context.strikeMax) return null;
  return { value, recovered };
}

function strikeStrategy(base: string, reading: StrikeReading): string {
  return reading.recovered ? `${base}-recovered` : base;
}

function splitGlued(
  slot: TokenSlot,
  context: ClassifyContext,
): { strike: StrikeReading; option: OptionTypeReading } | null {
  const match = slot.original.toUpperCase().match(gluedOptionRegex);
  if (!match) return null;
  const strike = parseStrike(correctNumericToken(match[1] ?? ''), context);
  const option = correctOptionType(match[2] ?? '');
  if (strike === null || !option) return null;
  return { strike, option };
}

function toSlots(fragments: readonly CorrectedFragment[]): TokenSlot[] {
  const slots: TokenSlot[] = [];
  fragments.forEach((fragment, fragmentIndex) => {
    // Correction never touches whitespace, so both token lists line up.
    const originals = tokensOf(fragment.originalText);
    const corrected = tokensOf(fragment.text);
    originals.forEach((original, i) => {
      slots.push({
        fragmentIndex,
        source: fragment.source,
        confidence: fragment.confidence,
        original,
        corrected: corrected[i] ?? original,
      });
    });
  });
  return slots;
}

function neighbour(
  slots: readonly TokenSlot[],
  index: number,
  offset: 1 | -1,
): TokenSlot | null {
  const slot = slots[index];
  const other = slots[index + offset];
  if (!slot || !other || other.source !== slot.source) return null;
  return other;
}

export function classifyCompanies(
  fragments: readonly CorrectedFragment[],
  context: ClassifyContext,
): CompanyCandidate[] {
  const found: Array<Ranked<CompanyCandidate> & { length: number }> = [];

  fragments.forEach((fragment, fragmentIndex) => {
    const seen = new Set<string>();
    const push = (ticker: string, rank: number, strategy: string) => {
      if (seen.has(ticker)) return;
      seen.add(ticker);
      found.push({
        candidate: {
          kind: 'company',
          value: ticker,
          sourceConfidence: fragment.confidence,
          strategy,
          fragmentIndex,
        },
        rank,
        order: found.length,
        length: ticker.length,
      });
    };

    const tokens = tokensOf(fragment.originalText);
    for (const token of tokens) {
      const exact = findCompany(context.companies, token);
      if (exact) {
        push(exact, 0, 'exact');
        continue;
      }
      const fixed = correctTextToken(token);
      if (fixed === token) continue;
      const corrected = findCompany(context.companies, fixed);
      if (corrected) push(corrected, 1, 'corrected');
    }

    if (context.companyMatch === 'substring') {
      const upper = fragment.originalText.toUpperCase();
      for (const ticker of context.companies.tickers) {
        if (upper.includes(ticker.toUpperCase())) push(ticker, 2, 'substring');
      }
    }
  });

  return found
    .sort(
      (a, b) =>
        a.rank - b.rank ||
        b.length - a.length ||
        a.candidate.fragmentIndex - b.candidate.fragmentIndex ||
        a.order - b.order,
    )
    .map((entry) => entry.candidate);
}

export function classifyStrikesAndOptionTypes(
  fragments: readonly CorrectedFragment[],
  context: ClassifyContext,
): Pick<ClassifiedCandidates, 'strike' | 'optionType'> {
  const slots = toSlots(fragments);
  const strikes: Array<Ranked<StrikeCandidate>> = [];
  const options: Array<Ranked<OptionTypeCandidate>> = [];

  const strikeAt = (slot: TokenSlot | null) =>
    slot ? parseStrike(slot.corrected, context) : null;
  const optionAt = (slot: TokenSlot | null) =>
    slot ? correctOptionType(slot.original) : null;

  slots.forEach((slot, index) => {
    const glued = splitGlued(slot, context);
    if (glued) {
      strikes.push({
        candidate: {
          kind: 'strike',
          value: glued.strike.value,
          sourceConfidence: slot.confidence,
          strategy: strikeStrategy('glued', glued.strike),
          fragmentIndex: slot.fragmentIndex,
        },
        rank: 0,
        order: index,
      });
      options.push({
        candidate: {
          kind: 'optionType',
          value: glued.option.value,
          sourceConfidence: slot.confidence,
          strategy: 'glued',
          fragmentIndex: slot.fragmentIndex,
        },
        rank: 0,
        order: index,
      });
      return;
    }

    const strike = strikeAt(slot);
    if (strike !== null) {
      const paired = optionAt(neighbour(slots, index, 1)) !== null;
      strikes.push({
        candidate: {
          kind: 'strike',
          value: strike.value,
          sourceConfidence: slot.confidence,
          strategy: strikeStrategy(paired ? 'paired' : 'standalone', strike),
          fragmentIndex: slot.fragmentIndex,
        },
        rank: paired ? 0 : 1,
        order: index,
      });
    }

    const option = optionAt(slot);
    if (option) {
      const paired = strikeAt(neighbour(slots, index, -1)) !== null;
      const rank = (paired ? 0 : 2) + (option.corrected ? 1 : 0);
      options.push({
        candidate: {
          kind: 'optionType',
          value: option.value,
          sourceConfidence: slot.confidence,
          strategy: `${paired ? 'paired' : 'standalone'}${option.corrected ? '-corrected' : ''}`,
          fragmentIndex: slot.fragmentIndex,
        },
        rank,
        order: index,
      });
    }
  });

  return {
    strike: strikes.sort(byRank).map((entry) => entry.candidate),
    optionType: options.sort(byRank).map((entry) => entry.candidate),
  };
}

export function classifyFragments(
  fragments: readonly CorrectedFragment[],
  context: ClassifyContext,
): ClassifiedCandidates {
  return {
    company: classifyCompanies(fragments, context),
    ...classifyStrikesAndOptionTypes(fragments, context),
  };
}
