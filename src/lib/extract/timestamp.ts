import { stripEdgePunctuation } from '@/lib/extract/correct';
import type { CorrectedFragment, RawFragment } from '@/lib/ocr/types';

export type TimestampStrategyName =
  | 'direct-separator'
  | 'corrected-separator'
  | 'split-adjacency';

export type TimestampCandidate = {
  time: string;
  hour: number;
  minute: number;
  // As read, before padding; used to report rejected readings.
  reading: string;
  confidence: number;
  left: number;
  fragmentIndex: number;
  strategy: TimestampStrategyName;
};

export type TimestampSettings = {
  tradingStart: string;
  tradingEnd: string;
  adjacencyTolerance: number;
};

export type TimestampView = {
  raw: readonly RawFragment[];
  corrected: readonly CorrectedFragment[];
};

export type TimestampStrategy = {
  name: TimestampStrategyName;
  extract(view: TimestampView, settings: TimestampSettings): TimestampCandidate[];
};

export type ResolvedTimestamp = {
  time: string;
  confidence: number;
  strategy: TimestampStrategyName;
  fragmentIndex: number;
};

export type TimestampResolution = {
  best: ResolvedTimestamp | null;
  rejected: TimestampCandidate[];
};

// OCR reads the colon as ';' or '.' often enough that all three count.
// Dotted dates (12.03.2024) and percentages (+10.25%) are not times; a
// trailing ':SS' is allowed.
const separatorTimeRegex =
  /(?<!\d)(?<!\d[:;.])(\d{1,2})[:;.](\d{2})(?![\d%])(?![:;.]\d{3,})(?!\.\d)/g;
const hourTokenRegex = /^\d{1,2}$/;
const minuteTokenRegex = /^\d{2}$/;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatClock(hour: number, minute: number): string {
  return `${pad2(hour)}:${pad2(minute)}`;
}

function clockToMinutes(value: string): number {
  const [h, m] = value.split(':').map((part) => Number(part));
  return h * 60 + m;
}

export function isWithinTradingWindow(
  candidate: Pick<TimestampCandidate, 'hour' | 'minute'>,
  settings: Pick<TimestampSettings, 'tradingStart' | 'tradingEnd'>,
): boolean {
  const { hour, minute } = candidate;
  if (!Number.isInteger(hour) || !Number.isInteger(minute)) return false;
  if (hour < 0 || hour > 23 || minute < 0 || minute > 59) return false;
  const total = hour * 60 + minute;
  return (
    total >= clockToMinutes(settings.tradingStart) &&
    total <= clockToMinutes(settings.tradingEnd)
  );
}

function separatorMatches(
  fragments: readonly RawFragment[],
  strategy: TimestampStrategyName,
): TimestampCandidate[] {
  const candidates: TimestampCandidate[] = [];
  fragments.forEach((fragment, fragmentIndex) => {
    for (const match of fragment.text.matchAll(separatorTimeRegex)) {
      const hour = Number(match[1]);
      const minute = Number(match[2]);
      // Place the match inside the fragment box so leftmost ordering holds
      // for fragments carrying several times.
      const offset =
        fragment.text.length > 0 ? (match.index ?? 0) / fragment.text.length : 0;
      candidates.push({
        time: formatClock(hour, minute),
        hour,
        minute,
        reading: match[0],
        confidence: fragment.confidence,
        left: fragment.region.left + offset * fragment.region.width,
        fragmentIndex,
        strategy,
      });
    }
  });
  return candidates;
}

export const directSeparatorStrategy: TimestampStrategy = {
  name: 'direct-separator',
  extract: (view) => separatorMatches(view.raw, 'direct-separator'),
};

export const correctedSeparatorStrategy: TimestampStrategy = {
  name: 'corrected-separator',
  extract: (view) => separatorMatches(view.corrected, 'corrected-separator'),
};

function verticalCenter(fragment: RawFragment): number {
  return fragment.region.top + fragment.region.height / 2;
}

export const splitAdjacencyStrategy: TimestampStrategy = {
  name: 'split-adjacency',
  extract: (view, settings) => {
    const candidates: TimestampCandidate[] = [];
    const fragments = view.corrected;

    fragments.forEach((first, firstIndex) => {
      const hourText = stripEdgePunctuation(first.text.trim());
      if (!hourTokenRegex.test(hourText)) return;

      fragments.forEach((second, secondIndex) => {
        if (secondIndex === firstIndex || second.source !== first.source) return;
        const minuteText = stripEdgePunctuation(second.text.trim());
        if (!minuteTokenRegex.test(minuteText)) return;

        const sameLine =
          Math.abs(verticalCenter(first) - verticalCenter(second)) <=
          Math.max(first.region.height, second.region.height) / 2;
        if (!sameLine) return;

        const gap = second.region.left - (first.region.left + first.region.width);
        if (second.region.left <= first.region.left) return;
        if (gap < -first.region.width / 2 || gap > settings.adjacencyTolerance) {
          return;
        }

        const hour = Number(hourText);
        const minute = Number(minuteText);
        candidates.push({
          time: formatClock(hour, minute),
          hour,
          minute,
          reading: `${hourText} ${minuteText}`,
          confidence: Math.min(first.confidence, second.confidence),
          left: first.region.left,
          fragmentIndex: firstIndex,
          strategy: 'split-adjacency',
        });
      });
    });

    return candidates;
  },
};

// Strictest pattern first, fuzziest synthesis last.
export const timestampStrategies: readonly TimestampStrategy[] = [
  directSeparatorStrategy,
  correctedSeparatorStrategy,
  splitAdjacencyStrategy,
];

/**
 * Highest confidence wins; ties go to the leftmost reading, since the chart
 * header time sits left of the axis labels repeated across the width.
 */
export function pickBestTimestamp(
  candidates: readonly TimestampCandidate[],
): TimestampCandidate | null {
  const sorted = [...candidates].sort(
    (a, b) =>
      b.confidence - a.confidence ||
      a.left - b.left ||
      a.fragmentIndex - b.fragmentIndex,
  );
  return sorted[0] ?? null;
}

/**
 * Runs the strategies in order and stops at the first one that produces a
 * reading inside the trading window. Candidates are never merged across
 * strategies.
 */
export function resolveTimestamp(
  fragments: readonly RawFragment[],
  corrected: readonly CorrectedFragment[],
  settings: TimestampSettings,
  strategies: readonly TimestampStrategy[] = timestampStrategies,
): TimestampResolution {
  const view: TimestampView = { raw: fragments, corrected };
  const rejected: TimestampCandidate[] = [];

  for (const strategy of strategies) {
    const valid: TimestampCandidate[] = [];
    for (const candidate of strategy.extract(view, settings)) {
      if (isWithinTradingWindow(candidate, settings)) {
        valid.push(candidate);
      } else {
        rejected.push(candidate);
      }
    }

    const best = pickBestTimestamp(valid);
    if (best) {
      return {
        best: {
          time: best.time,
          confidence: best.confidence,
          strategy: best.strategy,
          fragmentIndex: best.fragmentIndex,
        },
        rejected,
      };
    }
  }

  return { best: null, rejected };
}
