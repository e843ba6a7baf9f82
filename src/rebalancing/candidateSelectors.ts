import { AllocationAxis, AllocationGap, SectorRanking, UniverseCandidate } from '../core/types';

export interface SelectionContext {
  gap: AllocationGap;
  sectorRankings: SectorRanking[];
}

export type CandidateSelector = (candidates: UniverseCandidate[], ctx: SelectionContext) => UniverseCandidate[];

export const DEFAULT_DTE_TARGET = 30;
export const DEFAULT_DELTA_TARGET = 0.16;

// Screeners report IV rank either as a 0-1 fraction or as a 0-100 percentage.
export const normalizeIvRank = (ivRank: number | null): number => {
  if (ivRank === null) return 0;
  return ivRank <= 1 ? ivRank * 100 : ivRank;
};

const NON_EQUITY_SECTORS = new Set(['Energy', 'Commodities', 'Real Estate']);
const NON_EQUITY_SYMBOLS = new Set(['GLD', 'SLV', 'TLT', 'VIX', 'XLE', 'XLF']);

const isNonEquity = (c: UniverseCandidate) =>
  (c.industry ?? '').includes('Index Fund') ||
  NON_EQUITY_SECTORS.has(c.sector ?? '') ||
  NON_EQUITY_SYMBOLS.has(c.symbol.toUpperCase());

// Candidates in better-ranked sectors first; unranked sectors keep their order at the end.
export const steerBySectorRank = (candidates: UniverseCandidate[], rankings: SectorRanking[]): UniverseCandidate[] => {
  if (!rankings.length) return candidates;
  const order = new Map(
    [...rankings].sort((a, b) => b.score - a.score).map((r, idx) => [r.sector, idx] as const)
  );
  const rankOf = (c: UniverseCandidate) => order.get(c.sector ?? '') ?? Number.POSITIVE_INFINITY;
  return [...candidates].sort((a, b) => {
    const diff = rankOf(a) - rankOf(b);
    return Number.isNaN(diff) ? 0 : diff;
  });
};

const selectAsset: CandidateSelector = (candidates, { gap, sectorRankings }) => {
  if (gap.category === 'equities') {
    const eligible = candidates.filter((c) => c.ivRank !== null && normalizeIvRank(c.ivRank) >= 30);
    return steerBySectorRank(eligible, sectorRankings);
  }
  if (gap.category === 'non_equities') {
    return candidates.filter((c) => c.canAddPosition && isNonEquity(c));
  }
  return [];
};

const selectDuration: CandidateSelector = (candidates) =>
  candidates.filter((c) => c.canAddPosition && normalizeIvRank(c.ivRank) >= 60 && (c.lastPrice ?? 0) > 20);

const BIAS_IV_FLOOR: Record<string, number> = { bullish: 40, bearish: 60, neutral: 50 };

const selectStrategy: CandidateSelector = (candidates, { gap }) => {
  if (!Object.hasOwn(BIAS_IV_FLOOR, gap.category)) return [];
  const floor = BIAS_IV_FLOOR[gap.category];
  return candidates.filter((c) => c.canAddPosition && normalizeIvRank(c.ivRank) >= floor && (c.lastPrice ?? 0) > 5);
};

export const SELECTORS: Record<AllocationAxis, CandidateSelector> = {
  asset: selectAsset,
  duration: selectDuration,
  strategy: selectStrategy
};

/**
 * Qualifying candidates for an underweight gap, best first. The universe is ranked by
 * screening score before the axis selector sees it; candidates without a usable price
 * cannot be sized and never qualify.
 */
export const selectCandidates = (universe: UniverseCandidate[], ctx: SelectionContext): UniverseCandidate[] => {
  const ranked = universe
    .filter((c) => c.lastPrice !== null && c.lastPrice > 0)
    .sort((a, b) => b.screeningScore - a.screeningScore);
  return SELECTORS[ctx.gap.axis](ranked, ctx);
};

export const strategyForGap = (gap: AllocationGap, ivRank: number | null): string => {
  const iv = normalizeIvRank(ivRank);
  if (gap.axis === 'strategy') {
    if (gap.category === 'bullish') return iv > 50 ? 'put_credit_spread' : 'call_debit_spread';
    if (gap.category === 'bearish') return iv > 50 ? 'call_credit_spread' : 'put_debit_spread';
    if (gap.category === 'neutral') return iv > 50 ? 'iron_condor' : 'iron_butterfly';
  }
  return iv > 60 ? 'put_credit_spread' : 'iron_condor';
};

const DTE_BY_BUCKET: Record<string, number> = { '0_dte': 0, '7_dte': 7, '14_dte': 14, '45_dte': 45 };

export const dteTargetForGap = (gap: AllocationGap): number =>
  gap.axis === 'duration' && Object.hasOwn(DTE_BY_BUCKET, gap.category) ? DTE_BY_BUCKET[gap.category] : DEFAULT_DTE_TARGET;
