import {
  AllocationAxis,
  AllocationGap,
  AnalyzedPortfolio,
  ComplianceCheck,
  EventSummary,
  PortfolioPosition,
  RebalancerSettings,
  RecommendationPriority,
  SectorRanking,
  TradeRecommendation,
  UniverseCandidate
} from '../core/types';
import { formatISODate } from '../core/time';
import { clamp, round2, sum } from '../core/utils';
import { formatOptionSymbol, parseOptionSymbol } from '../options/occSymbol';
import { durationBucket } from '../portfolio/portfolioAnalyzer';
import {
  DEFAULT_DELTA_TARGET,
  dteTargetForGap,
  normalizeIvRank,
  selectCandidates,
  strategyForGap
} from './candidateSelectors';

export interface RecommendationContext {
  settings: RebalancerSettings;
  now: Date;
  newId: () => string;
}

// Picks which positions to close to shed `excessDollars` of an over-allocated category.
export type ClosingPolicy = (positions: PortfolioPosition[], excessDollars: number) => PortfolioPosition[];

export const largestFirstClosingPolicy: ClosingPolicy = (positions, excessDollars) => {
  const picked: PortfolioPosition[] = [];
  let covered = 0;
  for (const position of [...positions].sort((a, b) => b.marketValue - a.marketValue)) {
    if (covered >= excessDollars) break;
    picked.push(position);
    covered += position.marketValue;
  }
  return picked;
};

const EXPECTED_RETURN_PCT = 0.02;
const MAX_RISK_PCT = 0.1;

const largestSector = (portfolio: AnalyzedPortfolio): string | undefined =>
  Object.entries(portfolio.sectorAllocation).sort(([, a], [, b]) => b - a)[0]?.[0];

export const positionsInCategory = (
  portfolio: AnalyzedPortfolio,
  axis: AllocationAxis,
  category: string
): PortfolioPosition[] => {
  const { positions } = portfolio;
  if (axis === 'duration') return positions.filter((p) => durationBucket(p.dte) === category);
  if (axis === 'strategy') return positions.filter((p) => p.bias === category);
  if (category === 'equities') return positions.filter((p) => p.assetClass === 'equity');
  if (category === 'non_equities') return positions.filter((p) => p.assetClass === 'non_equity');
  if (category === 'max_sector') {
    const sector = largestSector(portfolio);
    return positions.filter((p) => p.sector === sector);
  }
  return [];
};

const impactOf = (axis: AllocationAxis, category: string, pct: number): TradeRecommendation['allocationImpact'] => {
  const impact: TradeRecommendation['allocationImpact'] = {};
  impact[axis] = { [category]: round2(pct) };
  return impact;
};

const baseRecommendation = (ctx: RecommendationContext) => ({
  id: ctx.newId(),
  entryPrice: 0,
  maxPrice: 0,
  dteTarget: 0,
  deltaTarget: 0,
  capitalRequired: 0,
  expectedReturn: 0,
  maxRisk: 0,
  allocationImpact: {},
  createdAt: ctx.now.toISOString()
});

export const generateClosing = (
  portfolio: AnalyzedPortfolio,
  checks: ComplianceCheck[],
  ctx: RecommendationContext,
  policy: ClosingPolicy = largestFirstClosingPolicy
): TradeRecommendation[] => {
  const recommendations: TradeRecommendation[] = [];
  const closed = new Set<string>();
  for (const check of checks) {
    const { rule } = check;
    const excessPct = check.currentPct - rule.maxPct;
    if (excessPct <= rule.tolerancePct) continue;
    const excessDollars = (excessPct / 100) * portfolio.totalMarketValue;
    const candidates = positionsInCategory(portfolio, rule.axis, rule.category).filter((p) => !closed.has(p.legId));
    for (const position of policy(candidates, excessDollars)) {
      closed.add(position.legId);
      const sharePct = portfolio.totalMarketValue > 0 ? (position.marketValue / portfolio.totalMarketValue) * 100 : 0;
      recommendations.push({
        ...baseRecommendation(ctx),
        type: 'close',
        priority: RecommendationPriority.CRITICAL,
        symbol: position.symbol,
        underlying: position.underlying,
        strategy: position.strategyType,
        action: position.quantity > 0 ? 'SELL' : 'BUY',
        quantity: Math.abs(position.quantity),
        confidence: 90,
        rationale: `${rule.axis}/${rule.category} at ${check.currentPct.toFixed(1)}% exceeds max ${rule.maxPct}%`,
        marketContext: `Reduce ${rule.category} exposure by $${round2(excessDollars)}`,
        allocationImpact: impactOf(rule.axis, rule.category, -sharePct)
      });
    }
  }
  return recommendations;
};

export const buildOpenRecommendation = (
  candidate: UniverseCandidate,
  gap: AllocationGap,
  ctx: RecommendationContext
): TradeRecommendation => {
  const { settings } = ctx;
  const last = candidate.lastPrice ?? 0;
  const positionSize = Math.max(
    settings.minPositionSizeDollars,
    Math.min(settings.maxSingleTradeDollars, gap.requiredDollars / 3)
  );
  const strategy = strategyForGap(gap, candidate.ivRank);
  const closedShare = gap.requiredDollars > 0 ? (gap.gapPct * positionSize) / gap.requiredDollars : 0;
  return {
    ...baseRecommendation(ctx),
    type: 'open',
    priority: RecommendationPriority.HIGH,
    symbol: candidate.symbol,
    underlying: candidate.symbol,
    strategy,
    action: 'BTO',
    entryPrice: last,
    maxPrice: round2(last * (1 + settings.slippagePct / 100)),
    quantity: last > 0 ? Math.max(1, Math.floor(positionSize / last)) : 1,
    dteTarget: dteTargetForGap(gap),
    deltaTarget: DEFAULT_DELTA_TARGET,
    capitalRequired: round2(positionSize),
    expectedReturn: round2(positionSize * EXPECTED_RETURN_PCT),
    maxRisk: round2(positionSize * MAX_RISK_PCT),
    confidence: candidate.screeningScore,
    rationale: `${gap.axis}/${gap.category} is ${gap.gapPct}pp under target; ${strategy} on ${candidate.symbol}`,
    marketContext: `IV rank ${round2(normalizeIvRank(candidate.ivRank))}, screening score ${candidate.screeningScore}${
      candidate.sector ? `, sector ${candidate.sector}` : ''
    }`,
    allocationImpact: impactOf(gap.axis, gap.category, closedShare)
  };
};

export const generateOpening = (
  gaps: AllocationGap[],
  universe: UniverseCandidate[],
  sectorRankings: SectorRanking[],
  ctx: RecommendationContext
): TradeRecommendation[] => {
  const { settings } = ctx;
  const recommendations: TradeRecommendation[] = [];
  for (const gap of gaps) {
    if (gap.gapPct < 0) {
      console.log(`${gap.axis}/${gap.category} over target by ${Math.abs(gap.gapPct)}pp; no opening trades.`);
      continue;
    }
    if (gap.requiredDollars <= 0 || gap.requiredDollars < settings.minPositionSizeDollars) continue;
    const idealSize = Math.min(settings.maxSingleTradeDollars, gap.requiredDollars / 2);
    const count = clamp(Math.floor(gap.requiredDollars / idealSize), 1, settings.maxPositionsPerGap);
    const picks = selectCandidates(universe, { gap, sectorRankings }).slice(0, count);
    if (!picks.length) {
      console.warn(`No qualifying candidates for ${gap.axis}/${gap.category} gap of $${gap.requiredDollars}.`);
    }
    picks.forEach((candidate) => recommendations.push(buildOpenRecommendation(candidate, gap, ctx)));
  }
  return recommendations;
};

const addDays = (date: Date, days: number) => new Date(date.getTime() + days * 86400000);

const rollTarget = (position: PortfolioPosition, ctx: RecommendationContext): string | undefined => {
  const parsed = parseOptionSymbol(position.symbol);
  if (!parsed) return undefined;
  return formatOptionSymbol({ ...parsed, expiration: formatISODate(addDays(ctx.now, ctx.settings.rollTargetDte)) });
};

export const generateRolling = (portfolio: AnalyzedPortfolio, ctx: RecommendationContext): TradeRecommendation[] =>
  portfolio.positions
    .filter((p) => p.dte !== null && p.dte <= ctx.settings.rollDteThreshold && p.marketValue > 0)
    .map((position): TradeRecommendation => {
      const target = rollTarget(position, ctx);
      return {
        ...baseRecommendation(ctx),
        type: 'roll',
        priority: RecommendationPriority.MEDIUM,
        symbol: position.symbol,
        underlying: position.underlying,
        strategy: position.strategyType,
        action: 'ROLL',
        quantity: Math.abs(position.quantity),
        dteTarget: ctx.settings.rollTargetDte,
        deltaTarget: position.delta,
        confidence: 75,
        rationale: `Roll expiring position (DTE=${position.dte})`,
        marketContext: target ? `Roll target ${target}` : 'Position management'
      };
    });

export const generateAdjustment = (portfolio: AnalyzedPortfolio, ctx: RecommendationContext): TradeRecommendation[] =>
  portfolio.positions
    .filter(
      (p) =>
        p.marketValue > 0 &&
        p.unrealizedPnl !== undefined &&
        p.unrealizedPnl > p.marketValue * (ctx.settings.profitTakePct / 100)
    )
    .map(
      (position): TradeRecommendation => ({
        ...baseRecommendation(ctx),
        type: 'adjust',
        priority: RecommendationPriority.LOW,
        symbol: position.symbol,
        underlying: position.underlying,
        strategy: position.strategyType,
        action: 'CLOSE',
        quantity: Math.abs(position.quantity),
        expectedReturn: position.unrealizedPnl ?? 0,
        confidence: 85,
        rationale: `Take profit at ${ctx.settings.profitTakePct}% of market value`,
        marketContext: 'Profit management'
      })
    );

/**
 * Drop low-confidence ideas, order by (priority, confidence desc) and accept greedily
 * while the running capital stays within the allocation budget. A recommendation that
 * does not fit is skipped; later, smaller ones may still be accepted.
 */
export const filterAndPrioritize = (
  recommendations: TradeRecommendation[],
  buyingPower: number,
  settings: RebalancerSettings
): TradeRecommendation[] => {
  const budget = Math.max(0, buyingPower) * (settings.maxTotalAllocationPct / 100);
  const ordered = recommendations
    .filter((r) => r.confidence >= settings.minConfidenceThreshold)
    .sort((a, b) => a.priority - b.priority || b.confidence - a.confidence);
  const accepted: TradeRecommendation[] = [];
  let committed = 0;
  for (const rec of ordered) {
    if (committed + rec.capitalRequired > budget) continue;
    committed += rec.capitalRequired;
    accepted.push(rec);
  }
  return accepted;
};

export const summarizeRecommendations = (recommendations: TradeRecommendation[]): EventSummary => ({
  totalCapitalRequired: round2(sum(recommendations.map((r) => r.capitalRequired))),
  totalExpectedReturn: round2(sum(recommendations.map((r) => r.expectedReturn))),
  openingCount: recommendations.filter((r) => r.type === 'open').length,
  closingCount: recommendations.filter((r) => r.type === 'close' || r.type === 'adjust').length
});
