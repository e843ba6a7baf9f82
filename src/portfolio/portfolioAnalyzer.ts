import {
  AllocationTable,
  AnalyzedPortfolio,
  Chain,
  DirectionalBias,
  Leg,
  PortfolioPosition,
  PositionSnapshot,
  PositionStrategy,
  SectorTable
} from '../core/types';
import { daysToExpiration, parseAsOf } from '../core/time';
import { round2, sum } from '../core/utils';
import { detectChains } from '../chains/chainDetector';
import { parseOptionSymbol } from '../options/occSymbol';
import { lookupSector } from './sectors';
import { POSITION_BIAS } from './strategyBias';

export interface AnalyzeOptions {
  sectors: SectorTable;
  asOf?: Date;
  timeWindowSeconds?: number;
}

export type DurationBucket = '0_dte' | '7_dte' | '14_dte' | '45_dte' | 'non_expiring';

export const durationBucket = (dte: number | null): DurationBucket => {
  if (dte === null) return 'non_expiring';
  if (dte <= 0) return '0_dte';
  if (dte <= 7) return '7_dte';
  if (dte <= 14) return '14_dte';
  return '45_dte';
};

const DURATION_BUCKETS: DurationBucket[] = ['0_dte', '7_dte', '14_dte', '45_dte', 'non_expiring'];
const BIASES: DirectionalBias[] = ['bullish', 'neutral', 'bearish'];

const toPosition = (leg: Leg, strategyType: PositionStrategy, sectors: SectorTable, asOf: Date, chain?: Chain) => {
  const info = lookupSector(sectors, leg.underlying);
  const expiration = leg.instrument === 'option' ? parseOptionSymbol(leg.symbol)?.expiration : undefined;
  const position: PortfolioPosition = {
    legId: leg.id,
    symbol: leg.symbol,
    underlying: leg.underlying,
    instrument: leg.instrument,
    strategyType,
    quantity: leg.quantity,
    marketValue: Math.abs(leg.netLiq),
    delta: leg.delta,
    dte: expiration ? Math.max(0, daysToExpiration(expiration, asOf)) : null,
    assetClass: info.assetClass,
    bias: POSITION_BIAS[strategyType],
    sector: info.sector
  };
  if (chain) position.chainId = chain.id;
  if (leg.unrealizedPnl !== undefined) position.unrealizedPnl = leg.unrealizedPnl;
  return position;
};

const shareOf = (positions: PortfolioPosition[], total: number, predicate: (p: PortfolioPosition) => boolean) =>
  total > 0 ? round2((sum(positions.filter(predicate).map((p) => p.marketValue)) / total) * 100) : 0;

export const computeSectorAllocation = (positions: PortfolioPosition[], total: number): Record<string, number> => {
  const sectors = Array.from(new Set(positions.map((p) => p.sector))).sort();
  return Object.fromEntries(sectors.map((sector) => [sector, shareOf(positions, total, (p) => p.sector === sector)]));
};

export const computeAllocations = (positions: PortfolioPosition[], total: number): AllocationTable => {
  const sectorShares = Object.values(computeSectorAllocation(positions, total));
  return {
    asset: {
      equities: shareOf(positions, total, (p) => p.assetClass === 'equity'),
      non_equities: shareOf(positions, total, (p) => p.assetClass === 'non_equity'),
      max_sector: sectorShares.length ? Math.max(...sectorShares) : 0
    },
    duration: Object.fromEntries(
      DURATION_BUCKETS.map((bucket) => [bucket, shareOf(positions, total, (p) => durationBucket(p.dte) === bucket)])
    ),
    strategy: Object.fromEntries(BIASES.map((bias) => [bias, shareOf(positions, total, (p) => p.bias === bias)]))
  };
};

/**
 * Classify every leg of a snapshot and compute allocation percentages by market value.
 * Option legs take their strategy from the chain they were grouped into; legs the chain
 * detector excluded are listed on the result and left out of every total.
 */
export const analyzePortfolio = (snapshot: PositionSnapshot, options: AnalyzeOptions): AnalyzedPortfolio => {
  const asOf = options.asOf ?? parseAsOf(snapshot.asOf);
  const detection = detectChains(snapshot.legs, { asOf, timeWindowSeconds: options.timeWindowSeconds });
  const chainByLeg = new Map<string, Chain>();
  detection.chains.forEach((chain) => chain.legIds.forEach((id) => chainByLeg.set(id, chain)));

  const positions: PortfolioPosition[] = [];
  for (const leg of snapshot.legs) {
    if (leg.instrument === 'equity') {
      positions.push(toPosition(leg, leg.quantity < 0 ? 'short_stock' : 'long_stock', options.sectors, asOf));
      continue;
    }
    const chain = chainByLeg.get(leg.id);
    if (chain) positions.push(toPosition(leg, chain.type, options.sectors, asOf, chain));
  }

  const totalMarketValue = round2(sum(positions.map((p) => p.marketValue)));
  return {
    asOf: asOf.toISOString(),
    totalMarketValue,
    buyingPower: snapshot.balances.buyingPower,
    cashBalance: snapshot.balances.cashBalance,
    positions,
    chains: detection.chains,
    excluded: detection.excluded,
    allocations: computeAllocations(positions, totalMarketValue),
    sectorAllocation: computeSectorAllocation(positions, totalMarketValue)
  };
};

export interface PortfolioSummary {
  totalPositions: number;
  optionPositions: number;
  equityPositions: number;
  chainCount: number;
  excludedCount: number;
  totalMarketValue: number;
  totalDelta: number;
  sectors: string[];
}

export const summarizePortfolio = (portfolio: AnalyzedPortfolio): PortfolioSummary => ({
  totalPositions: portfolio.positions.length,
  optionPositions: portfolio.positions.filter((p) => p.instrument === 'option').length,
  equityPositions: portfolio.positions.filter((p) => p.instrument === 'equity').length,
  chainCount: portfolio.chains.length,
  excludedCount: portfolio.excluded.length,
  totalMarketValue: portfolio.totalMarketValue,
  totalDelta: round2(sum(portfolio.positions.map((p) => p.delta))),
  sectors: Object.keys(portfolio.sectorAllocation)
});
