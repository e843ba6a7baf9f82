import { Chain, ExcludedLeg, Leg } from '../core/types';
import { ChainLeg, toChainLeg } from './chainLeg';
import { LegClaims } from './legClaims';
import { MATCHERS, singleLegChain } from './matchers';
import { groupByTimeWindows } from './timeWindows';

export const DEFAULT_TIME_WINDOW_SECONDS = 60;

export interface ChainDetectionOptions {
  asOf?: Date;
  timeWindowSeconds?: number;
}

export interface UnderlyingChains {
  underlying: string;
  chains: Chain[];
  totalLegs: number;
}

export interface ChainDetectionResult {
  byUnderlying: UnderlyingChains[];
  chains: Chain[];
  excluded: ExcludedLeg[];
}

interface ScanContext {
  underlying: string;
  asOf: Date;
  detectedAt: string;
  thresholdMs: number;
}

// Suffix repeated ids (same structure held in two accounts) so every chain id stays unique.
const withUniqueIds = (chains: Chain[]): Chain[] => {
  const seen = new Map<string, number>();
  return chains.map((chain) => {
    const count = (seen.get(chain.id) ?? 0) + 1;
    seen.set(chain.id, count);
    return count === 1 ? chain : { ...chain, id: `${chain.id}_${count}` };
  });
};

export const detectUnderlyingChains = (legs: ChainLeg[], scan: ScanContext): Chain[] => {
  const claims = new LegClaims();
  const chains: Chain[] = [];
  for (const window of groupByTimeWindows(legs, scan.thresholdMs)) {
    if (window.length < 2) continue;
    let emitted: Chain[] = [];
    for (const matcher of MATCHERS) {
      const outcome = matcher.match({ ...scan, window, claims, emitted: [...emitted] });
      emitted = emitted.filter((c) => !outcome.supersedes.includes(c)).concat(outcome.chains);
    }
    chains.push(...emitted);
  }
  for (const leg of claims.unclaimed(legs)) {
    claims.claim(leg.id);
    chains.push(singleLegChain(leg, scan));
  }
  return withUniqueIds(chains);
};

/**
 * Group option legs into recognized multi-leg structures, one scan per underlying.
 * Equity legs are ignored; unparseable or zero-quantity option legs are reported in
 * `excluded` and never reach a matcher.
 */
export const detectChains = (legs: Leg[], options: ChainDetectionOptions = {}): ChainDetectionResult => {
  const asOf = options.asOf ?? new Date();
  const thresholdMs = (options.timeWindowSeconds ?? DEFAULT_TIME_WINDOW_SECONDS) * 1000;
  const detectedAt = asOf.toISOString();
  const excluded: ExcludedLeg[] = [];
  const grouped = new Map<string, ChainLeg[]>();

  for (const leg of legs) {
    if (leg.instrument !== 'option') continue;
    const result = toChainLeg(leg);
    if (!result.ok) {
      console.warn(`Skipping ${leg.symbol} (${leg.id}) in chain detection: ${result.excluded.reason}`);
      excluded.push(result.excluded);
      continue;
    }
    const bucket = grouped.get(leg.underlying);
    if (bucket) bucket.push(result.value);
    else grouped.set(leg.underlying, [result.value]);
  }

  const byUnderlying = Array.from(grouped.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([underlying, group]) => ({
      underlying,
      chains: detectUnderlyingChains(group, { underlying, asOf, detectedAt, thresholdMs }),
      totalLegs: group.length
    }));

  return { byUnderlying, chains: byUnderlying.flatMap((g) => g.chains), excluded };
};
