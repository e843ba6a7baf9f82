import { Chain, ChainMetrics, ChainType, OptionRight, SingleChainType, SpreadChainType } from '../core/types';
import { daysToExpiration, formatShortDate } from '../core/time';
import { round2, sum } from '../core/utils';
import { ChainLeg } from './chainLeg';
import { LegClaims } from './legClaims';

export interface MatchContext {
  underlying: string;
  window: ChainLeg[];
  claims: LegClaims;
  // Chains emitted earlier in this window, still standing.
  emitted: Chain[];
  asOf: Date;
  detectedAt: string;
}

export interface MatchOutcome {
  chains: Chain[];
  supersedes: Chain[];
}

export interface ChainMatcher {
  name: string;
  match: (ctx: MatchContext) => MatchOutcome;
}

const groupBy = <T>(items: T[], key: (item: T) => string): Map<string, T[]> => {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    const bucket = groups.get(k);
    if (bucket) bucket.push(item);
    else groups.set(k, [item]);
  }
  return groups;
};

const byStrike = (a: ChainLeg, b: ChainLeg) => a.strike - b.strike;

const timeSpreadSeconds = (legs: ChainLeg[]): number | undefined => {
  const stamps = legs.map((l) => l.createdAtMs);
  if (stamps.some((s) => s === undefined)) return undefined;
  const values = stamps.filter((s): s is number => s !== undefined);
  return (Math.max(...values) - Math.min(...values)) / 1000;
};

const baseMetrics = (legs: ChainLeg[], expiration: string, asOf: Date): ChainMetrics => {
  const metrics: ChainMetrics = {
    daysToExpiration: daysToExpiration(expiration, asOf),
    netPremium: round2(sum(legs.map((l) => l.leg.netLiq))),
    netDelta: round2(sum(legs.map((l) => l.leg.delta))),
    quantity: Math.abs(legs[0].quantity),
    expiration
  };
  const spread = legs.length > 1 ? timeSpreadSeconds(legs) : undefined;
  if (spread !== undefined) metrics.createdTimeDiffSeconds = spread;
  return metrics;
};

const chainId = (underlying: string, type: ChainType, parts: Array<string | number>) =>
  [underlying, type.toUpperCase(), ...parts].join('_');

const label = (type: ChainType) => type.replace(/_/g, ' ');

const makeChain = (
  ctx: Pick<MatchContext, 'underlying' | 'detectedAt'>,
  type: ChainType,
  legs: ChainLeg[],
  metrics: ChainMetrics,
  idParts: Array<string | number>,
  description: string
): Chain => ({
  id: chainId(ctx.underlying, type, idParts),
  type,
  underlying: ctx.underlying,
  description,
  legIds: legs.map((l) => l.id),
  metrics,
  detectedAt: ctx.detectedAt
});

export const classifyVertical = (long: ChainLeg, short: ChainLeg): SpreadChainType => {
  if (long.right === 'call') {
    return long.strike < short.strike ? 'call_debit_spread' : 'call_credit_spread';
  }
  return long.strike > short.strike ? 'put_debit_spread' : 'put_credit_spread';
};

// Equal magnitude with opposite signs; tagged credit/debit pairs reduce to the same test.
const isVerticalPair = (a: ChainLeg, b: ChainLeg) => a.strike !== b.strike && a.quantity === -b.quantity;

export const verticalMatcher: ChainMatcher = {
  name: 'vertical',
  match: (ctx) => {
    const chains: Chain[] = [];
    const groups = groupBy(ctx.claims.unclaimed(ctx.window), (l) => `${l.expiration}|${l.right}`);
    for (const group of groups.values()) {
      const sorted = [...group].sort(byStrike);
      for (let i = 0; i < sorted.length; i += 1) {
        const a = sorted[i];
        if (ctx.claims.isClaimed(a.id)) continue;
        for (let j = i + 1; j < sorted.length; j += 1) {
          const b = sorted[j];
          if (ctx.claims.isClaimed(b.id) || !isVerticalPair(a, b)) continue;
          const [long, short] = a.quantity > 0 ? [a, b] : [b, a];
          const type = classifyVertical(long, short);
          const width = round2(b.strike - a.strike);
          const metrics = baseMetrics([a, b], a.expiration, ctx.asOf);
          const fullWidth = round2(width * 100 * metrics.quantity);
          const premium = Math.abs(metrics.netPremium);
          metrics.width = width;
          if (type === 'call_credit_spread' || type === 'put_credit_spread') {
            metrics.maxProfit = premium;
            metrics.maxLoss = round2(fullWidth - premium);
          } else {
            metrics.maxLoss = premium;
            metrics.maxProfit = round2(fullWidth - premium);
          }
          ctx.claims.claim(a.id, b.id);
          chains.push(
            makeChain(
              ctx,
              type,
              [a, b],
              metrics,
              [a.expiration, a.strike, b.strike],
              `${ctx.underlying} ${formatShortDate(a.expiration)} ${a.strike}/${b.strike} ${label(type)}`
            )
          );
          break;
        }
      }
    }
    return { chains, supersedes: [] };
  }
};

const CALENDAR_TYPES: Record<OptionRight, ChainType> = { call: 'call_calendar', put: 'put_calendar' };

export const calendarMatcher: ChainMatcher = {
  name: 'calendar',
  match: (ctx) => {
    const chains: Chain[] = [];
    const groups = groupBy(ctx.claims.unclaimed(ctx.window), (l) => `${l.strike}|${l.right}`);
    for (const group of groups.values()) {
      const sorted = [...group].sort((a, b) => a.expiration.localeCompare(b.expiration));
      for (let i = 0; i < sorted.length; i += 1) {
        const near = sorted[i];
        if (ctx.claims.isClaimed(near.id)) continue;
        const far = sorted
          .slice(i + 1)
          .find(
            (l) => !ctx.claims.isClaimed(l.id) && l.expiration !== near.expiration && l.quantity * near.quantity < 0
          );
        if (!far) continue;
        const type = CALENDAR_TYPES[near.right];
        const metrics = baseMetrics([near, far], near.expiration, ctx.asOf);
        metrics.strike = near.strike;
        metrics.nearExpiration = near.expiration;
        metrics.farExpiration = far.expiration;
        metrics.nearDte = metrics.daysToExpiration;
        metrics.farDte = daysToExpiration(far.expiration, ctx.asOf);
        ctx.claims.claim(near.id, far.id);
        chains.push(
          makeChain(
            ctx,
            type,
            [near, far],
            metrics,
            [near.strike, near.expiration, far.expiration],
            `${ctx.underlying} ${near.strike} ${near.right} calendar ${formatShortDate(near.expiration)}/${formatShortDate(far.expiration)}`
          )
        );
      }
    }
    return { chains, supersedes: [] };
  }
};

export const ironCondorMatcher: ChainMatcher = {
  name: 'iron_condor',
  match: (ctx) => {
    const chains: Chain[] = [];
    const supersedes: Chain[] = [];
    const legsById = new Map(ctx.window.map((l) => [l.id, l]));
    const legsOf = (chain: Chain) =>
      chain.legIds.map((id) => legsById.get(id)).filter((l): l is ChainLeg => l !== undefined);
    const expirationOf = (chain: Chain) => chain.metrics.expiration ?? '';
    const callSpreads = groupBy(
      ctx.emitted.filter((c) => c.type === 'call_credit_spread'),
      expirationOf
    );
    const putSpreads = groupBy(
      ctx.emitted.filter((c) => c.type === 'put_credit_spread'),
      expirationOf
    );
    for (const [expiration, calls] of callSpreads) {
      const puts = putSpreads.get(expiration) ?? [];
      const pairs = Math.min(calls.length, puts.length);
      for (let i = 0; i < pairs; i += 1) {
        const call = calls[i];
        const put = puts[i];
        const putLegs = legsOf(put);
        const callLegs = legsOf(call);
        const legs = [...putLegs, ...callLegs];
        if (legs.length !== 4) continue;
        const strikes = legs.map((l) => l.strike);
        const metrics = baseMetrics(legs, expiration, ctx.asOf);
        metrics.totalCredit = round2(Math.abs(put.metrics.netPremium) + Math.abs(call.metrics.netPremium));
        metrics.maxProfit = round2((put.metrics.maxProfit ?? 0) + (call.metrics.maxProfit ?? 0));
        metrics.maxLoss = Math.max(put.metrics.maxLoss ?? 0, call.metrics.maxLoss ?? 0);
        metrics.width = Math.max(put.metrics.width ?? 0, call.metrics.width ?? 0);
        ctx.claims.claim(...legs.map((l) => l.id));
        supersedes.push(call, put);
        chains.push(
          makeChain(
            ctx,
            'iron_condor',
            legs,
            metrics,
            [expiration, ...strikes],
            `${ctx.underlying} ${formatShortDate(expiration)} ${strikes.join('/')} iron condor`
          )
        );
      }
    }
    return { chains, supersedes };
  }
};

const pairCallPut = (
  ctx: MatchContext,
  groupKey: (l: ChainLeg) => string,
  qualifies: (call: ChainLeg, put: ChainLeg) => boolean,
  build: (call: ChainLeg, put: ChainLeg) => Chain
): Chain[] => {
  const chains: Chain[] = [];
  const groups = groupBy(ctx.claims.unclaimed(ctx.window), groupKey);
  for (const group of groups.values()) {
    const calls = group.filter((l) => l.right === 'call').sort(byStrike);
    const puts = group.filter((l) => l.right === 'put').sort(byStrike);
    for (const call of calls) {
      const put = puts.find((p) => !ctx.claims.isClaimed(p.id) && p.quantity === call.quantity && qualifies(call, p));
      if (!put) continue;
      ctx.claims.claim(call.id, put.id);
      chains.push(build(call, put));
    }
  }
  return chains;
};

export const straddleMatcher: ChainMatcher = {
  name: 'straddle',
  match: (ctx) => ({
    supersedes: [],
    chains: pairCallPut(
      ctx,
      (l) => `${l.expiration}|${l.strike}`,
      () => true,
      (call, put) => {
        const type: ChainType = call.quantity > 0 ? 'long_straddle' : 'short_straddle';
        const metrics = baseMetrics([call, put], call.expiration, ctx.asOf);
        metrics.strike = call.strike;
        return makeChain(
          ctx,
          type,
          [call, put],
          metrics,
          [call.expiration, call.strike],
          `${ctx.underlying} ${formatShortDate(call.expiration)} ${call.strike} ${label(type)}`
        );
      }
    )
  })
};

export const strangleMatcher: ChainMatcher = {
  name: 'strangle',
  match: (ctx) => ({
    supersedes: [],
    chains: pairCallPut(
      ctx,
      (l) => l.expiration,
      (call, put) => call.strike !== put.strike,
      (call, put) => {
        const type: ChainType = call.quantity > 0 ? 'long_strangle' : 'short_strangle';
        const metrics = baseMetrics([put, call], call.expiration, ctx.asOf);
        metrics.putStrike = put.strike;
        metrics.callStrike = call.strike;
        return makeChain(
          ctx,
          type,
          [put, call],
          metrics,
          [call.expiration, put.strike, call.strike],
          `${ctx.underlying} ${formatShortDate(call.expiration)} ${put.strike}/${call.strike} ${label(type)}`
        );
      }
    )
  })
};

// Order matters: the condor consumes verticals emitted just before it.
export const MATCHERS: readonly ChainMatcher[] = [
  verticalMatcher,
  calendarMatcher,
  ironCondorMatcher,
  straddleMatcher,
  strangleMatcher
];

const SINGLE_TYPES: Record<OptionRight, { long: SingleChainType; short: SingleChainType }> = {
  call: { long: 'long_call', short: 'short_call' },
  put: { long: 'long_put', short: 'short_put' }
};

export const singleLegChain = (leg: ChainLeg, ctx: Pick<MatchContext, 'underlying' | 'detectedAt' | 'asOf'>): Chain => {
  const type = leg.quantity > 0 ? SINGLE_TYPES[leg.right].long : SINGLE_TYPES[leg.right].short;
  const metrics = baseMetrics([leg], leg.expiration, ctx.asOf);
  metrics.strike = leg.strike;
  return makeChain(
    ctx,
    type,
    [leg],
    metrics,
    [leg.expiration, leg.strike],
    `${ctx.underlying} ${formatShortDate(leg.expiration)} ${leg.strike} ${label(type)}`
  );
};
