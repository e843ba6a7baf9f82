import { AllocationGap, Leg, OptionRight, RebalancerSettings, UniverseCandidate } from '../src/core/types';
import { formatOptionSymbol } from '../src/options/occSymbol';

export const AS_OF = new Date('2024-11-20T15:00:00Z');
export const OPENED_AT = '2024-11-01T14:30:00Z';

export interface OptionLegInput {
  underlying: string;
  strike: number;
  right: OptionRight;
  quantity: number;
  expiration?: string;
  netLiq?: number;
  delta?: number;
  createdAt?: string | null;
  accountId?: string;
  costEffect?: Leg['costEffect'];
  unrealizedPnl?: number;
}

export const optionLeg = (input: OptionLegInput): Leg => {
  const expiration = input.expiration ?? '2024-12-20';
  const accountId = input.accountId ?? 'acct-1';
  const symbol = formatOptionSymbol({
    underlying: input.underlying,
    expiration,
    right: input.right,
    strike: input.strike
  });
  const leg: Leg = {
    id: `${accountId}:${symbol}`,
    accountId,
    symbol,
    underlying: input.underlying,
    instrument: 'option',
    quantity: input.quantity,
    strike: input.strike,
    expiration,
    right: input.right,
    markPrice: 1,
    netLiq: input.netLiq ?? 100 * input.quantity,
    delta: input.delta ?? 0
  };
  if (input.createdAt !== null) leg.createdAt = input.createdAt ?? OPENED_AT;
  if (input.costEffect) leg.costEffect = input.costEffect;
  if (input.unrealizedPnl !== undefined) leg.unrealizedPnl = input.unrealizedPnl;
  return leg;
};

export const equityLeg = (symbol: string, quantity: number, price: number, overrides: Partial<Leg> = {}): Leg => ({
  id: `acct-1:${symbol}`,
  accountId: 'acct-1',
  symbol,
  underlying: symbol,
  instrument: 'equity',
  quantity,
  markPrice: price,
  netLiq: quantity * price,
  delta: quantity,
  ...overrides
});

export const SETTINGS: RebalancerSettings = {
  maxSingleTradeDollars: 5000,
  maxTotalAllocationPct: 90,
  minConfidenceThreshold: 60,
  maxPositionsPerGap: 5,
  minPositionSizeDollars: 500,
  fillCheckIntervalSeconds: 30,
  rollDteThreshold: 7,
  rollTargetDte: 30,
  profitTakePct: 50,
  slippagePct: 2
};

export const candidate = (symbol: string, overrides: Partial<UniverseCandidate> = {}): UniverseCandidate => ({
  symbol,
  lastPrice: 100,
  ivRank: 50,
  canAddPosition: true,
  screeningScore: 70,
  ...overrides
});

export const gap = (overrides: Partial<AllocationGap> = {}): AllocationGap => ({
  axis: 'asset',
  category: 'equities',
  currentPct: 54,
  targetPct: 60,
  gapPct: 6,
  requiredDollars: 6000,
  priority: 1,
  status: 'violation',
  ...overrides
});

export const sequentialIds = (prefix = 'id') => {
  let n = 0;
  return () => `${prefix}-${++n}`;
};
