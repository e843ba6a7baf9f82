import { CostEffect, ExcludedLeg, Leg, OptionRight } from '../core/types';
import { parseOptionSymbol } from '../options/occSymbol';

// An option leg whose identifier parsed; the source leg is referenced, not copied.
export interface ChainLeg {
  id: string;
  leg: Leg;
  underlying: string;
  expiration: string;
  right: OptionRight;
  strike: number;
  quantity: number;
  createdAtMs?: number;
  costEffect?: CostEffect;
}

export type ChainLegResult = { ok: true; value: ChainLeg } | { ok: false; excluded: ExcludedLeg };

const exclude = (leg: Leg, reason: string): ChainLegResult => ({
  ok: false,
  excluded: { legId: leg.id, symbol: leg.symbol, reason }
});

export const toChainLeg = (leg: Leg): ChainLegResult => {
  const parsed = parseOptionSymbol(leg.symbol);
  if (!parsed) return exclude(leg, 'unparseable option identifier');
  if (leg.quantity === 0) return exclude(leg, 'zero quantity');
  const createdAtMs = leg.createdAt ? Date.parse(leg.createdAt) : NaN;
  return {
    ok: true,
    value: {
      id: leg.id,
      leg,
      underlying: leg.underlying,
      expiration: parsed.expiration,
      right: parsed.right,
      strike: parsed.strike,
      quantity: leg.quantity,
      createdAtMs: Number.isNaN(createdAtMs) ? undefined : createdAtMs,
      costEffect: leg.costEffect
    }
  };
};
