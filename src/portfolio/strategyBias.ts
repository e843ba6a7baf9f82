import { DirectionalBias, PositionStrategy } from '../core/types';

export const POSITION_BIAS: Record<PositionStrategy, DirectionalBias> = {
  put_credit_spread: 'bullish',
  call_debit_spread: 'bullish',
  long_call: 'bullish',
  short_put: 'bullish',
  long_stock: 'bullish',
  call_credit_spread: 'bearish',
  put_debit_spread: 'bearish',
  long_put: 'bearish',
  short_call: 'bearish',
  short_stock: 'bearish',
  iron_condor: 'neutral',
  short_strangle: 'neutral',
  long_strangle: 'neutral',
  long_straddle: 'neutral',
  short_straddle: 'neutral',
  call_calendar: 'neutral',
  put_calendar: 'neutral'
};

// Strategies that are only ever proposed, never detected.
const PROPOSED_BIAS: Record<string, DirectionalBias> = {
  cash_secured_put: 'bullish',
  iron_butterfly: 'neutral',
  covered_call: 'neutral'
};

const isPositionStrategy = (name: string): name is PositionStrategy => Object.hasOwn(POSITION_BIAS, name);

export const biasOfStrategy = (name: string): DirectionalBias => {
  if (isPositionStrategy(name)) return POSITION_BIAS[name];
  return Object.hasOwn(PROPOSED_BIAS, name) ? PROPOSED_BIAS[name] : 'neutral';
};
