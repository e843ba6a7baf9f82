import { detectChains } from '../src/chains/chainDetector';
import { groupByTimeWindows } from '../src/chains/timeWindows';
import { toChainLeg, ChainLeg } from '../src/chains/chainLeg';
import { Leg } from '../src/core/types';
import { AS_OF, equityLeg, optionLeg } from './fixtures';

const detect = (legs: Leg[]) => detectChains(legs, { asOf: AS_OF, timeWindowSeconds: 60 });

const at = (seconds: number) => new Date(Date.parse('2024-11-01T14:30:00Z') + seconds * 1000).toISOString();

describe('Chain detector', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('classifies a long lower call against a short higher call as a debit spread', () => {
    const long = optionLeg({ underlying: 'AAPL', strike: 100, right: 'call', quantity: 1, netLiq: 500 });
    const short = optionLeg({ underlying: 'AAPL', strike: 105, right: 'call', quantity: -1, netLiq: -300 });
    const { chains } = detect([short, long]);
    expect(chains).toHaveLength(1);
    const [chain] = chains;
    expect(chain.type).toBe('call_debit_spread');
    expect(chain.id).toBe('AAPL_CALL_DEBIT_SPREAD_2024-12-20_100_105');
    expect(chain.description).toBe('AAPL Dec 20 100/105 call debit spread');
    expect(chain.legIds).toEqual([long.id, short.id]);
    expect(chain.metrics.width).toBe(5);
    expect(chain.metrics.netPremium).toBe(200);
    expect(chain.metrics.maxLoss).toBe(200);
    expect(chain.metrics.maxProfit).toBe(300);
    expect(chain.metrics.daysToExpiration).toBe(30);
  });

  it('classifies the reversed call pair as a credit spread', () => {
    const short = optionLeg({ underlying: 'AAPL', strike: 100, right: 'call', quantity: -1, netLiq: -500 });
    const long = optionLeg({ underlying: 'AAPL', strike: 105, right: 'call', quantity: 1, netLiq: 300 });
    const [chain] = detect([short, long]).chains;
    expect(chain.type).toBe('call_credit_spread');
    expect(chain.metrics.netPremium).toBe(-200);
    expect(chain.metrics.maxProfit).toBe(200);
    expect(chain.metrics.maxLoss).toBe(300);
  });

  it('classifies put verticals by which strike is held long', () => {
    const debit = detect([
      optionLeg({ underlying: 'QQQ', strike: 400, right: 'put', quantity: -2 }),
      optionLeg({ underlying: 'QQQ', strike: 410, right: 'put', quantity: 2 })
    ]).chains;
    expect(debit.map((c) => c.type)).toEqual(['put_debit_spread']);
    expect(debit[0].metrics.quantity).toBe(2);

    const credit = detect([
      optionLeg({ underlying: 'QQQ', strike: 400, right: 'put', quantity: 2 }),
      optionLeg({ underlying: 'QQQ', strike: 410, right: 'put', quantity: -2 })
    ]).chains;
    expect(credit.map((c) => c.type)).toEqual(['put_credit_spread']);
  });

  it('collapses a call credit and put credit spread into exactly one iron condor', () => {
    const legs = [
      optionLeg({ underlying: 'SPY', strike: 400, right: 'put', quantity: 1, netLiq: 100 }),
      optionLeg({ underlying: 'SPY', strike: 410, right: 'put', quantity: -1, netLiq: -250 }),
      optionLeg({ underlying: 'SPY', strike: 450, right: 'call', quantity: -1, netLiq: -200 }),
      optionLeg({ underlying: 'SPY', strike: 460, right: 'call', quantity: 1, netLiq: 80 })
    ];
    const { chains } = detect(legs);
    expect(chains).toHaveLength(1);
    const [condor] = chains;
    expect(condor.type).toBe('iron_condor');
    expect(condor.id).toBe('SPY_IRON_CONDOR_2024-12-20_400_410_450_460');
    expect(condor.legIds).toEqual(legs.map((l) => l.id));
    expect(condor.metrics.totalCredit).toBe(270);
    expect(condor.metrics.maxProfit).toBe(270);
    expect(condor.metrics.maxLoss).toBe(880);
  });

  it('detects calendars across expirations at one strike', () => {
    const near = optionLeg({ underlying: 'MSFT', strike: 100, right: 'call', quantity: -1, expiration: '2024-12-20' });
    const far = optionLeg({ underlying: 'MSFT', strike: 100, right: 'call', quantity: 1, expiration: '2025-01-17' });
    const [chain] = detect([far, near]).chains;
    expect(chain.type).toBe('call_calendar');
    expect(chain.legIds).toEqual([near.id, far.id]);
    expect(chain.metrics.nearDte).toBe(30);
    expect(chain.metrics.farDte).toBe(58);
    expect(chain.metrics.nearExpiration).toBe('2024-12-20');
    expect(chain.metrics.farExpiration).toBe('2025-01-17');
  });

  it('detects straddles and strangles from equal signed quantities', () => {
    const straddle = detect([
      optionLeg({ underlying: 'TSLA', strike: 250, right: 'call', quantity: 2 }),
      optionLeg({ underlying: 'TSLA', strike: 250, right: 'put', quantity: 2 })
    ]).chains;
    expect(straddle.map((c) => c.type)).toEqual(['long_straddle']);
    expect(straddle[0].metrics.quantity).toBe(2);

    const put = optionLeg({ underlying: 'TSLA', strike: 220, right: 'put', quantity: -1 });
    const call = optionLeg({ underlying: 'TSLA', strike: 280, right: 'call', quantity: -1 });
    const strangle = detect([call, put]).chains;
    expect(strangle.map((c) => c.type)).toEqual(['short_strangle']);
    expect(strangle[0].legIds).toEqual([put.id, call.id]);
    expect(strangle[0].metrics.putStrike).toBe(220);
    expect(strangle[0].metrics.callStrike).toBe(280);
  });

  it('leaves legs opened far apart as single-leg chains', () => {
    const chains = detect([
      optionLeg({ underlying: 'AAPL', strike: 100, right: 'call', quantity: 1, createdAt: at(0) }),
      optionLeg({ underlying: 'AAPL', strike: 105, right: 'call', quantity: -1, createdAt: at(300) })
    ]).chains;
    expect(chains.map((c) => c.type)).toEqual(['long_call', 'short_call']);
  });

  it('keeps a window open while consecutive gaps stay within the threshold', () => {
    const chains = detect([
      optionLeg({ underlying: 'AAPL', strike: 100, right: 'call', quantity: 1, createdAt: at(0) }),
      optionLeg({ underlying: 'AAPL', strike: 120, right: 'put', quantity: 3, createdAt: at(50) }),
      optionLeg({ underlying: 'AAPL', strike: 105, right: 'call', quantity: -1, createdAt: at(100) })
    ]).chains;
    expect(chains.map((c) => c.type)).toEqual(['call_debit_spread', 'long_put']);
  });

  it('treats legs without a timestamp as singleton windows', () => {
    const chains = detect([
      optionLeg({ underlying: 'AAPL', strike: 100, right: 'call', quantity: 1, createdAt: null }),
      optionLeg({ underlying: 'AAPL', strike: 105, right: 'call', quantity: -1, createdAt: null })
    ]).chains;
    expect(chains.map((c) => c.type)).toEqual(['long_call', 'short_call']);
  });

  it('pairs legs tagged debit and credit with opposite quantities into a vertical', () => {
    const long = optionLeg({ underlying: 'SPY', strike: 400, right: 'put', quantity: 2, costEffect: 'debit' });
    const short = optionLeg({ underlying: 'SPY', strike: 410, right: 'put', quantity: -2, costEffect: 'credit' });
    const chains = detect([short, long]).chains;
    expect(chains.map((c) => c.type)).toEqual(['put_credit_spread']);
    expect(chains[0].legIds).toEqual([long.id, short.id]);
    expect(chains[0].metrics.width).toBe(10);
  });

  it('does not build a zero-width spread from opposite legs at the same strike', () => {
    const long = optionLeg({ underlying: 'AAPL', strike: 100, right: 'call', quantity: 1, costEffect: 'debit' });
    const short = optionLeg({
      underlying: 'AAPL',
      strike: 100,
      right: 'call',
      quantity: -1,
      costEffect: 'credit',
      accountId: 'acct-2'
    });
    const chains = detect([long, short]).chains;
    expect(chains.map((c) => c.type).sort()).toEqual(['long_call', 'short_call']);
    expect(chains.map((c) => c.legIds.length)).toEqual([1, 1]);
  });

  it('ignores equities and reports unparseable or empty option legs', () => {
    const bad: Leg = {
      ...optionLeg({ underlying: 'AAPL', strike: 100, right: 'call', quantity: 1 }),
      symbol: 'AAPL_BAD',
      id: 'acct-1:AAPL_BAD'
    };
    const empty = optionLeg({ underlying: 'AAPL', strike: 110, right: 'call', quantity: 0 });
    const result = detect([equityLeg('AAPL', 10, 190), bad, empty]);
    expect(result.chains).toEqual([]);
    expect(result.byUnderlying).toEqual([]);
    expect(result.excluded).toEqual([
      { legId: 'acct-1:AAPL_BAD', symbol: 'AAPL_BAD', reason: 'unparseable option identifier' },
      { legId: empty.id, symbol: empty.symbol, reason: 'zero quantity' }
    ]);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it('assigns every leg to at most one chain and keeps chain ids unique', () => {
    const legs = [
      optionLeg({ underlying: 'SPY', strike: 400, right: 'put', quantity: 1, accountId: 'acct-1' }),
      optionLeg({ underlying: 'SPY', strike: 410, right: 'put', quantity: -1, accountId: 'acct-1' }),
      optionLeg({ underlying: 'SPY', strike: 400, right: 'put', quantity: 1, accountId: 'acct-2' }),
      optionLeg({ underlying: 'SPY', strike: 410, right: 'put', quantity: -1, accountId: 'acct-2' }),
      optionLeg({ underlying: 'SPY', strike: 450, right: 'call', quantity: -1, accountId: 'acct-1' }),
      optionLeg({ underlying: 'SPY', strike: 460, right: 'call', quantity: 1, accountId: 'acct-1' }),
      optionLeg({ underlying: 'SPY', strike: 430, right: 'call', quantity: 1, expiration: '2025-01-17' }),
      optionLeg({ underlying: 'IWM', strike: 200, right: 'call', quantity: 1, expiration: '2025-01-17' })
    ];
    const result = detect(legs);
    const assigned = result.chains.flatMap((c) => c.legIds);
    expect(new Set(assigned).size).toBe(assigned.length);
    expect([...assigned].sort()).toEqual(legs.map((l) => l.id).sort());
    expect(new Set(result.chains.map((c) => c.id)).size).toBe(result.chains.length);
    expect(result.byUnderlying.map((g) => [g.underlying, g.totalLegs])).toEqual([
      ['IWM', 1],
      ['SPY', 7]
    ]);
    expect(result.chains.map((c) => c.type).sort()).toEqual(
      ['iron_condor', 'long_call', 'long_call', 'put_credit_spread'].sort()
    );
    expect(result.chains.find((c) => c.type === 'put_credit_spread')?.id).toBe(
      'SPY_PUT_CREDIT_SPREAD_2024-12-20_400_410'
    );
  });
});

describe('Time windows', () => {
  const chainLeg = (seconds: number | null, strike: number): ChainLeg => {
    const result = toChainLeg(
      optionLeg({ underlying: 'AAPL', strike, right: 'call', quantity: 1, createdAt: seconds === null ? null : at(seconds) })
    );
    if (!result.ok) throw new Error('fixture leg did not parse');
    return result.value;
  };

  it('splits on gaps above the threshold and isolates untimed legs', () => {
    const windows = groupByTimeWindows(
      [chainLeg(120, 3), chainLeg(0, 1), chainLeg(null, 9), chainLeg(30, 2), chainLeg(170, 4)],
      60000
    );
    expect(windows.map((w) => w.map((l) => l.strike))).toEqual([[1, 2], [3, 4], [9]]);
  });
});
