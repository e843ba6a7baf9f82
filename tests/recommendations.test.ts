import { evaluateRules } from '../src/allocation/compliance';
import { AllocationRule, SectorTable, TradeRecommendation } from '../src/core/types';
import { analyzePortfolio } from '../src/portfolio/portfolioAnalyzer';
import {
  buildOpenRecommendation,
  filterAndPrioritize,
  generateAdjustment,
  generateClosing,
  generateOpening,
  generateRolling,
  largestFirstClosingPolicy,
  RecommendationContext,
  summarizeRecommendations
} from '../src/rebalancing/recommendations';
import { AS_OF, SETTINGS, candidate, equityLeg, gap, optionLeg, sequentialIds } from './fixtures';

const sectors: SectorTable = {
  AAPL: { sector: 'Technology', assetClass: 'equity' },
  MSFT: { sector: 'Technology', assetClass: 'equity' },
  TSLA: { sector: 'Consumer Discretionary', assetClass: 'equity' },
  GLD: { sector: 'Commodities', assetClass: 'non_equity' }
};

const equitiesRule: AllocationRule = {
  axis: 'asset',
  category: 'equities',
  targetPct: 60,
  minPct: 55,
  maxPct: 65,
  tolerancePct: 2
};

const context = (): RecommendationContext => ({ settings: SETTINGS, now: AS_OF, newId: sequentialIds('rec') });

const portfolioOf = (legs: Parameters<typeof analyzePortfolio>[0]['legs']) =>
  analyzePortfolio(
    { asOf: AS_OF.toISOString(), legs, balances: { cashBalance: 0, buyingPower: 10000, netLiquidatingValue: 0 } },
    { sectors, asOf: AS_OF }
  );

describe('Opening recommendations', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('sizes a recommendation from the gap and the last price', () => {
    const rec = buildOpenRecommendation(
      candidate('AAPL', { lastPrice: 190, ivRank: 0.45, screeningScore: 80 }),
      gap(),
      context()
    );
    expect(rec).toMatchObject({
      id: 'rec-1',
      type: 'open',
      priority: 2,
      action: 'BTO',
      strategy: 'iron_condor',
      entryPrice: 190,
      maxPrice: 193.8,
      quantity: 10,
      capitalRequired: 2000,
      expectedReturn: 40,
      maxRisk: 200,
      dteTarget: 30,
      deltaTarget: 0.16,
      confidence: 80,
      allocationImpact: { asset: { equities: 2 } }
    });
  });

  it('never sizes below the minimum position or above the single-trade cap', () => {
    const small = buildOpenRecommendation(candidate('F', { lastPrice: 12 }), gap({ requiredDollars: 600 }), context());
    expect(small.capitalRequired).toBe(500);
    expect(small.quantity).toBe(41);
    const large = buildOpenRecommendation(candidate('SPY', { lastPrice: 6000 }), gap({ requiredDollars: 90000 }), context());
    expect(large.capitalRequired).toBe(5000);
    expect(large.quantity).toBe(1);
  });

  it('takes the top candidates per underweight gap and skips small or overweight gaps', () => {
    const universe = [
      candidate('JPM', { screeningScore: 90 }),
      candidate('AAPL', { screeningScore: 80 }),
      candidate('MSFT', { screeningScore: 75 })
    ];
    const recs = generateOpening(
      [gap(), gap({ category: 'non_equities', gapPct: -4, requiredDollars: 4000 }), gap({ requiredDollars: 400 })],
      universe,
      [],
      context()
    );
    expect(recs.map((r) => r.symbol)).toEqual(['JPM', 'AAPL']);
    expect(console.log).toHaveBeenCalledWith('asset/non_equities over target by 4pp; no opening trades.');
  });

  it('caps the number of positions per gap', () => {
    const universe = ['A', 'B', 'C', 'D', 'E', 'G', 'H'].map((s) => candidate(s));
    const recs = generateOpening([gap({ requiredDollars: 40000 })], universe, [], context());
    expect(recs).toHaveLength(5);
  });
});

describe('Closing, rolling and adjustment recommendations', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('closes the largest positions of an over-allocated category first', () => {
    const portfolio = portfolioOf([equityLeg('AAPL', 30, 100), equityLeg('MSFT', 20, 100), equityLeg('GLD', 10, 100)]);
    const checks = evaluateRules([equitiesRule], portfolio.allocations, portfolio.totalMarketValue);
    const recs = generateClosing(portfolio, checks, context());
    expect(recs).toHaveLength(1);
    expect(recs[0]).toMatchObject({
      type: 'close',
      priority: 1,
      symbol: 'AAPL',
      action: 'SELL',
      quantity: 30,
      entryPrice: 0,
      capitalRequired: 0,
      confidence: 90,
      allocationImpact: { asset: { equities: -50 } }
    });
  });

  it('buys back shorts and accepts an overriding closing policy', () => {
    const portfolio = portfolioOf([
      equityLeg('AAPL', 30, 100),
      equityLeg('MSFT', 20, 100),
      equityLeg('GLD', 10, 100),
      equityLeg('TSLA', -5, 100)
    ]);
    const checks = evaluateRules([equitiesRule], portfolio.allocations, portfolio.totalMarketValue);
    const recs = generateClosing(portfolio, checks, context(), (positions) => positions);
    expect(recs.map((r) => [r.symbol, r.action, r.quantity])).toEqual([
      ['AAPL', 'SELL', 30],
      ['MSFT', 'SELL', 20],
      ['TSLA', 'BUY', 5]
    ]);
  });

  it('does not close within tolerance of the maximum', () => {
    const portfolio = portfolioOf([equityLeg('AAPL', 66, 100), equityLeg('GLD', 34, 100)]);
    const checks = evaluateRules([equitiesRule], portfolio.allocations, portfolio.totalMarketValue);
    expect(checks[0].status).toBe('violation');
    expect(generateClosing(portfolio, checks, context())).toEqual([]);
  });

  it('covers the excess with as few positions as the default policy needs', () => {
    const picked = largestFirstClosingPolicy(
      portfolioOf([equityLeg('AAPL', 10, 100), equityLeg('MSFT', 30, 100), equityLeg('TSLA', 20, 100)]).positions,
      4000
    );
    expect(picked.map((p) => p.symbol)).toEqual(['MSFT', 'TSLA']);
  });

  it('rolls positions close to expiration toward the target DTE', () => {
    const portfolio = portfolioOf([
      optionLeg({ underlying: 'TSLA', strike: 200, right: 'put', quantity: -2, netLiq: -300, expiration: '2024-11-25', delta: 30 }),
      optionLeg({ underlying: 'TSLA', strike: 150, right: 'put', quantity: 1, netLiq: 50, expiration: '2025-01-17' })
    ]);
    const recs = generateRolling(portfolio, context());
    expect(recs).toHaveLength(1);
    expect(recs[0]).toMatchObject({
      type: 'roll',
      priority: 3,
      action: 'ROLL',
      quantity: 2,
      dteTarget: 30,
      deltaTarget: 30,
      confidence: 75,
      rationale: 'Roll expiring position (DTE=5)',
      marketContext: 'Roll target TSLA  241220P00200000'
    });
  });

  it('takes profit when the unrealized gain exceeds half the market value', () => {
    const portfolio = portfolioOf([
      equityLeg('AAPL', 10, 100, { unrealizedPnl: 600 }),
      equityLeg('MSFT', 10, 100, { unrealizedPnl: 400 })
    ]);
    const recs = generateAdjustment(portfolio, context());
    expect(recs.map((r) => [r.symbol, r.type, r.priority, r.action, r.expectedReturn, r.confidence])).toEqual([
      ['AAPL', 'adjust', 4, 'CLOSE', 600, 85]
    ]);
  });
});

describe('Filtering and prioritization', () => {
  const rec = (id: string, priority: TradeRecommendation['priority'], confidence: number, capital: number) => {
    const base = buildOpenRecommendation(candidate(id), gap(), context());
    return { ...base, id, priority, confidence, capitalRequired: capital };
  };

  const recs = [
    rec('open-a', 2, 70, 5000),
    rec('roll', 3, 75, 0),
    rec('open-b', 2, 80, 5000),
    rec('close', 1, 90, 0),
    rec('open-c', 2, 65, 3000),
    rec('open-d', 2, 50, 100)
  ];

  it('drops low confidence, orders by priority and confidence, and accepts first fit within budget', () => {
    const accepted = filterAndPrioritize(recs, 10000, SETTINGS);
    expect(accepted.map((r) => r.id)).toEqual(['close', 'open-b', 'open-c', 'roll']);
    const total = accepted.reduce((acc, r) => acc + r.capitalRequired, 0);
    expect(total).toBeLessThanOrEqual(10000 * 0.9);
  });

  it('accepts only capital-free recommendations without buying power', () => {
    expect(filterAndPrioritize(recs, -2500, SETTINGS).map((r) => r.id)).toEqual(['close', 'roll']);
  });

  it('summarizes capital, expected return and counts', () => {
    const summary = summarizeRecommendations(filterAndPrioritize(recs, 10000, SETTINGS));
    expect(summary).toEqual({
      totalCapitalRequired: 8000,
      totalExpectedReturn: 160,
      openingCount: 4,
      closingCount: 0
    });
  });

  it('counts profit-taking adjustments as closing trades', () => {
    const adjust = { ...rec('take-profit', 4, 85, 0), type: 'adjust' as const, action: 'CLOSE' as const };
    const close = { ...rec('close', 1, 90, 0), type: 'close' as const, action: 'SELL' as const };
    expect(summarizeRecommendations([close, adjust, rec('open-b', 2, 80, 5000)])).toMatchObject({
      openingCount: 1,
      closingCount: 2
    });
  });
});
