import {
  dteTargetForGap,
  normalizeIvRank,
  selectCandidates,
  steerBySectorRank,
  strategyForGap
} from '../src/rebalancing/candidateSelectors';
import { candidate, gap } from './fixtures';

const universe = [
  candidate('AAPL', { lastPrice: 190, ivRank: 0.45, sector: 'Technology', screeningScore: 80 }),
  candidate('JPM', { lastPrice: 150, ivRank: 35, sector: 'Financials', screeningScore: 90 }),
  candidate('GLD', { lastPrice: 180, ivRank: 0.2, sector: 'Commodities', screeningScore: 70 }),
  candidate('XOM', { lastPrice: 110, ivRank: 70, sector: 'Energy', canAddPosition: false, screeningScore: 95 }),
  candidate('NOPX', { lastPrice: null, ivRank: 80, screeningScore: 99 }),
  candidate('F', { lastPrice: 12, ivRank: 65, sector: 'Consumer Discretionary', screeningScore: 60 }),
  candidate('NVDA', { lastPrice: 120, ivRank: 0.75, sector: 'Technology', screeningScore: 85 })
];

const symbols = (list: { symbol: string }[]) => list.map((c) => c.symbol);

describe('Candidate selectors', () => {
  it('normalizes fractional IV ranks to percentages', () => {
    expect(normalizeIvRank(0.45)).toBe(45);
    expect(normalizeIvRank(1)).toBe(100);
    expect(normalizeIvRank(45)).toBe(45);
    expect(normalizeIvRank(null)).toBe(0);
  });

  it('selects equities by IV rank in screening order, skipping unpriced names', () => {
    expect(symbols(selectCandidates(universe, { gap: gap(), sectorRankings: [] }))).toEqual([
      'XOM',
      'JPM',
      'NVDA',
      'AAPL',
      'F'
    ]);
  });

  it('steers equities toward better-ranked sectors and keeps unranked ones last', () => {
    const picks = selectCandidates(universe, {
      gap: gap(),
      sectorRankings: [
        { sector: 'Energy', score: 50 },
        { sector: 'Technology', score: 80 }
      ]
    });
    expect(symbols(picks)).toEqual(['NVDA', 'AAPL', 'XOM', 'JPM', 'F']);
    expect(steerBySectorRank(universe, [])).toBe(universe);
  });

  it('selects non-equities by sector, industry or symbol', () => {
    const withFund = [...universe, candidate('VTI', { industry: 'Index Fund', screeningScore: 10 })];
    const picks = selectCandidates(withFund, { gap: gap({ category: 'non_equities' }), sectorRankings: [] });
    expect(symbols(picks)).toEqual(['GLD', 'VTI']);
    expect(selectCandidates(universe, { gap: gap({ category: 'max_sector' }), sectorRankings: [] })).toEqual([]);
  });

  it('selects duration candidates with high IV rank and a price above 20', () => {
    const picks = selectCandidates(universe, { gap: gap({ axis: 'duration', category: '7_dte' }), sectorRankings: [] });
    expect(symbols(picks)).toEqual(['NVDA']);
  });

  it('applies a per-bias IV floor for strategy gaps', () => {
    const pick = (category: string) =>
      symbols(selectCandidates(universe, { gap: gap({ axis: 'strategy', category }), sectorRankings: [] }));
    expect(pick('bullish')).toEqual(['NVDA', 'AAPL', 'F']);
    expect(pick('bearish')).toEqual(['NVDA', 'F']);
    expect(pick('neutral')).toEqual(['NVDA', 'F']);
    expect(pick('sideways')).toEqual([]);
  });

  it('chooses a strategy from the gap and IV rank', () => {
    const bullish = gap({ axis: 'strategy', category: 'bullish' });
    expect(strategyForGap(bullish, 0.75)).toBe('put_credit_spread');
    expect(strategyForGap(bullish, 45)).toBe('call_debit_spread');
    expect(strategyForGap(gap({ axis: 'strategy', category: 'bearish' }), 55)).toBe('call_credit_spread');
    expect(strategyForGap(gap({ axis: 'strategy', category: 'neutral' }), 30)).toBe('iron_butterfly');
    expect(strategyForGap(gap(), 65)).toBe('put_credit_spread');
    expect(strategyForGap(gap(), 0.45)).toBe('iron_condor');
  });

  it('maps duration buckets to DTE targets', () => {
    expect(dteTargetForGap(gap({ axis: 'duration', category: '7_dte' }))).toBe(7);
    expect(dteTargetForGap(gap({ axis: 'duration', category: '0_dte' }))).toBe(0);
    expect(dteTargetForGap(gap({ axis: 'duration', category: 'non_expiring' }))).toBe(30);
    expect(dteTargetForGap(gap())).toBe(30);
  });
});
