export type InstrumentClass = 'equity' | 'option';
export type OptionRight = 'call' | 'put';
export type CostEffect = 'credit' | 'debit';

export interface Leg {
  id: string; // accountId:symbol
  accountId: string;
  symbol: string;
  underlying: string;
  instrument: InstrumentClass;
  quantity: number;
  strike?: number;
  expiration?: string; // YYYY-MM-DD
  right?: OptionRight;
  createdAt?: string; // ISO timestamp of the opening fill
  costEffect?: CostEffect;
  markPrice: number;
  netLiq: number;
  delta: number;
  unrealizedPnl?: number;
}

export interface AccountBalances {
  cashBalance: number;
  buyingPower: number;
  netLiquidatingValue: number;
}

export interface PositionSnapshot {
  asOf: string;
  legs: Leg[];
  balances: AccountBalances;
}

export type SpreadChainType = 'call_credit_spread' | 'put_credit_spread' | 'call_debit_spread' | 'put_debit_spread';
export type CalendarChainType = 'call_calendar' | 'put_calendar';
export type VolatilityChainType = 'long_straddle' | 'short_straddle' | 'long_strangle' | 'short_strangle';
export type SingleChainType = 'long_call' | 'short_call' | 'long_put' | 'short_put';
export type ChainType = SpreadChainType | CalendarChainType | 'iron_condor' | VolatilityChainType | SingleChainType;

export interface ChainMetrics {
  daysToExpiration: number;
  netPremium: number;
  netDelta: number;
  quantity: number;
  expiration?: string;
  width?: number;
  maxProfit?: number;
  maxLoss?: number;
  strike?: number;
  putStrike?: number;
  callStrike?: number;
  nearExpiration?: string;
  farExpiration?: string;
  nearDte?: number;
  farDte?: number;
  totalCredit?: number;
  createdTimeDiffSeconds?: number;
}

export interface Chain {
  id: string;
  type: ChainType;
  underlying: string;
  description: string;
  legIds: string[];
  metrics: ChainMetrics;
  detectedAt: string;
}

export type AllocationAxis = 'asset' | 'duration' | 'strategy';

export type DirectionalBias = 'bullish' | 'neutral' | 'bearish';
export type AssetClass = 'equity' | 'non_equity';

export interface SectorInfo {
  sector: string;
  assetClass: AssetClass;
}

export type SectorTable = Record<string, SectorInfo>;

export type PositionStrategy = ChainType | 'long_stock' | 'short_stock';

export interface AllocationRule {
  axis: AllocationAxis;
  category: string;
  targetPct: number;
  minPct: number;
  maxPct: number;
  tolerancePct: number;
  createdAt?: string;
  updatedAt?: string;
}

export type ComplianceStatus = 'compliant' | 'warning' | 'violation';

export interface ComplianceCheck {
  rule: AllocationRule;
  currentPct: number;
  targetPct: number;
  deviationPct: number;
  status: ComplianceStatus;
  message: string;
}

export interface AllocationGap {
  axis: AllocationAxis;
  category: string;
  currentPct: number;
  targetPct: number;
  gapPct: number;
  requiredDollars: number;
  priority: number;
  status: ComplianceStatus;
}

export interface ComplianceRecord {
  timestamp: string;
  axis: AllocationAxis;
  category: string;
  currentPct: number;
  targetPct: number;
  deviationPct: number;
  status: ComplianceStatus;
  portfolioValue: number;
}

export type AllocationTable = Record<AllocationAxis, Record<string, number>>;

export interface PortfolioPosition {
  legId: string;
  symbol: string;
  underlying: string;
  instrument: InstrumentClass;
  strategyType: PositionStrategy;
  chainId?: string;
  quantity: number;
  marketValue: number;
  delta: number;
  dte: number | null;
  assetClass: AssetClass;
  bias: DirectionalBias;
  sector: string;
  unrealizedPnl?: number;
}

export interface ExcludedLeg {
  legId: string;
  symbol: string;
  reason: string;
}

export interface AnalyzedPortfolio {
  asOf: string;
  totalMarketValue: number;
  buyingPower: number;
  cashBalance: number;
  positions: PortfolioPosition[];
  chains: Chain[];
  excluded: ExcludedLeg[];
  allocations: AllocationTable;
  sectorAllocation: Record<string, number>;
}

export interface UniverseCandidate {
  symbol: string;
  lastPrice: number | null;
  ivRank: number | null;
  canAddPosition: boolean;
  sector?: string;
  industry?: string;
  screeningScore: number;
}

export interface SectorRanking {
  sector: string;
  score: number;
}

export type RecommendationType = 'open' | 'close' | 'roll' | 'adjust';

export const RecommendationPriority = {
  CRITICAL: 1,
  HIGH: 2,
  MEDIUM: 3,
  LOW: 4
} as const;
export type RecommendationPriority = (typeof RecommendationPriority)[keyof typeof RecommendationPriority];

export type RecommendationAction = 'BTO' | 'BUY' | 'SELL' | 'ROLL' | 'CLOSE';

export interface TradeRecommendation {
  id: string;
  type: RecommendationType;
  priority: RecommendationPriority;
  symbol: string;
  underlying: string;
  strategy: string;
  action: RecommendationAction;
  entryPrice: number;
  maxPrice: number;
  quantity: number;
  dteTarget: number;
  deltaTarget: number;
  capitalRequired: number;
  expectedReturn: number;
  maxRisk: number;
  confidence: number;
  rationale: string;
  marketContext: string;
  allocationImpact: Partial<Record<AllocationAxis, Record<string, number>>>;
  createdAt: string;
}

export type StageName = 'closing' | 'opening' | 'rolling' | 'adjustment';

export type StageResult<T> =
  | { stage: StageName; ok: true; items: T[] }
  | { stage: StageName; ok: false; items: T[]; cause: string };

export interface StageOutcome {
  stage: StageName;
  ok: boolean;
  count: number;
  cause?: string;
}

export type TriggerReason = 'fill_detected' | 'scheduled' | 'manual';
export type EventStatus = 'pending' | 'approved' | 'executed' | 'rejected';

export interface EventSummary {
  totalCapitalRequired: number;
  totalExpectedReturn: number;
  openingCount: number;
  closingCount: number;
}

export interface RebalancingEvent {
  id: string;
  trigger: TriggerReason;
  triggerDetails: Record<string, unknown>;
  portfolio: AnalyzedPortfolio;
  checks: ComplianceCheck[];
  gaps: AllocationGap[];
  recommendations: TradeRecommendation[];
  stages: StageOutcome[];
  summary: EventSummary;
  status: EventStatus;
  createdAt: string;
  approvedAt?: string;
  executedAt?: string;
  rejectedAt?: string;
  rejectionReason?: string;
  approvedRecommendationIds: string[];
}

export interface Fill {
  accountId: string;
  orderId: string;
  symbol: string;
  quantity: number;
  price: number;
  filledAt: string;
}

export interface RebalancerSettings {
  maxSingleTradeDollars: number;
  maxTotalAllocationPct: number;
  minConfidenceThreshold: number;
  maxPositionsPerGap: number;
  minPositionSizeDollars: number;
  fillCheckIntervalSeconds: number;
  rollDteThreshold: number;
  rollTargetDte: number;
  profitTakePct: number;
  slippagePct: number;
}

export interface AppConfig {
  rebalancer: RebalancerSettings;
  chains: {
    timeWindowSeconds: number;
  };
  files: {
    rules: string;
    complianceHistory: string;
    ledger: string;
    snapshot: string;
    universe: string;
    sectors: string;
    fills: string;
  };
  uiPort: number;
  uiBind: string;
}

export type LedgerEventType =
  | 'REBALANCE_STARTED'
  | 'EVENT_PUBLISHED'
  | 'REBALANCE_FAILED'
  | 'EVENT_APPROVED'
  | 'EVENT_REJECTED'
  | 'EVENT_EXECUTED'
  | 'RULES_UPDATED';

export interface LedgerEvent {
  id: string;
  eventId: string;
  timestamp: string;
  type: LedgerEventType;
  details?: Record<string, unknown>;
}
