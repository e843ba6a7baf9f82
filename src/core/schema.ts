import { z } from 'zod';
import {
  AllocationRule,
  AppConfig,
  ComplianceRecord,
  Fill,
  Leg,
  LedgerEvent,
  PositionSnapshot,
  RebalancerSettings,
  SectorTable,
  UniverseCandidate
} from './types';

export type Validation<T> = { success: true; value: T } | { success: false; errors: string[] };

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));

const pct = z.number().min(0).max(100);

const ruleFields = z.object({
  axis: z.enum(['asset', 'duration', 'strategy']),
  category: z.string().trim().min(1),
  targetPct: pct,
  minPct: pct,
  maxPct: pct,
  tolerancePct: pct.default(2)
});

const checkBounds = (r: { targetPct: number; minPct: number; maxPct: number }, ctx: z.RefinementCtx) => {
  if (r.minPct > r.maxPct) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['minPct'], message: 'minPct must not exceed maxPct' });
    return;
  }
  if (r.targetPct < r.minPct || r.targetPct > r.maxPct) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['targetPct'],
      message: 'targetPct must lie between minPct and maxPct'
    });
  }
};

export const allocationRuleInputSchema = ruleFields.superRefine(checkBounds);

export const storedRuleSchema = ruleFields
  .extend({ createdAt: z.string().optional(), updatedAt: z.string().optional() })
  .superRefine(checkBounds);

export const validateRuleInput = (input: unknown): Validation<AllocationRule> => {
  const result = allocationRuleInputSchema.safeParse(input);
  if (result.success) return { success: true, value: result.data };
  return { success: false, errors: formatIssues(result.error) };
};

export const parseStoredRules = (input: unknown): Validation<AllocationRule[]> => {
  const result = z.array(storedRuleSchema).safeParse(input);
  if (result.success) return { success: true, value: result.data };
  return { success: false, errors: formatIssues(result.error) };
};

const isoDate = z.string().refine((val) => !Number.isNaN(Date.parse(val)), { message: 'must be an ISO date' });

const legSchema = z.object({
  id: z.string().min(1).optional(),
  accountId: z.string().min(1),
  symbol: z.string().min(1),
  underlying: z.string().min(1),
  instrument: z.enum(['equity', 'option']),
  quantity: z.number(),
  strike: z.number().optional(),
  expiration: z.string().optional(),
  right: z.enum(['call', 'put']).optional(),
  createdAt: isoDate.optional(),
  costEffect: z.enum(['credit', 'debit']).optional(),
  markPrice: z.number(),
  netLiq: z.number(),
  delta: z.number().default(0),
  unrealizedPnl: z.number().optional()
});

const snapshotSchema = z.object({
  asOf: isoDate,
  legs: z.array(legSchema),
  balances: z.object({
    cashBalance: z.number(),
    buyingPower: z.number(),
    netLiquidatingValue: z.number()
  })
});

export const validateSnapshot = (input: unknown): Validation<PositionSnapshot> => {
  const result = snapshotSchema.safeParse(input);
  if (!result.success) return { success: false, errors: formatIssues(result.error) };
  const seen = new Set<string>();
  const errors: string[] = [];
  const legs: Leg[] = result.data.legs.map((raw) => {
    const id = raw.id ?? `${raw.accountId}:${raw.symbol}`;
    if (seen.has(id)) errors.push(`legs: duplicate position key ${id}`);
    seen.add(id);
    return { ...raw, id };
  });
  if (errors.length) return { success: false, errors };
  return { success: true, value: { asOf: result.data.asOf, balances: result.data.balances, legs } };
};

const universeSchema = z.array(
  z.object({
    symbol: z.string().min(1),
    lastPrice: z.number().nullable(),
    ivRank: z.number().nullable(),
    canAddPosition: z.boolean().default(true),
    sector: z.string().optional(),
    industry: z.string().optional(),
    screeningScore: z.number().default(60)
  })
);

export const validateUniverse = (input: unknown): Validation<UniverseCandidate[]> => {
  const result = universeSchema.safeParse(input);
  if (result.success) return { success: true, value: result.data };
  return { success: false, errors: formatIssues(result.error) };
};

const sectorTableSchema = z.record(
  z.object({
    sector: z.string().min(1),
    assetClass: z.enum(['equity', 'non_equity'])
  })
);

export const validateSectorTable = (input: unknown): Validation<SectorTable> => {
  const result = sectorTableSchema.safeParse(input);
  if (result.success) return { success: true, value: result.data };
  return { success: false, errors: formatIssues(result.error) };
};

const fillsSchema = z.array(
  z.object({
    accountId: z.string().min(1),
    orderId: z.string().min(1),
    symbol: z.string().min(1),
    quantity: z.number(),
    price: z.number(),
    filledAt: isoDate
  })
);

export const validateFills = (input: unknown): Validation<Fill[]> => {
  const result = fillsSchema.safeParse(input);
  if (result.success) return { success: true, value: result.data };
  return { success: false, errors: formatIssues(result.error) };
};

const rebalancerSettingsSchema = z.object({
  maxSingleTradeDollars: z.number().positive(),
  maxTotalAllocationPct: pct,
  minConfidenceThreshold: pct,
  maxPositionsPerGap: z.number().int().min(1),
  minPositionSizeDollars: z.number().min(0),
  fillCheckIntervalSeconds: z.number().int().min(1),
  rollDteThreshold: z.number().int().min(0),
  rollTargetDte: z.number().int().min(1),
  profitTakePct: pct,
  slippagePct: pct
});

const configSchema = z.object({
  rebalancer: rebalancerSettingsSchema,
  chains: z.object({ timeWindowSeconds: z.number().positive() }),
  files: z.object({
    rules: z.string().min(1),
    complianceHistory: z.string().min(1),
    ledger: z.string().min(1),
    snapshot: z.string().min(1),
    universe: z.string().min(1),
    sectors: z.string().min(1),
    fills: z.string().min(1)
  }),
  uiPort: z.number().int().min(0),
  uiBind: z.string().min(1)
});

export const validateConfig = (input: unknown): Validation<AppConfig> => {
  const result = configSchema.safeParse(input);
  if (result.success) return { success: true, value: result.data };
  return { success: false, errors: formatIssues(result.error) };
};

export const validateSettingsUpdate = (input: unknown): Validation<Partial<RebalancerSettings>> => {
  const result = rebalancerSettingsSchema.partial().strict().safeParse(input);
  if (result.success) return { success: true, value: result.data };
  return { success: false, errors: formatIssues(result.error) };
};

const complianceRecordSchema = z.object({
  timestamp: isoDate,
  axis: z.enum(['asset', 'duration', 'strategy']),
  category: z.string(),
  currentPct: z.number(),
  targetPct: z.number(),
  deviationPct: z.number(),
  status: z.enum(['compliant', 'warning', 'violation']),
  portfolioValue: z.number()
});

export const validateComplianceRecord = (input: unknown): Validation<ComplianceRecord> => {
  const result = complianceRecordSchema.safeParse(input);
  if (result.success) return { success: true, value: result.data };
  return { success: false, errors: formatIssues(result.error) };
};

const ledgerEventSchema = z.object({
  id: z.string().min(1),
  eventId: z.string().min(1),
  timestamp: isoDate,
  type: z.enum([
    'REBALANCE_STARTED',
    'EVENT_PUBLISHED',
    'REBALANCE_FAILED',
    'EVENT_APPROVED',
    'EVENT_REJECTED',
    'EVENT_EXECUTED',
    'RULES_UPDATED'
  ]),
  details: z.record(z.unknown()).optional()
});

export const validateLedgerEvent = (input: unknown): Validation<LedgerEvent> => {
  const result = ledgerEventSchema.safeParse(input);
  if (result.success) return { success: true, value: result.data };
  return { success: false, errors: formatIssues(result.error) };
};

const approveRequestSchema = z.object({ recommendationIds: z.array(z.string().min(1)).default([]) }).strict();

export const validateApproveRequest = (input: unknown): Validation<{ recommendationIds: string[] }> => {
  const result = approveRequestSchema.safeParse(input ?? {});
  if (result.success) return { success: true, value: result.data };
  return { success: false, errors: formatIssues(result.error) };
};

const rejectRequestSchema = z.object({ reason: z.string().trim().min(1) });

export const validateRejectRequest = (input: unknown): Validation<{ reason: string }> => {
  const result = rejectRequestSchema.safeParse(input);
  if (result.success) return { success: true, value: result.data };
  return { success: false, errors: formatIssues(result.error) };
};

const rulesUpdateRequestSchema = z.object({ rules: z.array(z.unknown()).min(1) });

export const validateRulesUpdateRequest = (input: unknown): Validation<{ rules: unknown[] }> => {
  const result = rulesUpdateRequestSchema.safeParse(input);
  if (result.success) return { success: true, value: result.data };
  return { success: false, errors: formatIssues(result.error) };
};
