import { SectorTable } from '../core/types';
import {
  validateApproveRequest,
  validateRejectRequest,
  validateRulesUpdateRequest
} from '../core/schema';
import { parseAsOf } from '../core/time';
import { errorMessage } from '../core/utils';
import { AllocationRulesEngine } from '../allocation/rulesEngine';
import { ComplianceHistorySink } from '../allocation/complianceHistory';
import { detectChains } from '../chains/chainDetector';
import { analyzePortfolio, summarizePortfolio } from '../portfolio/portfolioAnalyzer';
import { SnapshotProvider } from '../rebalancing/providers';
import { LifecycleResult, NO_ACTIVE_EVENT, RebalancingService } from '../rebalancing/rebalancingService';

export interface ApiResponse {
  status: number;
  body: unknown;
}

export interface ApiDeps {
  service: RebalancingService;
  rules: AllocationRulesEngine;
  history: ComplianceHistorySink;
  snapshots: SnapshotProvider;
  sectors: SectorTable;
  timeWindowSeconds?: number;
}

const ok = (body: unknown): ApiResponse => ({ status: 200, body });
const badRequest = (errors: string[]): ApiResponse => ({ status: 400, body: { error: 'Invalid request', errors } });
const failure = (err: unknown): ApiResponse => ({ status: 500, body: { error: errorMessage(err) } });

const lifecycleResponse = (result: LifecycleResult): ApiResponse => {
  if (result.ok) return ok(result);
  return { status: result.error === NO_ACTIVE_EVENT ? 404 : 409, body: { error: result.error } };
};

const parseLimit = (raw: unknown, fallback: number): number => {
  const value = typeof raw === 'string' ? Number(raw) : NaN;
  return Number.isInteger(value) && value > 0 ? value : fallback;
};

export const createHandlers = (deps: ApiDeps) => {
  const { service, rules } = deps;

  const analyze = async () =>
    analyzePortfolio(await deps.snapshots.getSnapshot(), {
      sectors: deps.sectors,
      timeWindowSeconds: deps.timeWindowSeconds
    });

  return {
    status: (): ApiResponse => ok(service.getStatus()),

    recommendations: (): ApiResponse => {
      const event = service.getCurrentEvent();
      if (!event) return { status: 404, body: { error: NO_ACTIVE_EVENT } };
      return ok(event);
    },

    trigger: async (body: unknown): Promise<ApiResponse> => {
      const details = typeof body === 'object' && body !== null ? { ...body } : {};
      try {
        return ok(await service.trigger('manual', details));
      } catch (err) {
        return failure(err);
      }
    },

    approve: async (body: unknown): Promise<ApiResponse> => {
      const parsed = validateApproveRequest(body);
      if (!parsed.success) return badRequest(parsed.errors);
      return lifecycleResponse(await service.approve(parsed.value.recommendationIds));
    },

    reject: async (body: unknown): Promise<ApiResponse> => {
      const parsed = validateRejectRequest(body);
      if (!parsed.success) return badRequest(parsed.errors);
      return lifecycleResponse(await service.reject(parsed.value.reason));
    },

    markExecuted: async (): Promise<ApiResponse> => lifecycleResponse(await service.markExecuted()),

    listRules: (): ApiResponse => ok({ rules: rules.listRules(), summary: rules.summary() }),

    updateRules: (body: unknown): ApiResponse => {
      const parsed = validateRulesUpdateRequest(body);
      if (!parsed.success) return badRequest(parsed.errors);
      const result = service.updateRules(parsed.value.rules);
      return { status: result.success || result.updatedCount > 0 ? 200 : 400, body: result };
    },

    compliance: async (): Promise<ApiResponse> => {
      try {
        const portfolio = await analyze();
        const { checks, gaps } = rules.identifyGaps(
          portfolio.allocations,
          portfolio.totalMarketValue,
          portfolio.buyingPower
        );
        return ok({
          summary: rules.complianceSummary(checks),
          totalMarketValue: portfolio.totalMarketValue,
          allocations: portfolio.allocations,
          checks,
          gaps
        });
      } catch (err) {
        return failure(err);
      }
    },

    complianceHistory: (query: { limit?: unknown }): ApiResponse =>
      ok({ records: deps.history.read(parseLimit(query.limit, 100)) }),

    chains: async (): Promise<ApiResponse> => {
      try {
        const snapshot = await deps.snapshots.getSnapshot();
        return ok(
          detectChains(snapshot.legs, { asOf: parseAsOf(snapshot.asOf), timeWindowSeconds: deps.timeWindowSeconds })
        );
      } catch (err) {
        return failure(err);
      }
    },

    portfolio: async (): Promise<ApiResponse> => {
      try {
        const portfolio = await analyze();
        return ok({ summary: summarizePortfolio(portfolio), portfolio });
      } catch (err) {
        return failure(err);
      }
    },

    configuration: (): ApiResponse => ok(service.getSettings()),

    updateConfiguration: (body: unknown): ApiResponse => {
      const result = service.updateSettings(body);
      if (!result.success) return badRequest(result.errors);
      return ok(result.value);
    }
  };
};

export type Handlers = ReturnType<typeof createHandlers>;
