import crypto from 'crypto';
import {
  AnalyzedPortfolio,
  AllocationGap,
  ComplianceCheck,
  EventSummary,
  RebalancerSettings,
  RebalancingEvent,
  SectorRanking,
  SectorTable,
  StageOutcome,
  TradeRecommendation,
  TriggerReason
} from '../core/types';
import { Validation, validateSettingsUpdate } from '../core/schema';
import { errorMessage } from '../core/utils';
import { ComplianceSummary, summarizeCompliance } from '../allocation/compliance';
import { AllocationRulesEngine, BulkRuleUpdate } from '../allocation/rulesEngine';
import { LifecycleJournal } from '../ledger/ledger';
import { analyzePortfolio } from '../portfolio/portfolioAnalyzer';
import { SectorRankingProvider, SnapshotProvider, UniverseProvider } from './providers';
import {
  ClosingPolicy,
  filterAndPrioritize,
  generateAdjustment,
  generateClosing,
  generateOpening,
  generateRolling,
  largestFirstClosingPolicy,
  RecommendationContext,
  summarizeRecommendations
} from './recommendations';
import { SingleFlight } from './singleFlight';
import { runStage, toStageOutcome } from './stages';

export interface RebalancingServiceDeps {
  snapshots: SnapshotProvider;
  universe: UniverseProvider;
  sectorRankings: SectorRankingProvider;
  rules: AllocationRulesEngine;
  sectors: SectorTable;
  settings: RebalancerSettings;
  timeWindowSeconds?: number;
  journal?: LifecycleJournal;
  closingPolicy?: ClosingPolicy;
  now?: () => Date;
  newId?: () => string;
}

export type RebalancingStatus =
  | { hasRecommendations: false; message: string }
  | {
      hasRecommendations: boolean;
      eventId: string;
      status: RebalancingEvent['status'];
      trigger: TriggerReason;
      createdAt: string;
      recommendationCount: number;
      summary: EventSummary;
      compliance: ComplianceSummary;
      stages: StageOutcome[];
    };

export type LifecycleResult =
  | { ok: true; event: RebalancingEvent; approvedCount?: number; totalRecommendations: number }
  | { ok: false; error: string };

export const NO_ACTIVE_EVENT = 'No active rebalancing event';

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === 'object') {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
};

const snapshotOf = (event: RebalancingEvent): RebalancingEvent => deepFreeze(structuredClone(event));

/**
 * Owns the current rebalancing event. Passes and lifecycle transitions share one
 * single-flight lock, so concurrent callers are served one at a time in arrival
 * order and each pass publishes a complete event or nothing.
 */
export class RebalancingService {
  private readonly lock = new SingleFlight();
  private readonly now: () => Date;
  private readonly newId: () => string;
  private readonly closingPolicy: ClosingPolicy;
  private settings: RebalancerSettings;
  private current: RebalancingEvent | null = null;

  constructor(private readonly deps: RebalancingServiceDeps) {
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? (() => crypto.randomUUID());
    this.closingPolicy = deps.closingPolicy ?? largestFirstClosingPolicy;
    this.settings = { ...deps.settings };
  }

  trigger(reason: TriggerReason, details: Record<string, unknown> = {}): Promise<RebalancingEvent> {
    return this.lock.run(() => this.runPass(reason, details));
  }

  getCurrentEvent(): RebalancingEvent | null {
    return this.current ? snapshotOf(this.current) : null;
  }

  getStatus(): RebalancingStatus {
    const event = this.current;
    if (!event) return { hasRecommendations: false, message: 'No active rebalancing recommendations' };
    return {
      hasRecommendations: event.recommendations.length > 0,
      eventId: event.id,
      status: event.status,
      trigger: event.trigger,
      createdAt: event.createdAt,
      recommendationCount: event.recommendations.length,
      summary: { ...event.summary },
      compliance: summarizeCompliance(event.checks),
      stages: event.stages.map((s) => ({ ...s }))
    };
  }

  approve(recommendationIds: string[] = []): Promise<LifecycleResult> {
    return this.lock.run((): LifecycleResult => {
      const event = this.current;
      if (!event) return { ok: false, error: NO_ACTIVE_EVENT };
      if (event.status !== 'pending') {
        return { ok: false, error: `Event ${event.id} is ${event.status}; only pending events can be approved` };
      }
      const wanted = new Set(recommendationIds);
      const approved = event.recommendations
        .filter((r) => !wanted.size || wanted.has(r.id))
        .map((r) => r.id);
      this.current = {
        ...event,
        status: 'approved',
        approvedAt: this.now().toISOString(),
        approvedRecommendationIds: approved
      };
      this.deps.journal?.record(event.id, 'EVENT_APPROVED', { approvedRecommendationIds: approved });
      return {
        ok: true,
        event: snapshotOf(this.current),
        approvedCount: approved.length,
        totalRecommendations: event.recommendations.length
      };
    });
  }

  reject(reason: string): Promise<LifecycleResult> {
    return this.lock.run((): LifecycleResult => {
      const event = this.current;
      if (!event) return { ok: false, error: NO_ACTIVE_EVENT };
      if (event.status !== 'pending') {
        return { ok: false, error: `Event ${event.id} is ${event.status}; only pending events can be rejected` };
      }
      this.current = { ...event, status: 'rejected', rejectedAt: this.now().toISOString(), rejectionReason: reason };
      this.deps.journal?.record(event.id, 'EVENT_REJECTED', { reason });
      return { ok: true, event: snapshotOf(this.current), totalRecommendations: event.recommendations.length };
    });
  }

  markExecuted(): Promise<LifecycleResult> {
    return this.lock.run((): LifecycleResult => {
      const event = this.current;
      if (!event) return { ok: false, error: NO_ACTIVE_EVENT };
      if (event.status !== 'approved') {
        return { ok: false, error: `Event ${event.id} is ${event.status}; only approved events can be executed` };
      }
      this.current = { ...event, status: 'executed', executedAt: this.now().toISOString() };
      this.deps.journal?.record(event.id, 'EVENT_EXECUTED', {
        approvedRecommendationIds: event.approvedRecommendationIds
      });
      return { ok: true, event: snapshotOf(this.current), totalRecommendations: event.recommendations.length };
    });
  }

  getSettings(): RebalancerSettings {
    return { ...this.settings };
  }

  updateSettings(input: unknown): Validation<RebalancerSettings> {
    const parsed = validateSettingsUpdate(input);
    if (!parsed.success) return parsed;
    this.settings = { ...this.settings, ...parsed.value };
    console.log(`Rebalancer settings updated: ${Object.keys(parsed.value).join(', ') || 'no changes'}.`);
    return { success: true, value: this.getSettings() };
  }

  updateRules(inputs: unknown[]): BulkRuleUpdate {
    const result = this.deps.rules.updateRules(inputs);
    if (result.updatedCount) {
      this.deps.journal?.record('rules', 'RULES_UPDATED', { updatedCount: result.updatedCount, errors: result.errors });
    }
    return result;
  }

  private async refreshSectorRankings(): Promise<SectorRanking[]> {
    try {
      return await this.deps.sectorRankings.getRankings();
    } catch (err) {
      console.warn(`Sector ranking refresh failed; continuing without rankings: ${errorMessage(err)}`);
      return [];
    }
  }

  private async generateRecommendations(
    portfolio: AnalyzedPortfolio,
    checks: ComplianceCheck[],
    gaps: AllocationGap[],
    rankings: SectorRanking[],
    ctx: RecommendationContext
  ): Promise<{ recommendations: TradeRecommendation[]; stages: StageOutcome[] }> {
    const results = [
      await runStage('closing', () => generateClosing(portfolio, checks, ctx, this.closingPolicy)),
      await runStage('opening', async () =>
        generateOpening(gaps, await this.deps.universe.getCandidates(), rankings, ctx)
      ),
      await runStage('rolling', () => generateRolling(portfolio, ctx)),
      await runStage('adjustment', () => generateAdjustment(portfolio, ctx))
    ];
    const recommendations = filterAndPrioritize(
      results.flatMap((r) => r.items),
      portfolio.buyingPower,
      ctx.settings
    );
    return { recommendations, stages: results.map(toStageOutcome) };
  }

  private async runPass(reason: TriggerReason, details: Record<string, unknown>): Promise<RebalancingEvent> {
    const eventId = this.newId();
    const settings = { ...this.settings };
    this.deps.journal?.record(eventId, 'REBALANCE_STARTED', { trigger: reason, ...details });
    try {
      const snapshot = await this.deps.snapshots.getSnapshot();
      const portfolio = analyzePortfolio(snapshot, {
        sectors: this.deps.sectors,
        timeWindowSeconds: this.deps.timeWindowSeconds
      });
      const rankings = await this.refreshSectorRankings();
      const availableCapital = Math.max(0, snapshot.balances.buyingPower);
      const { checks, gaps } = this.deps.rules.identifyGaps(
        portfolio.allocations,
        portfolio.totalMarketValue,
        availableCapital
      );
      const now = this.now();
      const { recommendations, stages } = await this.generateRecommendations(portfolio, checks, gaps, rankings, {
        settings,
        now,
        newId: this.newId
      });
      const event: RebalancingEvent = {
        id: eventId,
        trigger: reason,
        triggerDetails: { ...details },
        portfolio,
        checks,
        gaps,
        recommendations,
        stages,
        summary: summarizeRecommendations(recommendations),
        status: 'pending',
        createdAt: now.toISOString(),
        approvedRecommendationIds: []
      };
      this.deps.journal?.record(eventId, 'EVENT_PUBLISHED', {
        recommendations: recommendations.length,
        failedStages: stages.filter((s) => !s.ok).map((s) => s.stage)
      });
      this.current = event;
      console.log(`Rebalancing event ${eventId} published (${reason}): ${recommendations.length} recommendations.`);
      return snapshotOf(event);
    } catch (err) {
      this.deps.journal?.record(eventId, 'REBALANCE_FAILED', { trigger: reason, error: errorMessage(err) });
      console.error(`Rebalancing pass ${eventId} failed: ${errorMessage(err)}`);
      throw err;
    }
  }
}
