import {
  AllocationAxis,
  AllocationGap,
  AllocationRule,
  AllocationTable,
  ComplianceCheck
} from '../core/types';
import { parseStoredRules, Validation, validateRuleInput } from '../core/schema';
import defaultRulesJson from '../config/default-rules.json';
import { ComplianceHistorySink } from './complianceHistory';
import { ComplianceSummary, deriveGaps, evaluateRules, summarizeCompliance, toComplianceRecords } from './compliance';
import { RuleStore } from './ruleStore';

export const loadDefaultRules = (): AllocationRule[] => {
  const parsed = parseStoredRules(defaultRulesJson);
  if (!parsed.success) {
    throw new Error(`Invalid default allocation rules: ${parsed.errors.join('; ')}`);
  }
  return parsed.value;
};

export interface RulesEngineOptions {
  store: RuleStore;
  history?: ComplianceHistorySink;
  defaults?: AllocationRule[];
  now?: () => Date;
}

export interface BulkRuleUpdate {
  success: boolean;
  updatedCount: number;
  errors: string[];
}

export interface RuleSummary {
  totalRules: number;
  byAxis: Record<AllocationAxis, number>;
  lastUpdated: string | null;
}

export interface GapAnalysis {
  checks: ComplianceCheck[];
  gaps: AllocationGap[];
}

const sameKey = (a: AllocationRule, b: AllocationRule) => a.axis === b.axis && a.category === b.category;

const categoryOf = (input: unknown): string =>
  typeof input === 'object' && input !== null && 'category' in input && typeof input.category === 'string'
    ? input.category
    : 'unknown';

export class AllocationRulesEngine {
  private readonly store: RuleStore;
  private readonly history?: ComplianceHistorySink;
  private readonly now: () => Date;
  private rules: AllocationRule[];

  constructor(options: RulesEngineOptions) {
    this.store = options.store;
    this.history = options.history;
    this.now = options.now ?? (() => new Date());
    this.rules = this.store.load();
    if (!this.rules.length) {
      const stamp = this.now().toISOString();
      this.rules = (options.defaults ?? loadDefaultRules()).map((r) => ({ ...r, createdAt: stamp, updatedAt: stamp }));
      this.store.save(this.rules);
      console.log(`Seeded ${this.rules.length} default allocation rules.`);
    }
  }

  listRules(): AllocationRule[] {
    return this.rules.map((r) => ({ ...r }));
  }

  getRulesByAxis(axis: AllocationAxis): AllocationRule[] {
    return this.listRules().filter((r) => r.axis === axis);
  }

  upsertRule(input: unknown): Validation<AllocationRule> {
    const parsed = validateRuleInput(input);
    if (!parsed.success) return parsed;
    const candidate = parsed.value;
    const stamp = this.now().toISOString();
    const existing = this.rules.find((r) => sameKey(r, candidate));
    const rule: AllocationRule = { ...candidate, createdAt: existing?.createdAt ?? stamp, updatedAt: stamp };
    this.rules = existing ? this.rules.map((r) => (sameKey(r, rule) ? rule : r)) : [...this.rules, rule];
    this.store.save(this.rules);
    return { success: true, value: { ...rule } };
  }

  updateRules(inputs: unknown[]): BulkRuleUpdate {
    const errors: string[] = [];
    let updatedCount = 0;
    inputs.forEach((input, idx) => {
      const result = this.upsertRule(input);
      if (result.success) updatedCount += 1;
      else errors.push(`rule ${idx} (${categoryOf(input)}): ${result.errors.join('; ')}`);
    });
    return { success: errors.length === 0, updatedCount, errors };
  }

  evaluateCompliance(allocations: AllocationTable, totalValue: number): ComplianceCheck[] {
    const checks = evaluateRules(this.rules, allocations, totalValue);
    this.history?.append(toComplianceRecords(checks, totalValue, this.now().toISOString()));
    return checks;
  }

  deriveGaps(checks: ComplianceCheck[], totalValue: number, availableCapital: number): AllocationGap[] {
    return deriveGaps(checks, totalValue, availableCapital);
  }

  identifyGaps(allocations: AllocationTable, totalValue: number, availableCapital: number): GapAnalysis {
    const checks = this.evaluateCompliance(allocations, totalValue);
    return { checks, gaps: this.deriveGaps(checks, totalValue, availableCapital) };
  }

  complianceSummary(checks: ComplianceCheck[]): ComplianceSummary {
    return summarizeCompliance(checks);
  }

  summary(): RuleSummary {
    const byAxis: Record<AllocationAxis, number> = { asset: 0, duration: 0, strategy: 0 };
    this.rules.forEach((r) => {
      byAxis[r.axis] += 1;
    });
    const stamps = this.rules
      .map((r) => r.updatedAt)
      .filter((s): s is string => Boolean(s))
      .sort();
    return {
      totalRules: this.rules.length,
      byAxis,
      lastUpdated: stamps.length ? stamps[stamps.length - 1] : null
    };
  }
}
