import {
  AllocationGap,
  AllocationRule,
  AllocationTable,
  ComplianceCheck,
  ComplianceRecord,
  ComplianceStatus
} from '../core/types';
import { round2 } from '../core/utils';

// Gaps this small are noise and never become actionable.
export const GAP_NOISE_PCT = 0.5;

export const classifyCompliance = (rule: AllocationRule, currentPct: number): ComplianceStatus => {
  if (currentPct < rule.minPct || currentPct > rule.maxPct) return 'violation';
  if (Math.abs(currentPct - rule.targetPct) > rule.tolerancePct) return 'warning';
  return 'compliant';
};

const complianceMessage = (rule: AllocationRule, currentPct: number, status: ComplianceStatus) => {
  const label = `${rule.axis}/${rule.category} at ${currentPct.toFixed(1)}%`;
  if (status === 'violation') return `${label} is outside ${rule.minPct}-${rule.maxPct}%`;
  if (status === 'warning') {
    return `${label} deviates ${Math.abs(currentPct - rule.targetPct).toFixed(1)}pp from target ${rule.targetPct}%`;
  }
  return `${label} is within ${rule.tolerancePct}pp of target ${rule.targetPct}%`;
};

export const checkRule = (rule: AllocationRule, currentPct: number): ComplianceCheck => {
  const status = classifyCompliance(rule, currentPct);
  return {
    rule,
    currentPct,
    targetPct: rule.targetPct,
    deviationPct: round2(currentPct - rule.targetPct),
    status,
    message: complianceMessage(rule, currentPct, status)
  };
};

/**
 * Evaluate every rule against the current allocation table. An empty portfolio
 * (total value 0) is reported as compliant on every rule at 0%.
 */
export const evaluateRules = (
  rules: AllocationRule[],
  allocations: AllocationTable,
  totalValue: number
): ComplianceCheck[] =>
  rules.map((rule): ComplianceCheck => {
    if (totalValue <= 0) {
      return {
        rule,
        currentPct: 0,
        targetPct: rule.targetPct,
        deviationPct: round2(-rule.targetPct),
        status: 'compliant',
        message: `${rule.axis}/${rule.category}: portfolio is empty`
      };
    }
    return checkRule(rule, allocations[rule.axis][rule.category] ?? 0);
  });

export const gapPriority = (status: ComplianceStatus, gapPct: number): number => {
  if (status === 'violation') return 1;
  const size = Math.abs(gapPct);
  if (size > 5) return 2;
  if (size > 3) return 3;
  return 4;
};

export const deriveGaps = (checks: ComplianceCheck[], totalValue: number, availableCapital: number): AllocationGap[] => {
  const capital = Math.max(0, availableCapital);
  const gaps: AllocationGap[] = [];
  for (const check of checks) {
    if (check.status === 'compliant') continue;
    const gapPct = round2(check.targetPct - check.currentPct);
    if (Math.abs(gapPct) <= GAP_NOISE_PCT) continue;
    const dollars = (Math.abs(gapPct) / 100) * totalValue;
    gaps.push({
      axis: check.rule.axis,
      category: check.rule.category,
      currentPct: check.currentPct,
      targetPct: check.targetPct,
      gapPct,
      requiredDollars: round2(gapPct > 0 ? Math.min(dollars, capital) : dollars),
      priority: gapPriority(check.status, gapPct),
      status: check.status
    });
  }
  return gaps.sort((a, b) => a.priority - b.priority);
};

export interface ComplianceSummary {
  totalChecks: number;
  compliant: number;
  warnings: number;
  violations: number;
  overallStatus: ComplianceStatus;
}

export const summarizeCompliance = (checks: ComplianceCheck[]): ComplianceSummary => {
  const count = (status: ComplianceStatus) => checks.filter((c) => c.status === status).length;
  const violations = count('violation');
  const warnings = count('warning');
  return {
    totalChecks: checks.length,
    compliant: count('compliant'),
    warnings,
    violations,
    overallStatus: violations ? 'violation' : warnings ? 'warning' : 'compliant'
  };
};

export const toComplianceRecords = (
  checks: ComplianceCheck[],
  portfolioValue: number,
  timestamp: string
): ComplianceRecord[] =>
  checks.map((check) => ({
    timestamp,
    axis: check.rule.axis,
    category: check.rule.category,
    currentPct: check.currentPct,
    targetPct: check.targetPct,
    deviationPct: check.deviationPct,
    status: check.status,
    portfolioValue
  }));
