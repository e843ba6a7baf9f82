import { AppConfig, Chain, ComplianceCheck, RebalancingEvent, TradeRecommendation } from '../core/types';
import { ChainDetectionResult } from '../chains/chainDetector';
import { ComplianceSummary } from '../allocation/compliance';

const money = (value: number) => `$${value.toLocaleString('en-US', { maximumFractionDigits: 2 })}`;

export const withFileOverrides = (
  config: AppConfig,
  overrides: Partial<Pick<AppConfig['files'], 'snapshot' | 'universe'>>
): AppConfig => ({
  ...config,
  files: {
    ...config.files,
    snapshot: overrides.snapshot ?? config.files.snapshot,
    universe: overrides.universe ?? config.files.universe
  }
});

export const formatRecommendation = (rec: TradeRecommendation): string => {
  const capital = rec.capitalRequired > 0 ? ` ${money(rec.capitalRequired)}` : '';
  return `[P${rec.priority}] ${rec.type.toUpperCase()} ${rec.action} ${rec.quantity} ${rec.symbol} (${rec.strategy})${capital} conf ${rec.confidence} - ${rec.rationale}`;
};

export const formatCheck = (check: ComplianceCheck): string =>
  `${check.status.toUpperCase().padEnd(9)} ${check.message}`;

export const formatChain = (chain: Chain): string =>
  `${chain.id}: ${chain.description} [${chain.legIds.length} leg${chain.legIds.length === 1 ? '' : 's'}]`;

export const eventReport = (event: RebalancingEvent): string[] => {
  const lines = [
    `Event ${event.id} (${event.trigger}) ${event.status} at ${event.createdAt}`,
    `Portfolio value ${money(event.portfolio.totalMarketValue)}, buying power ${money(event.portfolio.buyingPower)}`
  ];
  event.gaps.forEach((g) =>
    lines.push(`Gap ${g.axis}/${g.category}: ${g.gapPct > 0 ? '+' : ''}${g.gapPct}pp (${money(g.requiredDollars)}), priority ${g.priority}`)
  );
  event.stages
    .filter((s) => !s.ok)
    .forEach((s) => lines.push(`Stage ${s.stage} failed: ${s.cause ?? 'unknown error'}`));
  if (!event.recommendations.length) lines.push('No recommendations.');
  event.recommendations.forEach((r) => lines.push(formatRecommendation(r)));
  const { summary } = event;
  lines.push(
    `${summary.openingCount} opening, ${summary.closingCount} closing; capital ${money(summary.totalCapitalRequired)}, expected return ${money(summary.totalExpectedReturn)}`
  );
  return lines;
};

export const chainReport = (result: ChainDetectionResult): string[] => {
  const lines: string[] = [];
  result.byUnderlying.forEach((group) => {
    lines.push(`${group.underlying} (${group.totalLegs} legs)`);
    group.chains.forEach((chain) => lines.push(`  ${formatChain(chain)}`));
  });
  result.excluded.forEach((e) => lines.push(`Excluded ${e.symbol}: ${e.reason}`));
  return lines;
};

export const complianceReport = (summary: ComplianceSummary, checks: ComplianceCheck[]): string[] => [
  `Overall ${summary.overallStatus}: ${summary.compliant} compliant, ${summary.warnings} warnings, ${summary.violations} violations`,
  ...checks.map(formatCheck)
];
