import 'dotenv/config';
import { Command } from 'commander';
import { loadConfig } from '../core/utils';
import { createRebalancer } from '../rebalancing/factory';
import { analyzePortfolio } from '../portfolio/portfolioAnalyzer';
import { complianceReport, withFileOverrides } from './format';

const program = new Command();

program.description('Inspect and edit allocation rules');

program
  .command('list')
  .description('print every allocation rule')
  .action(() => {
    const { rules } = createRebalancer(loadConfig());
    rules.listRules().forEach((r) => {
      console.log(
        `${r.axis}/${r.category}: target ${r.targetPct}% (min ${r.minPct}%, max ${r.maxPct}%, tolerance ${r.tolerancePct}pp)`
      );
    });
    const summary = rules.summary();
    console.log(`${summary.totalRules} rules, last updated ${summary.lastUpdated ?? 'never'}.`);
  });

program
  .command('set')
  .description('create or replace the rule for an axis/category')
  .requiredOption('--axis <axis>', 'asset | duration | strategy')
  .requiredOption('--category <category>', 'allocation category')
  .requiredOption('--target <pct>', 'target percentage')
  .requiredOption('--min <pct>', 'minimum percentage')
  .requiredOption('--max <pct>', 'maximum percentage')
  .option('--tolerance <pct>', 'tolerance in percentage points')
  .action((opts: { axis: string; category: string; target: string; min: string; max: string; tolerance?: string }) => {
    const { service } = createRebalancer(loadConfig());
    const result = service.updateRules([
      {
        axis: opts.axis,
        category: opts.category,
        targetPct: Number(opts.target),
        minPct: Number(opts.min),
        maxPct: Number(opts.max),
        ...(opts.tolerance === undefined ? {} : { tolerancePct: Number(opts.tolerance) })
      }
    ]);
    if (!result.success) throw new Error(result.errors.join('; '));
    console.log(`Rule ${opts.axis}/${opts.category} saved.`);
  });

program
  .command('compliance')
  .description('check the current snapshot against the rules')
  .option('--snapshot <file>', 'position snapshot JSON')
  .action(async (opts: { snapshot?: string }) => {
    const config = withFileOverrides(loadConfig(), opts);
    const { rules, snapshots, sectors } = createRebalancer(config);
    const portfolio = analyzePortfolio(await snapshots.getSnapshot(), {
      sectors,
      timeWindowSeconds: config.chains.timeWindowSeconds
    });
    const { checks, gaps } = rules.identifyGaps(portfolio.allocations, portfolio.totalMarketValue, portfolio.buyingPower);
    complianceReport(rules.complianceSummary(checks), checks).forEach((line) => console.log(line));
    console.log(`${gaps.length} actionable gaps.`);
  });

if (require.main === module) {
  program.parseAsync(process.argv).catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
