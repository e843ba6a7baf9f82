import 'dotenv/config';
import { Command } from 'commander';
import { loadConfig, writeJSONFile } from '../core/utils';
import { createRebalancer } from '../rebalancing/factory';
import { eventReport, withFileOverrides } from './format';

const program = new Command();

program
  .description('Run one rebalancing pass against the configured snapshot and universe')
  .option('--snapshot <file>', 'position snapshot JSON')
  .option('--universe <file>', 'screened universe JSON')
  .option('--out <file>', 'write the published event as JSON')
  .option('--approve', 'approve every recommendation after publishing', false);

interface RebalanceOptions {
  snapshot?: string;
  universe?: string;
  out?: string;
  approve: boolean;
}

export const runRebalance = async (opts: RebalanceOptions) => {
  const config = withFileOverrides(loadConfig(), opts);
  const { service } = createRebalancer(config);
  const event = await service.trigger('manual', { source: 'cli' });
  eventReport(event).forEach((line) => console.log(line));
  if (opts.approve) {
    const result = await service.approve();
    if (!result.ok) throw new Error(result.error);
    console.log(`Approved ${result.approvedCount ?? 0} of ${result.totalRecommendations} recommendations.`);
  }
  if (opts.out) {
    writeJSONFile(opts.out, service.getCurrentEvent());
    console.log(`Event written to ${opts.out}.`);
  }
};

if (require.main === module) {
  runRebalance(program.parse(process.argv).opts<RebalanceOptions>()).catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
