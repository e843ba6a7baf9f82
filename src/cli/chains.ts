import 'dotenv/config';
import { Command } from 'commander';
import { parseAsOf } from '../core/time';
import { loadConfig } from '../core/utils';
import { detectChains } from '../chains/chainDetector';
import { FileSnapshotProvider } from '../rebalancing/providers';
import { chainReport } from './format';

const program = new Command();

program
  .description('Detect multi-leg option chains in a position snapshot')
  .option('--snapshot <file>', 'position snapshot JSON')
  .option('--window <seconds>', 'seconds between fills that still count as one trade')
  .option('--json', 'print the detection result as JSON', false);

interface ChainsOptions {
  snapshot?: string;
  window?: string;
  json: boolean;
}

const run = async () => {
  const opts = program.parse(process.argv).opts<ChainsOptions>();
  const config = loadConfig();
  const window = opts.window === undefined ? config.chains.timeWindowSeconds : Number(opts.window);
  if (!Number.isFinite(window) || window <= 0) throw new Error(`Invalid --window ${opts.window}`);
  const snapshot = await new FileSnapshotProvider(opts.snapshot ?? config.files.snapshot).getSnapshot();
  const result = detectChains(snapshot.legs, { asOf: parseAsOf(snapshot.asOf), timeWindowSeconds: window });
  if (opts.json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }
  chainReport(result).forEach((line) => console.log(line));
  console.log(`${result.chains.length} chains detected.`);
};

if (require.main === module) {
  run().catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
