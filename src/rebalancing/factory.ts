import { AppConfig, SectorTable } from '../core/types';
import { AllocationRulesEngine } from '../allocation/rulesEngine';
import { JsonFileRuleStore } from '../allocation/ruleStore';
import { ComplianceHistorySink, JsonlComplianceHistory } from '../allocation/complianceHistory';
import { RebalancingLedger } from '../ledger/ledger';
import { loadSectorTable } from '../portfolio/sectors';
import { FillMonitor } from './fillMonitor';
import {
  FileFillSource,
  FileSnapshotProvider,
  FileUniverseProvider,
  SnapshotProvider,
  UniverseSectorRankingProvider
} from './providers';
import { RebalancingService } from './rebalancingService';

export interface Rebalancer {
  config: AppConfig;
  service: RebalancingService;
  rules: AllocationRulesEngine;
  history: ComplianceHistorySink;
  ledger: RebalancingLedger;
  snapshots: SnapshotProvider;
  sectors: SectorTable;
  createFillMonitor(): FillMonitor;
}

// Wires the file-backed providers and stores named in the config.
export const createRebalancer = (config: AppConfig): Rebalancer => {
  const { files } = config;
  const history = new JsonlComplianceHistory(files.complianceHistory);
  const rules = new AllocationRulesEngine({ store: new JsonFileRuleStore(files.rules), history });
  const ledger = new RebalancingLedger(files.ledger);
  const snapshots = new FileSnapshotProvider(files.snapshot);
  const universe = new FileUniverseProvider(files.universe);
  const sectors = loadSectorTable(files.sectors);
  const service = new RebalancingService({
    snapshots,
    universe,
    sectorRankings: new UniverseSectorRankingProvider(universe),
    rules,
    sectors,
    settings: config.rebalancer,
    timeWindowSeconds: config.chains.timeWindowSeconds,
    journal: ledger
  });
  return {
    config,
    service,
    rules,
    history,
    ledger,
    snapshots,
    sectors,
    createFillMonitor: () =>
      new FillMonitor(
        new FileFillSource(files.fills),
        (fill) => service.trigger('fill_detected', { accountId: fill.accountId, orderId: fill.orderId, symbol: fill.symbol }),
        service.getSettings().fillCheckIntervalSeconds * 1000
      )
  };
};
