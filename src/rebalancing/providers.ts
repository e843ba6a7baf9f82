import fs from 'fs';
import { Fill, PositionSnapshot, SectorRanking, UniverseCandidate } from '../core/types';
import { validateFills, validateSnapshot, validateUniverse } from '../core/schema';
import { readJSONFile, round2 } from '../core/utils';

export interface SnapshotProvider {
  getSnapshot(): Promise<PositionSnapshot>;
}

export interface UniverseProvider {
  getCandidates(): Promise<UniverseCandidate[]>;
}

export interface SectorRankingProvider {
  getRankings(): Promise<SectorRanking[]>;
}

export interface FillSource {
  fetchFills(): Promise<Fill[]>;
}

export class FileSnapshotProvider implements SnapshotProvider {
  constructor(private readonly filePath: string) {}

  async getSnapshot(): Promise<PositionSnapshot> {
    const parsed = validateSnapshot(readJSONFile(this.filePath));
    if (!parsed.success) {
      throw new Error(`Invalid position snapshot ${this.filePath}: ${parsed.errors.join('; ')}`);
    }
    return parsed.value;
  }
}

export class FileUniverseProvider implements UniverseProvider {
  constructor(private readonly filePath: string) {}

  async getCandidates(): Promise<UniverseCandidate[]> {
    const parsed = validateUniverse(readJSONFile(this.filePath));
    if (!parsed.success) {
      throw new Error(`Invalid universe ${this.filePath}: ${parsed.errors.join('; ')}`);
    }
    return parsed.value;
  }
}

/** Ranks sectors by the mean screening score of their candidates in the universe. */
export class UniverseSectorRankingProvider implements SectorRankingProvider {
  constructor(private readonly universe: UniverseProvider) {}

  async getRankings(): Promise<SectorRanking[]> {
    const candidates = await this.universe.getCandidates();
    const totals = new Map<string, { sum: number; count: number }>();
    for (const c of candidates) {
      if (!c.sector) continue;
      const entry = totals.get(c.sector) ?? { sum: 0, count: 0 };
      totals.set(c.sector, { sum: entry.sum + c.screeningScore, count: entry.count + 1 });
    }
    return Array.from(totals.entries())
      .map(([sector, { sum, count }]) => ({ sector, score: round2(sum / count) }))
      .sort((a, b) => b.score - a.score);
  }
}

export class FileFillSource implements FillSource {
  constructor(private readonly filePath: string) {}

  async fetchFills(): Promise<Fill[]> {
    if (!fs.existsSync(this.filePath)) return [];
    const parsed = validateFills(readJSONFile(this.filePath));
    if (!parsed.success) {
      throw new Error(`Invalid fills ${this.filePath}: ${parsed.errors.join('; ')}`);
    }
    return parsed.value;
  }
}
