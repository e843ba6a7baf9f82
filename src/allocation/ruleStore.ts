import fs from 'fs';
import { AllocationRule } from '../core/types';
import { parseStoredRules } from '../core/schema';
import { readJSONFile, writeJSONFile } from '../core/utils';

export interface RuleStore {
  load(): AllocationRule[];
  save(rules: AllocationRule[]): void;
}

export class JsonFileRuleStore implements RuleStore {
  constructor(private readonly filePath: string) {}

  load(): AllocationRule[] {
    if (!fs.existsSync(this.filePath)) return [];
    const parsed = parseStoredRules(readJSONFile(this.filePath));
    if (!parsed.success) {
      throw new Error(`Invalid allocation rules in ${this.filePath}: ${parsed.errors.join('; ')}`);
    }
    return parsed.value;
  }

  save(rules: AllocationRule[]) {
    writeJSONFile(this.filePath, rules);
  }
}

export class MemoryRuleStore implements RuleStore {
  private rules: AllocationRule[];

  constructor(initial: AllocationRule[] = []) {
    this.rules = initial.map((r) => ({ ...r }));
  }

  load(): AllocationRule[] {
    return this.rules.map((r) => ({ ...r }));
  }

  save(rules: AllocationRule[]) {
    this.rules = rules.map((r) => ({ ...r }));
  }
}
