import { ComplianceRecord } from '../core/types';
import { validateComplianceRecord } from '../core/schema';
import { appendJSONLine, readJSONLines } from '../core/utils';

export interface ComplianceHistorySink {
  append(records: ComplianceRecord[]): void;
  read(limit?: number): ComplianceRecord[];
}

const tail = <T>(items: T[], limit?: number) => (limit === undefined ? items : items.slice(Math.max(0, items.length - limit)));

export class JsonlComplianceHistory implements ComplianceHistorySink {
  constructor(private readonly filePath: string) {}

  append(records: ComplianceRecord[]) {
    records.forEach((record) => appendJSONLine(this.filePath, record));
  }

  read(limit?: number): ComplianceRecord[] {
    const records = readJSONLines(this.filePath).flatMap((raw) => {
      const parsed = validateComplianceRecord(raw);
      return parsed.success ? [parsed.value] : [];
    });
    return tail(records, limit);
  }
}

export class MemoryComplianceHistory implements ComplianceHistorySink {
  private readonly records: ComplianceRecord[] = [];

  append(records: ComplianceRecord[]) {
    this.records.push(...records);
  }

  read(limit?: number): ComplianceRecord[] {
    return tail([...this.records], limit);
  }
}
