import { SectorInfo, SectorTable } from '../core/types';
import { validateSectorTable } from '../core/schema';
import { readJSONFile } from '../core/utils';

export const UNKNOWN_SECTOR: SectorInfo = { sector: 'Other', assetClass: 'equity' };

export const loadSectorTable = (filePath: string): SectorTable => {
  const parsed = validateSectorTable(readJSONFile(filePath));
  if (!parsed.success) {
    throw new Error(`Invalid sector table ${filePath}: ${parsed.errors.join('; ')}`);
  }
  return parsed.value;
};

export const lookupSector = (table: SectorTable, symbol: string): SectorInfo => {
  const key = symbol.toUpperCase();
  return Object.hasOwn(table, key) ? table[key] : UNKNOWN_SECTOR;
};
