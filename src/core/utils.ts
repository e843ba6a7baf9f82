import fs from 'fs';
import path from 'path';
import { AppConfig } from './types';
import { validateConfig } from './schema';

export const DEFAULT_CONFIG_PATH = path.resolve(process.cwd(), 'src/config/default.json');

export const ensureDir = (dir: string) => {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

export const readJSONFile = (filePath: string): unknown => {
  const raw = fs.readFileSync(filePath, 'utf-8');
  return JSON.parse(raw);
};

export const writeJSONFile = (filePath: string, data: unknown) => {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
};

const envPath = (name: string, fallback: string) => path.resolve(process.cwd(), process.env[name] || fallback);

export const loadConfig = (configPath: string = DEFAULT_CONFIG_PATH): AppConfig => {
  const parsed = validateConfig(readJSONFile(configPath));
  if (!parsed.success) {
    throw new Error(`Invalid config ${configPath}: ${parsed.errors.join('; ')}`);
  }
  const cfg = parsed.value;
  return {
    ...cfg,
    files: {
      rules: envPath('RULES_FILE', cfg.files.rules),
      complianceHistory: envPath('COMPLIANCE_HISTORY_FILE', cfg.files.complianceHistory),
      ledger: envPath('LEDGER_FILE', cfg.files.ledger),
      snapshot: envPath('SNAPSHOT_FILE', cfg.files.snapshot),
      universe: envPath('UNIVERSE_FILE', cfg.files.universe),
      sectors: envPath('SECTORS_FILE', cfg.files.sectors),
      fills: envPath('FILLS_FILE', cfg.files.fills)
    },
    uiPort: Number(process.env.UI_PORT || cfg.uiPort),
    uiBind: process.env.UI_BIND || cfg.uiBind
  };
};

export const sum = (arr: number[]): number => arr.reduce((a, b) => a + b, 0);

export const clamp = (value: number, lo: number, hi: number): number => Math.min(hi, Math.max(lo, value));

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

export const round2 = (value: number): number => Math.round(value * 100) / 100;

export const appendJSONLine = (filePath: string, record: unknown) => {
  ensureDir(path.dirname(filePath));
  fs.appendFileSync(filePath, `${JSON.stringify(record)}\n`);
};

export const readJSONLines = (filePath: string): unknown[] => {
  if (!fs.existsSync(filePath)) return [];
  const content = fs.readFileSync(filePath, 'utf-8').trim();
  if (!content.length) return [];
  return content.split('\n').flatMap((line, idx) => {
    try {
      return [JSON.parse(line)];
    } catch (err) {
      console.warn(`Skipping malformed line ${idx + 1} in ${filePath}: ${errorMessage(err)}`);
      return [];
    }
  });
};
