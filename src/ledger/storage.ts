import { LedgerEvent } from '../core/types';
import { validateLedgerEvent } from '../core/schema';
import { appendJSONLine, readJSONLines } from '../core/utils';

export const appendLedgerEvent = (ledgerFile: string, event: LedgerEvent) => {
  appendJSONLine(ledgerFile, event);
};

export const readLedgerEvents = (ledgerFile: string): LedgerEvent[] =>
  readJSONLines(ledgerFile).flatMap((raw) => {
    const parsed = validateLedgerEvent(raw);
    return parsed.success ? [parsed.value] : [];
  });

export const readEventsFor = (ledgerFile: string, eventId: string): LedgerEvent[] =>
  readLedgerEvents(ledgerFile).filter((e) => e.eventId === eventId);
