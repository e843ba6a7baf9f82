import crypto from 'crypto';
import { EventStatus, LedgerEvent, LedgerEventType } from '../core/types';
import { appendLedgerEvent, readEventsFor, readLedgerEvents } from './storage';

export const makeEvent = (
  eventId: string,
  type: LedgerEventType,
  details?: Record<string, unknown>,
  timestamp: Date = new Date()
): LedgerEvent => ({
  id: crypto.randomUUID(),
  eventId,
  timestamp: timestamp.toISOString(),
  type,
  details
});

export interface LifecycleJournal {
  record(eventId: string, type: LedgerEventType, details?: Record<string, unknown>): LedgerEvent;
}

export type LedgerStatus = EventStatus | 'in_progress' | 'failed' | 'unknown';

const STATUS_BY_TYPE: Partial<Record<LedgerEventType, LedgerStatus>> = {
  REBALANCE_STARTED: 'in_progress',
  REBALANCE_FAILED: 'failed',
  EVENT_PUBLISHED: 'pending',
  EVENT_APPROVED: 'approved',
  EVENT_REJECTED: 'rejected',
  EVENT_EXECUTED: 'executed'
};

const byTime = (a: LedgerEvent, b: LedgerEvent) => Date.parse(a.timestamp) - Date.parse(b.timestamp);

// Append-only JSONL journal of rebalancing lifecycle transitions.
export class RebalancingLedger implements LifecycleJournal {
  constructor(private readonly ledgerFile: string) {}

  record(eventId: string, type: LedgerEventType, details?: Record<string, unknown>): LedgerEvent {
    const event = makeEvent(eventId, type, details);
    appendLedgerEvent(this.ledgerFile, event);
    return event;
  }

  getEvents(): LedgerEvent[] {
    return readLedgerEvents(this.ledgerFile);
  }

  getEventsFor(eventId: string): LedgerEvent[] {
    return readEventsFor(this.ledgerFile, eventId);
  }

  getStatus(eventId: string): LedgerStatus {
    const last = this.getEventsFor(eventId)
      .filter((e) => STATUS_BY_TYPE[e.type] !== undefined)
      .sort(byTime)
      .at(-1);
    return last ? STATUS_BY_TYPE[last.type] ?? 'unknown' : 'unknown';
  }

  getRecent(limit = 10): { eventId: string; status: LedgerStatus }[] {
    const latest = new Map<string, number>();
    for (const evt of this.getEvents()) {
      const ts = Date.parse(evt.timestamp);
      if (STATUS_BY_TYPE[evt.type] === undefined) continue;
      if ((latest.get(evt.eventId) ?? -Infinity) <= ts) latest.set(evt.eventId, ts);
    }
    return Array.from(latest.entries())
      .sort(([, a], [, b]) => b - a)
      .slice(0, limit)
      .map(([eventId]) => ({ eventId, status: this.getStatus(eventId) }));
  }
}
