import { Fill } from '../core/types';
import { errorMessage } from '../core/utils';
import { FillSource } from './providers';

export type FillHandler = (fill: Fill) => Promise<unknown>;

export const fillKey = (fill: Pick<Fill, 'accountId' | 'orderId'>) => `${fill.accountId}:${fill.orderId}`;

/**
 * Polls a fill source on a fixed interval. Each fill seen for the first time is
 * remembered and handed to the handler, which normally triggers a rebalancing pass.
 */
export class FillMonitor {
  private timer?: NodeJS.Timeout;
  private polling = false;
  private readonly known = new Set<string>();

  constructor(
    private readonly source: FillSource,
    private readonly onFill: FillHandler,
    private readonly intervalMs: number
  ) {}

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick().catch((err) => console.error(`Fill monitor tick failed: ${errorMessage(err)}`));
    }, this.intervalMs);
    console.log(`Fill monitor polling every ${Math.round(this.intervalMs / 1000)}s.`);
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  knownFills(): string[] {
    return Array.from(this.known);
  }

  // Marks existing fills as seen without triggering anything.
  async prime(): Promise<number> {
    const fills = await this.source.fetchFills();
    fills.forEach((f) => this.known.add(fillKey(f)));
    return fills.length;
  }

  async tick(): Promise<number> {
    if (this.polling) return 0;
    this.polling = true;
    let handled = 0;
    try {
      const fills = await this.source.fetchFills();
      for (const fill of fills) {
        const key = fillKey(fill);
        if (this.known.has(key)) continue;
        this.known.add(key);
        console.log(`New fill ${key} (${fill.symbol} x${fill.quantity} @ ${fill.price}).`);
        try {
          await this.onFill(fill);
        } catch (err) {
          console.error(`Rebalancing after fill ${key} failed: ${errorMessage(err)}`);
        }
        handled += 1;
      }
    } catch (err) {
      console.error(`Fill poll failed: ${errorMessage(err)}`);
    } finally {
      this.polling = false;
    }
    return handled;
  }
}
