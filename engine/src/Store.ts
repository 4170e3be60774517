import Database from 'better-sqlite3';
import { EventLog } from './EventLog';
import type { EventData, MarketEvent } from './EventLog';

export interface Logger {
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/** Returns the current time in whole seconds since the Unix epoch. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

/**
 * Shared handle passed to every component: the database, the clock, the
 * logger and the event log. All writes go through `atomic`.
 */
export class Store {
  readonly events: EventLog;
  private depth = 0;
  private queued: MarketEvent[] = [];

  constructor(
    readonly db: Database.Database,
    readonly clock: Clock = systemClock,
    readonly logger: Logger = console,
  ) {
    this.events = new EventLog(db);
  }

  now(): number {
    return this.clock();
  }

  /**
   * Run `fn` in a transaction. Nested calls become savepoints. Events
   * emitted inside are published only after the outermost commit, and are
   * dropped with the rows if the block throws.
   */
  atomic<T>(fn: () => T): T {
    const mark = this.queued.length;
    this.depth++;
    let result: T;
    try {
      result = this.db.transaction(fn)();
    } catch (err) {
      this.depth--;
      this.queued.length = mark;
      throw err;
    }
    this.depth--;

    if (this.depth === 0) {
      const ready = this.queued;
      this.queued = [];
      for (const event of ready) {
        this.events.publish(event);
      }
    }
    return result;
  }

  emit(eventName: string, data: EventData): MarketEvent {
    const event = this.events.record(eventName, data, this.now());
    if (this.depth > 0) {
      this.queued.push(event);
    } else {
      this.events.publish(event);
    }
    return event;
  }
}
