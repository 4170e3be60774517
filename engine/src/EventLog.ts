import Database from 'better-sqlite3';

export type EventValue = string | number | boolean | null;
export type EventData = Record<string, EventValue>;

/** Schema version stamped on every record; bump only with additive changes. */
export const EVENT_VERSION = 1;

export interface MarketEvent {
  id: number;
  event_name: string;
  version: number;
  data: EventData;
  timestamp: number;
}

export type EventListener = (event: MarketEvent) => void;

interface EventRow {
  id: number;
  event_name: string;
  version: number;
  data: string;
  timestamp: number;
}

export interface EventQuery {
  name?: string;
  limit?: number;
}

export class EventLog {
  private listeners = new Set<EventListener>();

  constructor(private readonly db: Database.Database) {}

  /**
   * Persist a record. The row belongs to the caller's transaction; publishing
   * to listeners happens separately once that transaction commits.
   */
  record(eventName: string, data: EventData, timestamp: number): MarketEvent {
    const result = this.db.prepare(
      'INSERT INTO events (event_name, version, data, timestamp) VALUES (?, ?, ?, ?)'
    ).run(eventName, EVENT_VERSION, JSON.stringify(data), timestamp);

    return {
      id: Number(result.lastInsertRowid),
      event_name: eventName,
      version: EVENT_VERSION,
      data,
      timestamp,
    };
  }

  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  publish(event: MarketEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        console.error(`Event listener failed for ${event.event_name}:`, err);
      }
    }
  }

  list(query: EventQuery = {}): MarketEvent[] {
    const limit = Math.min(query.limit ?? 100, 1000);
    const rows = query.name
      ? this.db.prepare<unknown[], EventRow>(
          'SELECT * FROM events WHERE event_name = ? ORDER BY id ASC LIMIT ?'
        ).all(query.name, limit)
      : this.db.prepare<unknown[], EventRow>(
          'SELECT * FROM events ORDER BY id ASC LIMIT ?'
        ).all(limit);

    return rows.map(parseEventRow);
  }
}

function parseEventRow(row: EventRow): MarketEvent {
  return {
    id: row.id,
    event_name: row.event_name,
    version: row.version,
    data: parseEventData(row.data),
    timestamp: row.timestamp,
  };
}

function parseEventData(text: string): EventData {
  const parsed: unknown = JSON.parse(text);
  const data: EventData = {};
  if (typeof parsed !== 'object' || parsed === null) return data;

  for (const [key, value] of Object.entries(parsed)) {
    if (
      value === null ||
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean'
    ) {
      data[key] = value;
    }
  }
  return data;
}
