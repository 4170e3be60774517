import { Store } from './Store';
import { ReentrancyViolation } from './errors';

export const lockKeys = {
  bid: (id: number): string => `bid:${id}`,
  property: (id: number): string => `property:${id}`,
  lease: (id: number): string => `lease:${id}`,
  treasury: (token: string): string => `treasury:${token}`,
};

export interface LockToken {
  keys: string[];
  holder: number;
}

interface LockRow {
  key: string;
  continuation_id: number;
  acquired_at: number;
}

/**
 * Keys of entities with a settlement in flight. A held key blocks every
 * other mutation of that entity until the settlement's callback releases it.
 */
export class LockRegistry {
  constructor(private readonly store: Store) {}

  /** Take all keys or none. */
  tryAcquire(keys: string[], holder: number): LockToken {
    this.assertFree(keys);
    const now = this.store.now();
    const insert = this.store.db.prepare(
      'INSERT INTO locks (key, continuation_id, acquired_at) VALUES (?, ?, ?)'
    );
    this.store.atomic(() => {
      for (const key of new Set(keys)) {
        insert.run(key, holder, now);
      }
    });
    return { keys: [...new Set(keys)], holder };
  }

  release(key: string): void {
    this.store.db.prepare('DELETE FROM locks WHERE key = ?').run(key);
  }

  releaseAll(keys: string[]): void {
    for (const key of keys) {
      this.release(key);
    }
  }

  isHeld(key: string): boolean {
    return this.holderOf(key) !== null;
  }

  holderOf(key: string): number | null {
    const row = this.store.db.prepare<unknown[], LockRow>(
      'SELECT * FROM locks WHERE key = ?'
    ).get(key);
    return row ? row.continuation_id : null;
  }

  assertFree(keys: string[]): void {
    for (const key of keys) {
      const holder = this.holderOf(key);
      if (holder !== null) {
        throw new ReentrancyViolation(
          `${key} is locked by in-flight settlement ${holder}`,
          key
        );
      }
    }
  }

  held(): LockRow[] {
    return this.store.db.prepare<unknown[], LockRow>(
      'SELECT * FROM locks ORDER BY acquired_at ASC, key ASC'
    ).all();
  }
}
