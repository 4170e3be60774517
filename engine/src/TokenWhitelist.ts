import { Store } from './Store';

/** Token accounts the market accepts deposits from. */
export class TokenWhitelist {
  constructor(private readonly store: Store) {}

  isSupported(token: string): boolean {
    return this.store.db.prepare('SELECT 1 FROM supported_tokens WHERE token = ?').get(token) !== undefined;
  }

  list(): string[] {
    return this.store.db.prepare<unknown[], { token: string }>(
      'SELECT token FROM supported_tokens ORDER BY token'
    ).all().map((r) => r.token);
  }

  add(token: string): boolean {
    const result = this.store.db.prepare(
      'INSERT OR IGNORE INTO supported_tokens (token, added_at) VALUES (?, ?)'
    ).run(token, this.store.now());
    return result.changes > 0;
  }

  remove(token: string): boolean {
    return this.store.db.prepare('DELETE FROM supported_tokens WHERE token = ?').run(token).changes > 0;
  }
}
