import { Store } from './Store';
import { checkedAdd, checkedSub, sumAmounts } from './amount';
import type { SolvencyReport } from './types';

interface AmountRow {
  amount: string;
}

/**
 * Running balance per token account. Mirrors what the external token
 * accounts hold on the market's behalf; every change is checked.
 */
export class BalanceLedger {
  constructor(private readonly store: Store) {}

  balanceOf(token: string): bigint {
    const row = this.store.db.prepare<unknown[], AmountRow>(
      'SELECT amount FROM balances WHERE token = ?'
    ).get(token);
    return row ? BigInt(row.amount) : 0n;
  }

  credit(token: string, amount: bigint): bigint {
    const next = checkedAdd(this.balanceOf(token), amount, 'balance credit');
    this.write(token, next);
    return next;
  }

  debit(token: string, amount: bigint): bigint {
    const next = checkedSub(this.balanceOf(token), amount, 'balance debit');
    this.write(token, next);
    return next;
  }

  /** Sum of everything the market owes out of this token's balance. */
  obligations(token: string): bigint {
    const held = this.store.db.prepare<unknown[], AmountRow>(
      "SELECT held_amount AS amount FROM bids WHERE token = ? AND held_amount != '0'"
    ).all(token);
    const escrowed = this.store.db.prepare<unknown[], AmountRow>(
      "SELECT escrow_amount AS amount FROM leases WHERE token = ? AND escrow_amount != '0'"
    ).all(token);

    return sumAmounts(
      [...held, ...escrowed].map((r) => BigInt(r.amount)),
      'obligations'
    );
  }

  surplus(token: string): bigint {
    const balance = this.balanceOf(token);
    const owed = this.obligations(token);
    return balance > owed ? balance - owed : 0n;
  }

  audit(): SolvencyReport[] {
    const tokens = this.store.db.prepare<unknown[], { token: string }>(
      'SELECT token FROM balances UNION SELECT token FROM supported_tokens ORDER BY token'
    ).all();

    return tokens.map(({ token }) => {
      const balance = this.balanceOf(token);
      const obligations = this.obligations(token);
      return {
        token,
        balance,
        obligations,
        surplus: balance > obligations ? balance - obligations : 0n,
        solvent: obligations <= balance,
      };
    });
  }

  private write(token: string, amount: bigint): void {
    this.store.db.prepare(`
      INSERT INTO balances (token, amount) VALUES (?, ?)
      ON CONFLICT(token) DO UPDATE SET amount = excluded.amount
    `).run(token, amount.toString());
  }
}
