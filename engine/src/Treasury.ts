import type { MarketContext } from './context';
import { lockKeys } from './LockRegistry';
import { ValidationError } from './errors';
import type { Continuation, ForceUnlockResolution, TimelockSettings } from './types';

export interface ForceUnlockRequest {
  resolution: ForceUnlockResolution;
  reason: string;
}

/**
 * Owner-only configuration, surplus withdrawal and recovery of settlements
 * whose callback never arrived.
 */
export class Treasury {
  constructor(private readonly ctx: MarketContext) {
    ctx.settlements.register('withdraw_surplus', {
      commit: (c) => {
        ctx.store.emit('treasury.withdrawn', {
          token: c.token,
          recipient: c.recipient,
          amount: c.amount.toString(),
        });
        return [];
      },
    });
  }

  setTimelocks(caller: string, update: Partial<TimelockSettings>): TimelockSettings {
    const { store, access, timelocks } = this.ctx;
    access.requireOwner(caller);

    return store.atomic(() => {
      const next = timelocks.set(update);
      store.emit('config.timelocks_updated', { ...next });
      return next;
    });
  }

  setOracleAccount(caller: string, account: string | null): void {
    const { store, access } = this.ctx;
    access.requireOwner(caller);
    if (account !== null && account.length === 0) {
      throw new ValidationError('oracle account must not be empty');
    }

    store.atomic(() => {
      store.db.prepare('UPDATE market_config SET oracle_account = ? WHERE id = 1').run(account);
      store.emit('config.oracle_updated', { oracle_account: account });
    });
  }

  addSupportedToken(caller: string, token: string): void {
    const { store, access, tokens } = this.ctx;
    access.requireOwner(caller);
    if (!token) {
      throw new ValidationError('token is required');
    }

    store.atomic(() => {
      if (tokens.add(token)) {
        store.emit('config.token_added', { token });
        store.logger.log(`Token ${token} added to whitelist`);
      }
    });
  }

  /** A token can only leave the whitelist once the market holds none of it. */
  removeSupportedToken(caller: string, token: string): void {
    const { store, access, tokens, ledger } = this.ctx;
    access.requireOwner(caller);

    store.atomic(() => {
      if (!tokens.isSupported(token)) {
        throw new ValidationError(`Token ${token} is not supported`);
      }
      const balance = ledger.balanceOf(token);
      if (balance !== 0n) {
        throw new ValidationError(`Token ${token} still has a balance of ${balance.toString()}`);
      }
      tokens.remove(token);
      store.emit('config.token_removed', { token });
    });
  }

  /** Withdraw what the market holds beyond its obligations. */
  async withdrawSurplus(caller: string, token: string, amount: bigint, recipient?: string): Promise<Continuation> {
    const { store, access, ledger, settlements } = this.ctx;
    access.requireOwner(caller);
    if (amount <= 0n) {
      throw new ValidationError('amount must be positive');
    }

    const continuation = store.atomic(() => {
      const surplus = ledger.surplus(token);
      if (amount > surplus) {
        throw new ValidationError(
          `Amount ${amount.toString()} exceeds the surplus of ${surplus.toString()}`
        );
      }
      return settlements.open({
        kind: 'withdraw_surplus',
        entityId: 0,
        locks: [lockKeys.treasury(token)],
        recipient: recipient ?? caller,
        token,
        amount,
        intent: { token },
        memo: `Surplus withdrawal of ${token}`,
      });
    });

    return settlements.dispatch(continuation);
  }

  /**
   * Release the locks of a settlement stuck without a callback. Allowed
   * once it has been pending for the lock-recovery delay.
   */
  forceUnlock(caller: string, continuationId: number, request: ForceUnlockRequest): Continuation {
    const { access, settlements, timelocks } = this.ctx;
    access.requireOwner(caller);
    if (!request.reason || request.reason.trim().length === 0) {
      throw new ValidationError('reason is required');
    }

    const continuation = settlements.require(continuationId);
    if (continuation.status !== 'pending') {
      throw new ValidationError(`Settlement ${continuationId} is already ${continuation.status}`);
    }
    timelocks.requireElapsed('lock_recovery_delay', continuation.created_at, 'Lock recovery');

    return settlements.recover(continuationId, request.resolution, caller, request.reason);
  }
}
