import { Store } from './Store';
import { BalanceLedger } from './BalanceLedger';
import { LockRegistry } from './LockRegistry';
import { ExternalCallFailure, NotFoundError, ValidationError } from './errors';
import { parseContinuationRow } from './rows';
import type {
  Continuation,
  ContinuationRow,
  ContinuationStatus,
  ForceUnlockResolution,
  SettlementIntent,
  SettlementKind,
} from './types';

// ============== Rail Interface ==============

export interface TransferRequest {
  continuation_id: number;
  recipient: string;
  token_account: string;
  /** Base units, decimal string */
  amount: string;
  memo: string;
}

/**
 * `deferred` means the rail accepted the request but will report the
 * outcome later through the settlement callback.
 */
export type TransferAck =
  | { status: 'committed' }
  | { status: 'failed'; reason: string }
  | { status: 'deferred' };

export interface TokenRail {
  requestTransfer(request: TransferRequest): Promise<TransferAck>;
}

export type SettlementOutcome =
  | { success: true }
  | { success: false; reason: string };

// ============== Plans & Handlers ==============

export interface SettlementPlan {
  kind: SettlementKind;
  entityId: number;
  locks: string[];
  recipient: string;
  token: string;
  amount: bigint;
  intent: SettlementIntent;
  memo?: string;
}

/**
 * Applies a continuation's post-state. `commit` runs inside the callback's
 * transaction after the balance debit and returns follow-up settlements to
 * start once that transaction is durable.
 */
export interface SettlementHandler {
  commit(continuation: Continuation): SettlementPlan[];
  rollback?(continuation: Continuation, reason: string): void;
}

export class SettlementCoordinator {
  private handlers = new Map<SettlementKind, SettlementHandler>();
  private inflight = new Set<Promise<void>>();

  constructor(
    private readonly store: Store,
    private readonly ledger: BalanceLedger,
    private readonly locks: LockRegistry,
    private readonly rail: TokenRail,
  ) {}

  register(kind: SettlementKind, handler: SettlementHandler): void {
    this.handlers.set(kind, handler);
  }

  get(id: number): Continuation | null {
    const row = this.store.db.prepare<unknown[], ContinuationRow>(
      'SELECT * FROM continuations WHERE id = ?'
    ).get(id);
    return row ? parseContinuationRow(row) : null;
  }

  require(id: number): Continuation {
    const continuation = this.get(id);
    if (!continuation) {
      throw new NotFoundError(`Settlement ${id} not found`);
    }
    return continuation;
  }

  pending(): Continuation[] {
    return this.store.db.prepare<unknown[], ContinuationRow>(
      "SELECT * FROM continuations WHERE status = 'pending' ORDER BY id ASC"
    ).all().map(parseContinuationRow);
  }

  /**
   * Persist a continuation and take its locks. Runs in the caller's
   * transaction so validation, lock and continuation commit together.
   */
  open(plan: SettlementPlan): Continuation {
    if (!this.handlers.has(plan.kind)) {
      throw new Error(`No settlement handler registered for ${plan.kind}`);
    }
    if (plan.amount < 0n) {
      throw new ValidationError('Settlement amount must not be negative');
    }

    return this.store.atomic(() => {
      this.locks.assertFree(plan.locks);
      const result = this.store.db.prepare(`
        INSERT INTO continuations (kind, entity_id, lock_keys, recipient, token, amount, memo, intent, status, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, 'pending', ?)
      `).run(
        plan.kind,
        plan.entityId,
        JSON.stringify(plan.locks),
        plan.recipient,
        plan.token,
        plan.amount.toString(),
        plan.memo ?? `${plan.kind} ${plan.entityId}`,
        JSON.stringify(plan.intent),
        this.store.now()
      );
      const id = Number(result.lastInsertRowid);
      this.locks.tryAcquire(plan.locks, id);

      this.store.emit('settlement.requested', {
        continuation_id: id,
        kind: plan.kind,
        entity_id: plan.entityId,
        recipient: plan.recipient,
        token: plan.token,
        amount: plan.amount.toString(),
      });
      return this.require(id);
    });
  }

  /**
   * Send the transfer request and apply the outcome. Resolves with the
   * continuation (still pending if the rail deferred); rejects with
   * ExternalCallFailure after a rollback.
   */
  async dispatch(continuation: Continuation): Promise<Continuation> {
    if (continuation.amount === 0n) {
      return this.resolve(continuation.id, { success: true });
    }

    let ack: TransferAck;
    try {
      ack = await this.rail.requestTransfer({
        continuation_id: continuation.id,
        recipient: continuation.recipient,
        token_account: continuation.token,
        amount: continuation.amount.toString(),
        memo: `settle:${continuation.id}`,
      });
    } catch (err) {
      ack = { status: 'failed', reason: err instanceof Error ? err.message : String(err) };
    }

    if (ack.status === 'deferred') {
      this.store.logger.log(`Settlement ${continuation.id} awaiting callback`);
      return this.require(continuation.id);
    }

    // The callback may have arrived while the request was in flight
    const current = this.require(continuation.id);
    if (current.status !== 'pending') {
      return current;
    }

    const outcome: SettlementOutcome = ack.status === 'committed'
      ? { success: true }
      : { success: false, reason: ack.reason };
    const resolved = this.resolve(continuation.id, outcome);

    if (resolved.status === 'rolled_back') {
      throw new ExternalCallFailure(
        `Transfer for settlement ${continuation.id} failed: ${resolved.failure_reason ?? 'unknown'}`
      );
    }
    return resolved;
  }

  /** Callback entry point, correlated strictly by continuation id. */
  resolve(id: number, outcome: SettlementOutcome): Continuation {
    const { continuation, followUps } = this.store.atomic(() => {
      const current = this.require(id);
      if (current.status !== 'pending') {
        throw new ValidationError(`Settlement ${id} is already ${current.status}`);
      }
      return outcome.success
        ? this.applyCommit(current, 'committed')
        : this.applyRollback(current, outcome.reason, 'rolled_back');
    });

    this.launchAll(followUps);
    return continuation;
  }

  /**
   * Release a continuation whose callback never arrived. `commit` applies it
   * as if the transfer succeeded; `abandon` rolls it back. Each released
   * lock is written to the audit table.
   */
  recover(id: number, resolution: ForceUnlockResolution, actor: string, reason: string): Continuation {
    const { continuation, followUps } = this.store.atomic(() => {
      const current = this.require(id);
      if (current.status !== 'pending') {
        throw new ValidationError(`Settlement ${id} is already ${current.status}`);
      }

      const now = this.store.now();
      const audit = this.store.db.prepare(`
        INSERT INTO lock_audit (lock_key, continuation_id, released_by, resolution, reason, timestamp)
        VALUES (?, ?, ?, ?, ?, ?)
      `);
      for (const key of current.lock_keys) {
        if (this.locks.holderOf(key) === id) {
          audit.run(key, id, actor, resolution, reason, now);
        }
      }

      const result = resolution === 'commit'
        ? this.applyCommit(current, 'committed')
        : this.applyRollback(current, `abandoned by ${actor}: ${reason}`, 'abandoned');

      this.store.emit('lock.force_released', {
        continuation_id: id,
        locks: current.lock_keys.join(','),
        resolution,
        released_by: actor,
        reason,
      });
      this.store.logger.log(`Settlement ${id} force-released by ${actor} (${resolution})`);
      return result;
    });

    this.launchAll(followUps);
    return continuation;
  }

  /** Open and dispatch each plan on its own; one failure never affects another. */
  launchAll(plans: SettlementPlan[]): void {
    for (const plan of plans) {
      this.launch(plan);
    }
  }

  /** Wait until every follow-up dispatch has finished. */
  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  private launch(plan: SettlementPlan): void {
    let continuation: Continuation;
    try {
      continuation = this.open(plan);
    } catch (err) {
      this.store.logger.error(`Could not start ${plan.kind} for ${plan.entityId}:`, err);
      return;
    }

    const task = this.dispatch(continuation).then(
      () => undefined,
      (err: unknown) => {
        this.store.logger.error(`Settlement ${continuation.id} (${plan.kind}) failed:`, err);
      }
    );
    this.inflight.add(task);
    task.finally(() => this.inflight.delete(task)).catch((err: unknown) => {
      this.store.logger.error('Settlement tracking failed:', err);
    });
  }

  private handlerFor(kind: SettlementKind): SettlementHandler {
    const handler = this.handlers.get(kind);
    if (!handler) {
      throw new Error(`No settlement handler registered for ${kind}`);
    }
    return handler;
  }

  private applyCommit(
    continuation: Continuation,
    status: ContinuationStatus,
  ): { continuation: Continuation; followUps: SettlementPlan[] } {
    if (continuation.amount > 0n) {
      this.ledger.debit(continuation.token, continuation.amount);
    }
    const followUps = this.handlerFor(continuation.kind).commit(continuation);
    this.finish(continuation, status, null);

    this.store.emit('settlement.committed', {
      continuation_id: continuation.id,
      kind: continuation.kind,
      entity_id: continuation.entity_id,
      recipient: continuation.recipient,
      token: continuation.token,
      amount: continuation.amount.toString(),
    });
    return { continuation: this.require(continuation.id), followUps };
  }

  private applyRollback(
    continuation: Continuation,
    reason: string,
    status: ContinuationStatus,
  ): { continuation: Continuation; followUps: SettlementPlan[] } {
    this.handlerFor(continuation.kind).rollback?.(continuation, reason);
    this.finish(continuation, status, reason);

    this.store.emit('settlement.failed', {
      continuation_id: continuation.id,
      kind: continuation.kind,
      entity_id: continuation.entity_id,
      reason,
    });
    this.store.logger.error(`Settlement ${continuation.id} (${continuation.kind}) rolled back: ${reason}`);
    return { continuation: this.require(continuation.id), followUps: [] };
  }

  private finish(continuation: Continuation, status: ContinuationStatus, reason: string | null): void {
    this.store.db.prepare(
      'UPDATE continuations SET status = ?, failure_reason = ?, resolved_at = ? WHERE id = ?'
    ).run(status, reason, this.store.now(), continuation.id);
    this.locks.releaseAll(continuation.lock_keys);
  }
}
