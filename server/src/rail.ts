import type { TokenRail, TransferAck, TransferRequest } from '@estate-escrow/engine';
import type { TokenConfig } from './config';
import type { ProtonSession } from './session';

/**
 * Token rail backed by `transfer` actions on the token contracts. The
 * transaction either lands or throws, so every request is answered
 * committed or failed; nothing is deferred.
 */
export class ChainTokenRail implements TokenRail {
  private readonly tokens: Map<string, TokenConfig>;

  constructor(
    private readonly session: ProtonSession,
    tokens: TokenConfig[],
  ) {
    this.tokens = new Map(tokens.map((t) => [t.contract, t]));
  }

  async requestTransfer(request: TransferRequest): Promise<TransferAck> {
    const token = this.tokens.get(request.token_account);
    if (!token) {
      return { status: 'failed', reason: `No symbol configured for token contract ${request.token_account}` };
    }

    const { actor, permission } = this.session.auth;
    try {
      const result = await this.session.link.transact({
        actions: [{
          account: token.contract,
          name: 'transfer',
          authorization: [{ actor, permission }],
          data: {
            from: actor,
            to: request.recipient,
            quantity: formatQuantity(BigInt(request.amount), token),
            memo: request.memo,
          },
        }],
      });
      console.log(`[rail] Settlement ${request.continuation_id} sent in ${result.transaction_id}`);
      return { status: 'committed' };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.error(`[rail] Settlement ${request.continuation_id} failed: ${reason}`);
      return { status: 'failed', reason };
    }
  }
}

/**
 * Format base units as an asset string using integer math,
 * e.g. 1005000 with precision 4 → "100.5000 XPR".
 */
export function formatQuantity(amount: bigint, token: TokenConfig): string {
  if (token.precision === 0) {
    return `${amount.toString()} ${token.symbol}`;
  }
  const base = 10n ** BigInt(token.precision);
  const whole = amount / base;
  const frac = (amount % base).toString().padStart(token.precision, '0');
  return `${whole.toString()}.${frac} ${token.symbol}`;
}
