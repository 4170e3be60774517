import { Api, JsonRpc, JsSignatureProvider } from '@proton/js';

export interface TransactAction {
  account: string;
  name: string;
  authorization: Array<{
    actor: string;
    permission: string;
  }>;
  data: Record<string, unknown>;
}

export interface TransactArgs {
  actions: TransactAction[];
}

export interface TransactionResult {
  transaction_id: string;
}

export interface ProtonSession {
  auth: {
    actor: string;
    permission: string;
  };
  link: {
    transact: (args: TransactArgs) => Promise<TransactionResult>;
  };
}

export interface SessionConfig {
  rpcEndpoint: string;
  privateKey?: string;
  account?: string;
  permission?: string;
}

/**
 * Create a server-side signing session over @proton/js.
 *
 * Required: XPR_PRIVATE_KEY, XPR_ACCOUNT. Optional: XPR_PERMISSION
 * (defaults to 'active').
 */
export function createSession(config: SessionConfig): { rpc: JsonRpc; session: ProtonSession } {
  const privateKey = config.privateKey || process.env.XPR_PRIVATE_KEY;
  const account = config.account || process.env.XPR_ACCOUNT;
  const permission = config.permission || process.env.XPR_PERMISSION || 'active';

  if (!privateKey) {
    throw new Error('XPR_PRIVATE_KEY environment variable is required');
  }
  if (!account) {
    throw new Error('XPR_ACCOUNT environment variable is required');
  }

  const rpc = new JsonRpc(config.rpcEndpoint);
  const signatureProvider = new JsSignatureProvider([privateKey]);
  const api = new Api({ rpc, signatureProvider });

  const session: ProtonSession = {
    auth: { actor: account, permission },
    link: {
      transact: async (args: TransactArgs): Promise<TransactionResult> => {
        const result: unknown = await api.transact(
          { actions: args.actions },
          { blocksBehind: 3, expireSeconds: 30 }
        );
        return toTransactionResult(result);
      },
    },
  };

  return { rpc, session };
}

export function toTransactionResult(result: unknown): TransactionResult {
  if (
    typeof result === 'object' &&
    result !== null &&
    'transaction_id' in result &&
    typeof result.transaction_id === 'string'
  ) {
    return { transaction_id: result.transaction_id };
  }
  throw new Error('Transaction was not broadcast: no transaction_id in response');
}
