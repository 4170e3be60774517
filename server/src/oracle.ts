import type { OracleClient, OracleRequest } from '@estate-escrow/engine';
import type { ProtonSession } from './session';

/** Sends `reqresolve` to the oracle contract; the answer comes back over HTTP. */
export class ChainOracleClient implements OracleClient {
  constructor(
    private readonly session: ProtonSession,
    private readonly contract: string,
  ) {}

  async requestResolution(request: OracleRequest): Promise<void> {
    const { actor, permission } = this.session.auth;
    const result = await this.session.link.transact({
      actions: [{
        account: this.contract,
        name: 'reqresolve',
        authorization: [{ actor, permission }],
        data: {
          requester: actor,
          lease_id: request.lease_id,
          nonce: request.nonce,
        },
      }],
    });
    console.log(`[oracle] Requested resolution of lease ${request.lease_id} (nonce ${request.nonce}) in ${result.transaction_id}`);
  }
}
