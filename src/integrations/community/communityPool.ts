/**
 * Community pool: a separately custodied fund whose owner is governance.
 *
 * Only the owner may spend or reconfigure it, and a single spend is capped
 * by the spend limit.
 */

import { PollMessage } from '../../domain/governance/pollMessages.js';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import { COMMUNITY_ACCOUNT } from '../../infra/storage/defaultState.js';
import { parseAmount } from '../../utils/amount.js';
import { DispatchContext, OwnedContract } from '../ownedContracts.js';

export { COMMUNITY_ACCOUNT };

const amountOf = (value: string): bigint => {
  const parsed = parseAmount(value);
  if (parsed === null) throw new DomainError(ErrorCode.InvalidAmount, 400, `Invalid amount ${value}.`);
  return parsed;
};

export class CommunityPool implements OwnedContract {
  readonly address = COMMUNITY_ACCOUNT;

  handle(sender: string, message: PollMessage, ctx: DispatchContext): void {
    const pool = ctx.state.community;
    if (pool.owner !== sender) {
      throw new DomainError(ErrorCode.Unauthorized, 403, `${sender} does not own the community pool.`);
    }

    switch (message.kind) {
      case 'community_spend': {
        const amount = amountOf(message.amount);
        if (amount > pool.spendLimit) {
          throw new DomainError(ErrorCode.SpendLimitExceeded, 400, 'Cannot spend more than spend_limit.', {
            amount: message.amount,
            spendLimit: pool.spendLimit.toString(),
          });
        }
        ctx.ledger.transfer(COMMUNITY_ACCOUNT, message.recipient, amount);
        return;
      }
      case 'community_update_config': {
        if (message.spendLimit !== undefined) pool.spendLimit = amountOf(message.spendLimit);
        if (message.owner !== undefined) pool.owner = message.owner;
        return;
      }
      default:
        throw new DomainError(ErrorCode.CollaboratorFailed, 502, `Community pool does not handle ${message.kind}.`);
    }
  }
}
