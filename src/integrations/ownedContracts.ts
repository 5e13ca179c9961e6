/**
 * Contracts owned by governance. A passed poll's messages are dispatched
 * here; the only thing governance reads back is whether `handle` threw.
 */

import { v4 as uuid } from 'uuid';
import { BlockContext } from '../domain/chain/heightSource.js';
import { PollMessage, messageTarget } from '../domain/governance/pollMessages.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { AppState } from '../types.js';
import { TokenLedger } from './token/tokenLedger.js';

export interface DispatchContext {
  state: AppState;
  ledger: TokenLedger;
  block: BlockContext;
  pollId: number;
}

export interface OwnedContract {
  readonly address: string;
  handle(sender: string, message: PollMessage, ctx: DispatchContext): void;
}

export class OwnedContractRegistry {
  private readonly contracts = new Map<string, OwnedContract>();

  register(contract: OwnedContract): this {
    this.contracts.set(contract.address, contract);
    return this;
  }

  dispatch(sender: string, message: PollMessage, ctx: DispatchContext): void {
    const address = messageTarget(message);
    const contract = this.contracts.get(address);
    if (!contract) {
      throw new DomainError(ErrorCode.UnknownContract, 502, `No owned contract at ${address}.`, { contract: address });
    }
    contract.handle(sender, message, ctx);
  }
}

/**
 * Owned contract that accepts forwarded payloads without reading them. The
 * payloads wait in state for a relayer to deliver.
 */
export class OutboxContract implements OwnedContract {
  constructor(public readonly address: string) {}

  handle(_sender: string, message: PollMessage, ctx: DispatchContext): void {
    if (message.kind !== 'forward') {
      throw new DomainError(ErrorCode.CollaboratorFailed, 502, `${this.address} only accepts forwarded payloads.`);
    }
    ctx.state.outbox.push({
      id: uuid(),
      contract: this.address,
      pollId: ctx.pollId,
      payload: message.payload,
      height: ctx.block.height,
      queuedAt: ctx.block.now,
    });
  }
}
