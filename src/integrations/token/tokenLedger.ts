/**
 * Token balance collaborator.
 *
 * Balances live in the same state document as the governance books, so a
 * transfer commits or rolls back together with the command that made it.
 */

import { DomainError, ErrorCode, invalidAmount } from '../../errors/taxonomy.js';
import { COMMUNITY_ACCOUNT, GOVERNANCE_ACCOUNT } from '../../infra/storage/defaultState.js';
import { AppState } from '../../types.js';

/** Custodial accounts that hold pooled funds and never act as a user. */
export const RESERVED_ACCOUNTS: readonly string[] = [GOVERNANCE_ACCOUNT, COMMUNITY_ACCOUNT];

export const requireUserAccount = (account: string, role: string): void => {
  if (RESERVED_ACCOUNTS.includes(account)) {
    throw new DomainError(ErrorCode.ReservedAccount, 400, `${account} is a custodial account and cannot act as ${role}.`, {
      account,
      role,
    });
  }
};

export interface TokenLedger {
  balanceOf(account: string): bigint;
  /** Move `amount` from `account` into the governance treasury. */
  transferFrom(account: string, amount: bigint): void;
  /** Pay `amount` out of the governance treasury to `account`. */
  transferTo(account: string, amount: bigint): void;
  transfer(from: string, to: string, amount: bigint): void;
  mint(account: string, amount: bigint): void;
}

export class StateTokenLedger implements TokenLedger {
  constructor(private readonly state: AppState, private readonly treasury = GOVERNANCE_ACCOUNT) {}

  balanceOf(account: string): bigint {
    return this.state.token.balances[account] ?? 0n;
  }

  transferFrom(account: string, amount: bigint): void {
    this.transfer(account, this.treasury, amount);
  }

  transferTo(account: string, amount: bigint): void {
    this.transfer(this.treasury, account, amount);
  }

  transfer(from: string, to: string, amount: bigint): void {
    if (amount < 0n) throw invalidAmount('Transfer amount must not be negative.', { amount: amount.toString() });
    if (amount === 0n) return;

    const available = this.balanceOf(from);
    if (available < amount) {
      throw new DomainError(ErrorCode.InsufficientBalance, 400, `Account ${from} holds ${available}, needs ${amount}.`, {
        account: from,
        available: available.toString(),
        required: amount.toString(),
      });
    }
    if (from === to) return;

    this.state.token.balances[from] = available - amount;
    this.state.token.balances[to] = this.balanceOf(to) + amount;
  }

  mint(account: string, amount: bigint): void {
    if (amount <= 0n) throw invalidAmount('Mint amount must be positive.');
    this.state.token.balances[account] = this.balanceOf(account) + amount;
  }
}
