/**
 * Messages a poll may carry. The set is closed: governance administers
 * itself and the community pool directly, and anything else is an opaque
 * payload forwarded to a registered owned contract.
 */

import { z } from 'zod';
import { isAmountString, parseDecimal } from '../../utils/amount.js';

const amountString = z.string().refine(isAmountString, { message: 'must be a non-negative integer string' });

const ratioString = z.string().refine((value) => {
  const parsed = parseDecimal(value);
  return parsed !== null && parsed <= 10n ** 18n;
}, { message: 'must be a decimal between 0 and 1' });

const account = z.string().min(1).max(128);

export const updateConfigMessageSchema = z.object({
  kind: z.literal('update_config'),
  quorum: ratioString.optional(),
  threshold: ratioString.optional(),
  votingPeriod: z.number().int().positive().optional(),
  timelockPeriod: z.number().int().nonnegative().optional(),
  expirationPeriod: z.number().int().positive().optional(),
  proposalDeposit: amountString.optional(),
  maxMessagesPerPoll: z.number().int().positive().max(64).optional(),
  earlyPassThreshold: ratioString.nullable().optional(),
  rejectedDepositPolicy: z.enum(['forfeit', 'refund']).optional(),
});

export const communitySpendMessageSchema = z.object({
  kind: z.literal('community_spend'),
  recipient: account,
  amount: amountString,
});

export const communityUpdateConfigMessageSchema = z.object({
  kind: z.literal('community_update_config'),
  spendLimit: amountString.optional(),
  owner: account.optional(),
});

export const forwardMessageSchema = z.object({
  kind: z.literal('forward'),
  contract: account,
  payload: z.record(z.string(), z.unknown()),
});

export const pollMessageSchema = z.discriminatedUnion('kind', [
  updateConfigMessageSchema,
  communitySpendMessageSchema,
  communityUpdateConfigMessageSchema,
  forwardMessageSchema,
]);

export type UpdateConfigMessage = z.infer<typeof updateConfigMessageSchema>;
export type CommunitySpendMessage = z.infer<typeof communitySpendMessageSchema>;
export type CommunityUpdateConfigMessage = z.infer<typeof communityUpdateConfigMessageSchema>;
export type ForwardMessage = z.infer<typeof forwardMessageSchema>;
export type PollMessage = z.infer<typeof pollMessageSchema>;
export type PollMessageKind = PollMessage['kind'];

/** Address messages for the community pool are dispatched to. */
export const COMMUNITY_CONTRACT = 'community';

export const messageTarget = (message: PollMessage): string => {
  switch (message.kind) {
    case 'update_config':
      return 'governance';
    case 'community_spend':
    case 'community_update_config':
      return COMMUNITY_CONTRACT;
    case 'forward':
      return message.contract;
  }
};
