#!/usr/bin/env npx tsx
// ─── Staked governance API: SDK quick-start ───────────────────────────────
// Full flow: fund accounts → stake → open a poll → vote → end → execute
//
// Usage:
//   npx tsx examples/quickstart.ts                         # uses localhost:8787
//   API_URL=https://your-server.com npx tsx examples/quickstart.ts
//
// The server must run with TOKEN_FAUCET_ENABLED=true and short periods, e.g.
//   GOV_VOTING_PERIOD=2 GOV_TIMELOCK_PERIOD=0 GOV_EXPIRATION_PERIOD=100 CHAIN_BLOCK_TIME_MS=1000
// ────────────────────────────────────────────────────────────────────────────

import { GovernanceAPIError, GovernanceClient } from '../src/sdk/index.js';

const API_URL = process.env.API_URL ?? 'http://localhost:8787';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

async function main() {
  console.log(`\nStaked governance SDK quick-start`);
  console.log(`   API: ${API_URL}\n`);

  const alice = new GovernanceClient({ baseUrl: API_URL, sender: 'alice' });
  const bob = new GovernanceClient({ baseUrl: API_URL, sender: 'bob' });

  const config = await alice.getConfig();
  console.log(`Config: quorum=${config.quorum} threshold=${config.threshold} deposit=${config.proposalDeposit}`);

  // ── 1. Fund and stake ────────────────────────────────────────────────
  await alice.faucet(BigInt(config.proposalDeposit) + 3_000n);
  await bob.faucet(2_000n);
  await alice.stake(3_000);
  await bob.stake(2_000);
  console.log(`Staked: ${(await alice.getState()).totalStaked}`);

  // ── 2. Open a poll ───────────────────────────────────────────────────
  const poll = await alice.createPoll({
    deposit: config.proposalDeposit,
    title: 'Raise the quorum',
    description: 'Require 20% participation for future polls.',
    messages: [{ kind: 'update_config', quorum: '0.2' }],
  });
  console.log(`Poll #${poll.id} open until height ${poll.endHeight}`);

  // ── 3. Vote ──────────────────────────────────────────────────────────
  await alice.castVote(poll.id, 'yes');
  await bob.castVote(poll.id, 'no');

  // ── 4. End and execute once the heights allow it ─────────────────────
  for (;;) {
    try {
      const ended = await alice.endPoll(poll.id);
      console.log(`Ended: ${ended.poll.status} (quorum=${ended.quorumReached}, threshold=${ended.thresholdReached})`);
      break;
    } catch (error) {
      if (!(error instanceof GovernanceAPIError) || error.code !== 'voting_period_not_over') throw error;
      await sleep(1000);
    }
  }

  const executed = await alice.executePoll(poll.id);
  console.log(`Execution: ${executed.outcome}; quorum is now ${(await alice.getConfig()).quorum}`);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
