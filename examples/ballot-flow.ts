/**
 * Ballot Flow Example
 *
 * Runs a three-voter election end to end against in-memory storage:
 * setup, voting, closing, tallying and audit verification.
 */

import {
  SealedBallot,
  generateElectionKeyPair,
  openChoice,
  sealChoice,
  unwrap,
} from '../src/index.js';

function ballotFlowExample(): void {
  console.log('\n=== Three-Voter Referendum ===\n');

  const core = SealedBallot.open();

  // Setup: the authority keeps the private key offline until tally
  console.log('1. Creating election...');
  const keys = generateElectionKeyPair();
  const election = unwrap(core.elections.createElection({
      title: 'Library Referendum',
      description: 'Extend weekend opening hours?',
      options: ['yes', 'no'],
      publicKey: keys.publicKey,
    }));
  console.log(`   ✓ Election ${election.electionId} (${election.status})`);

  console.log('\n2. Importing voters...');
  const imported = unwrap(
    core.voters.importVoters(election.electionId, [
      { externalRef: 'member-001' },
      { externalRef: 'member-002' },
      { externalRef: 'member-003' },
    ])
  );
  console.log(`   ✓ Added ${imported.added}, skipped ${imported.skipped}`);

  unwrap(core.elections.openElection(election.electionId));
  console.log('   ✓ Election open');

  console.log('\n3. Voting...');
  const ballot = unwrap(core.getBallot(election.electionId));
  console.log(`   ✓ Ballot: ${ballot.options.map((option) => option.text).join(' / ')}`);

  const picks = [0, 1, 0];
  imported.tokens.forEach((issued, index) => {
    const { ballotToken } = unwrap(core.authenticateAndIssue(issued.identityToken));
    const option = ballot.options[picks[index] ?? 0];
    if (!option) {
      throw new Error('Ballot has no such option');
    }
    const receipt = unwrap(core.castBallot(ballotToken, sealChoice(option.optionId, ballot.publicKey, ballot.electionId)));
    console.log(`   ✓ Ballot recorded, hash ${receipt.ballotHash.slice(0, 16)}...`);
  });

  const again = core.authenticateAndIssue(imported.tokens[0]?.identityToken ?? '');
  console.log(`   ✓ Second attempt refused: ${again.ok ? 'no' : again.error.code}`);

  console.log('\n4. Closing and tallying...');
  unwrap(core.elections.closeElection(election.electionId));

  const totals = new Map<string, number>();
  for (const sealed of unwrap(core.readForTally(election.electionId))) {
    const optionId = openChoice(sealed.encryptedChoice, keys.privateKey, election.electionId);
    totals.set(optionId, (totals.get(optionId) ?? 0) + 1);
  }
  for (const option of election.options) {
    console.log(`   ✓ ${option.text}: ${totals.get(option.optionId) ?? 0}`);
  }

  console.log('\n5. Verifying audit chain...');
  const verification = core.verifyAudit(election.electionId);
  if (verification.ok) {
    console.log(`   ✓ Intact, ${verification.value.length} events, head ${verification.value.headHash.slice(0, 16)}...`);
  } else {
    console.log(`   ✗ ${verification.error.message}`);
  }

  core.close();
}

ballotFlowExample();
