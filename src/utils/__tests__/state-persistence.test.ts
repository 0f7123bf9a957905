/**
 * State Persistence Unit Tests
 *
 * Atomic save, backup rotation and schema validation on load
 */

import { expect } from 'chai';
import { Keypair, PublicKey } from '@solana/web3.js';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { OwnerGate } from '../../core/owner-gate';
import { RoundManager } from '../../managers/round-manager';
import { clearState, deserializeState, loadState, saveState, serializeState } from '../state-persistence';
import { InMemoryTokenBank, ManualClock, rejectionOf } from '../test-utils';

describe('State Persistence', () => {
  let dir: string;
  let file: string;
  let owner: PublicKey;
  let alice: PublicKey;
  let manager: RoundManager;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'venue-state-'));
    file = path.join(dir, 'state.json');
    owner = Keypair.generate().publicKey;
    alice = Keypair.generate().publicKey;

    const bank = new InMemoryTokenBank();
    const clock = new ManualClock(0);
    const primary = bank.createToken(6);
    const secondary = bank.createToken(6);
    bank.mint(alice, primary, 1000n);

    manager = new RoundManager({
      owner: new OwnerGate(owner),
      transfers: bank,
      metadata: bank,
      pool: bank.pool,
      treasury: owner,
      clock,
    });

    await manager.createRound(owner, {
      idoToken: bank.createToken(18),
      primaryToken: primary,
      secondaryToken: secondary,
      idoPrice: 3n,
      idoSize: 10n ** 24n,
      minimumFundingGoal: 7n,
      secondaryCapBps: 2500,
      startTime: 10,
      endTime: 20,
      claimableTime: 30,
      hasWhitelist: true,
    });
    await manager.modifyWhitelist(owner, 1, [alice], true);
    await manager.setRoundSpec(owner, 1, {
      minRank: 1,
      maxRank: 3,
      noRank: false,
      maxAlloc: 500n,
      maxAllocMultiplier: 100_000_000n,
      noMultiplier: false,
    });
    await manager.createMetaIDO(owner);
    await manager.manageRoundInMetaIDO(owner, 1, 1, true);
    await manager.setRanksAndMultipliers(owner, 1, [{ participant: alice, rank: 2, multiplier: 4n }]);
    clock.set(15);
    await manager.participate(alice, 1, primary, 100n);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should round-trip the venue through a file', async () => {
    await saveState(file, { network: 'devnet', owner, pendingOwner: null, venue: manager.exportState() });
    const loaded = await loadState(file);

    expect(loaded).to.not.equal(null);
    if (!loaded) return;
    expect(loaded.network).to.equal('devnet');
    expect(loaded.owner.equals(owner)).to.equal(true);
    expect(loaded.pendingOwner).to.equal(null);
    expect(loaded.venue.nextRoundId).to.equal(2);
    expect(loaded.venue.nextMetaIdoId).to.equal(2);

    const [round] = loaded.venue.rounds;
    expect(round.clock.parentMetaIdoId).to.equal(1);
    expect(round.config.idoSize).to.equal(10n ** 24n);
    expect(round.config.whitelist.has(alice.toBase58())).to.equal(true);
    expect(round.config.positions.get(alice.toBase58())).to.deep.equal({
      amount: 100n,
      secondaryAmount: 0n,
      tokenAllocation: (100n * 10n ** 18n) / 3n,
    });
    expect(round.config.spec?.maxAlloc).to.equal(500n);

    const [metaIdo] = loaded.venue.metaIdos;
    expect(metaIdo.roundIds).to.deep.equal([1]);
    expect(metaIdo.ranks.get(alice.toBase58())).to.equal(2);
    expect(metaIdo.multipliers.get(alice.toBase58())).to.equal(4n);
  });

  it('should store amounts as decimal strings', () => {
    const doc = serializeState({ network: 'devnet', owner, pendingOwner: null, venue: manager.exportState() }, 42);

    expect(doc.savedAt).to.equal(42);
    expect(doc.rounds[0].config.idoSize).to.equal('1000000000000000000000000');
    expect(Object.values(doc.rounds[0].config.totalFunded).sort()).to.deep.equal(['0', '100']);
  });

  it('should keep three rotating backups', async () => {
    const input = { network: 'devnet' as const, owner, pendingOwner: null, venue: manager.exportState() };
    for (let i = 0; i < 5; i++) {
      await saveState(file, input);
    }

    expect(fs.existsSync(`${file}.1`)).to.equal(true);
    expect(fs.existsSync(`${file}.2`)).to.equal(true);
    expect(fs.existsSync(`${file}.3`)).to.equal(true);
    expect(fs.existsSync(`${file}.4`)).to.equal(false);
  });

  it('should move the previous save to the first backup', async () => {
    await saveState(file, { network: 'devnet', owner, pendingOwner: null, venue: manager.exportState() });
    await saveState(file, { network: 'localnet', owner, pendingOwner: null, venue: manager.exportState() });

    expect(JSON.parse(fs.readFileSync(`${file}.1`, 'utf-8')).network).to.equal('devnet');
    expect(JSON.parse(fs.readFileSync(file, 'utf-8')).network).to.equal('localnet');
  });

  it('should refuse an invalid current file instead of loading a backup', async () => {
    const input = { network: 'mainnet' as const, owner, pendingOwner: alice, venue: manager.exportState() };
    await saveState(file, input);
    await saveState(file, input);
    fs.writeFileSync(file, '{"truncated');

    const error = await rejectionOf(loadState(file));
    expect(error instanceof Error && error.message).to.equal(
      `State file ${file} is invalid; restore a backup explicitly`
    );
  });

  it('should restore the newest valid backup on request', async () => {
    await saveState(file, { network: 'mainnet', owner, pendingOwner: alice, venue: manager.exportState() });
    await saveState(file, { network: 'devnet', owner, pendingOwner: null, venue: manager.exportState() });
    await saveState(file, { network: 'localnet', owner, pendingOwner: null, venue: manager.exportState() });
    fs.writeFileSync(`${file}.1`, '{"truncated');

    const loaded = await loadState(file, { restoreBackup: true });
    expect(loaded?.network).to.equal('mainnet');
    expect(loaded?.pendingOwner?.equals(alice)).to.equal(true);
  });

  it('should refuse to start fresh while backups exist', async () => {
    const input = { network: 'devnet' as const, owner, pendingOwner: null, venue: manager.exportState() };
    await saveState(file, input);
    await saveState(file, input);
    fs.unlinkSync(file);

    const error = await rejectionOf(loadState(file));
    expect(error).to.be.instanceOf(Error);
  });

  it('should return null without any state file', async () => {
    expect(await loadState(file)).to.equal(null);
  });

  it('should reject documents that break the schema', () => {
    const doc = serializeState({ network: 'devnet', owner, pendingOwner: null, venue: manager.exportState() });
    const broken = { ...doc, rounds: [{ ...doc.rounds[0], config: { ...doc.rounds[0].config, idoPrice: '-1' } }] };

    expect(() => deserializeState(broken)).to.throw('rounds.0.config.idoPrice');
    expect(() => deserializeState({ ...doc, version: 99 })).to.throw('Invalid state document');
  });

  it('should delete the file and its backups', async () => {
    const input = { network: 'devnet' as const, owner, pendingOwner: null, venue: manager.exportState() };
    await saveState(file, input);
    await saveState(file, input);
    clearState(file);

    expect(fs.existsSync(file)).to.equal(false);
    expect(fs.existsSync(`${file}.1`)).to.equal(false);
  });
});
