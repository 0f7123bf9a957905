/**
 * RoundManager Scenario Tests
 *
 * Full round lifecycles against an in-memory token bank and a manual clock
 */

import { expect } from 'chai';
import { Keypair, PublicKey } from '@solana/web3.js';
import { TokenTransferError, TransferRollbackError } from '../../core/errors';
import { OwnerGate } from '../../core/owner-gate';
import { CreateRoundParams } from '../../core/types';
import { RoundManager } from '../round-manager';
import { InMemoryTokenBank, ManualClock, rejectedCode, rejectionOf } from '../../utils/test-utils';

const WAD = 10n ** 18n;

describe('RoundManager', () => {
  let bank: InMemoryTokenBank;
  let clock: ManualClock;
  let manager: RoundManager;
  let owner: PublicKey;
  let treasury: PublicKey;
  let alice: PublicKey;
  let bob: PublicKey;
  let idoToken: PublicKey;
  let primary: PublicKey;
  let secondary: PublicKey;
  let events: string[];

  function params(overrides: Partial<CreateRoundParams> = {}): CreateRoundParams {
    return {
      idoToken,
      primaryToken: primary,
      secondaryToken: secondary,
      idoPrice: 2n,
      idoSize: 1000n * WAD,
      minimumFundingGoal: 0n,
      secondaryCapBps: 10_000,
      startTime: 100,
      endTime: 200,
      claimableTime: 300,
      hasWhitelist: false,
      ...overrides,
    };
  }

  beforeEach(() => {
    bank = new InMemoryTokenBank();
    clock = new ManualClock(0);
    owner = Keypair.generate().publicKey;
    treasury = Keypair.generate().publicKey;
    alice = Keypair.generate().publicKey;
    bob = Keypair.generate().publicKey;
    idoToken = bank.createToken(18);
    primary = bank.createToken(6);
    secondary = bank.createToken(6);

    bank.mint(alice, primary, 10n ** 9n);
    bank.mint(alice, secondary, 10n ** 9n);
    bank.mint(bob, primary, 10n ** 9n);
    bank.mint(bob, secondary, 10n ** 9n);

    manager = new RoundManager({
      owner: new OwnerGate(owner),
      transfers: bank,
      metadata: bank,
      pool: bank.pool,
      treasury,
      clock,
    });

    events = [];
    manager.events.onAny((name) => events.push(name));
  });

  describe('createRound', () => {
    it('should assign sequential IDs and snapshot decimals', async () => {
      expect(await manager.createRound(owner, params())).to.equal(1);
      expect(await manager.createRound(owner, params())).to.equal(2);

      const round = manager.getRound(1);
      expect(round.config.idoTokenDecimals).to.equal(18);
      expect(round.clock.parentMetaIdoId).to.equal(null);
      expect(manager.getRoundCount()).to.equal(2);
      expect(events).to.deep.equal(['roundCreated', 'roundCreated']);
    });

    it('should only accept the owner', async () => {
      expect(await rejectedCode(manager.createRound(alice, params()))).to.equal('Unauthorized');
    });

    it('should validate the window and parameters', async () => {
      expect(await rejectedCode(manager.createRound(owner, params({ endTime: 100 })))).to.equal('InvalidWindow');
      expect(await rejectedCode(manager.createRound(owner, params({ idoPrice: 0n })))).to.equal('InvalidParameter');
      expect(await rejectedCode(manager.createRound(owner, params({ secondaryToken: primary })))).to.equal('InvalidParameter');
      expect(await rejectedCode(manager.createRound(owner, params({ secondaryCapBps: 10_001 })))).to.equal('InvalidBasisPoints');
    });

    it('should not consume an ID when the decimals read fails', async () => {
      const unknownMint = Keypair.generate().publicKey;
      const error = await rejectionOf(manager.createRound(owner, params({ idoToken: unknownMint })));

      expect(error).to.be.instanceOf(Error);
      expect(manager.getRoundCount()).to.equal(0);
      expect(await manager.createRound(owner, params())).to.equal(1);
    });
  });

  describe('round lifecycle', () => {
    it('should run participate, finalize and claim end to end', async () => {
      await manager.createRound(owner, params());
      bank.mint(bank.pool, idoToken, 10n ** 6n * WAD);

      const announced: bigint[] = [];
      manager.events.onEvent('participated', (payload) => announced.push(payload.allocation));

      clock.set(150);
      const allocation = await manager.participate(alice, 1, primary, 10n ** 6n);
      expect(allocation).to.equal(5n * 10n ** 23n);
      expect(announced).to.deep.equal([5n * 10n ** 23n]);
      expect(manager.getPosition(1, alice)).to.deep.equal({
        amount: 10n ** 6n,
        secondaryAmount: 0n,
        tokenAllocation: 5n * 10n ** 23n,
      });

      clock.set(200);
      await manager.finalizeRound(owner, 1);
      expect(manager.getSettlementSummary(1)).to.deep.equal({
        roundId: 1,
        idoSize: 10n ** 6n * WAD,
        fundedUSDValue: 10n ** 6n,
        claimableTime: 300,
        openPositions: 1,
        outstandingAllocation: 5n * 10n ** 23n,
      });

      clock.set(250);
      expect(await rejectedCode(manager.claim(1, alice))).to.equal('NotClaimable');

      clock.set(300);
      const settled = await manager.claim(1, alice);
      expect(settled.tokenAllocation).to.equal(5n * 10n ** 23n);
      expect(bank.balance(alice, idoToken)).to.equal(5n * 10n ** 23n);
      expect(bank.balance(treasury, primary)).to.equal(10n ** 6n);
      expect(manager.getPosition(1, alice).amount).to.equal(0n);

      expect(await rejectedCode(manager.claim(1, alice))).to.equal('NoPosition');
      expect(events).to.deep.equal(['roundCreated', 'participated', 'roundFinalized', 'claimed']);
    });

    it('should route secondary funds to the treasury in the secondary token', async () => {
      await manager.createRound(owner, params());
      bank.mint(bank.pool, idoToken, 1000n * WAD);

      clock.set(150);
      await manager.participate(alice, 1, primary, 300n);
      await manager.participate(alice, 1, secondary, 100n);

      clock.set(300);
      await manager.finalizeRound(owner, 1);
      await manager.claim(1, alice);

      expect(bank.balance(treasury, primary)).to.equal(300n);
      expect(bank.balance(treasury, secondary)).to.equal(100n);
      expect(bank.balance(alice, idoToken)).to.equal(200n * WAD);
    });

    it('should enforce the contribution window', async () => {
      await manager.createRound(owner, params());

      clock.set(99);
      expect(await rejectedCode(manager.participate(alice, 1, primary, 10n))).to.equal('NotStarted');
      clock.set(200);
      expect(await rejectedCode(manager.participate(alice, 1, primary, 10n))).to.equal('WindowClosed');
    });

    it('should reject zero amounts and foreign tokens', async () => {
      await manager.createRound(owner, params());
      clock.set(150);

      expect(await rejectedCode(manager.participate(alice, 1, primary, 0n))).to.equal('InvalidAmount');
      expect(await rejectedCode(manager.participate(alice, 1, idoToken, 10n))).to.equal('InvalidToken');
      expect(await rejectedCode(manager.participate(alice, 9, primary, 10n))).to.equal('RoundNotFound');
    });

    it('should make finalization one-way', async () => {
      await manager.createRound(owner, params());
      clock.set(150);
      await manager.participate(alice, 1, primary, 10n);

      expect(await rejectedCode(manager.finalizeRound(owner, 1))).to.equal('IDONotEnded');

      clock.set(250);
      await manager.finalizeRound(owner, 1);

      expect(await rejectedCode(manager.finalizeRound(owner, 1))).to.equal('AlreadyFinalized');
      expect(await rejectedCode(manager.participate(alice, 1, primary, 10n))).to.equal('AlreadyFinalized');
      expect(await rejectedCode(manager.delayEndTime(owner, 1, 260))).to.equal('AlreadyFinalized');
      expect(await rejectedCode(manager.setWhitelistStatus(owner, 1, false))).to.equal('AlreadyFinalized');
      expect(manager.getRound(1).clock.isFinalized).to.equal(true);
    });

    it('should leave the round open when the funding goal is missed', async () => {
      await manager.createRound(owner, params({ minimumFundingGoal: 1000n }));
      bank.mint(bank.pool, idoToken, 5n * WAD);
      clock.set(150);
      await manager.participate(alice, 1, primary, 999n);

      clock.set(250);
      expect(await rejectedCode(manager.finalizeRound(owner, 1))).to.equal('FundingGoalNotReached');

      const round = manager.getRound(1);
      expect(round.clock.isFinalized).to.equal(false);
      expect(round.config.idoSize).to.equal(1000n * WAD);
      expect(round.config.fundedUSDValue).to.equal(0n);
      expect(events).to.not.include('roundFinalized');
    });

    it('should report NotFinalized settlement summaries before finalization', async () => {
      await manager.createRound(owner, params());
      expect(() => manager.getSettlementSummary(1)).to.throw('NotFinalized');
    });
  });

  describe('whitelist', () => {
    it('should admit only listed participants while enabled', async () => {
      await manager.createRound(owner, params({ hasWhitelist: true }));
      await manager.modifyWhitelist(owner, 1, [alice], true);

      clock.set(150);
      expect(await rejectedCode(manager.participate(bob, 1, primary, 10n))).to.equal('NotWhitelisted');
      await manager.participate(alice, 1, primary, 10n);

      await manager.setWhitelistStatus(owner, 1, false);
      await manager.participate(bob, 1, primary, 10n);

      expect(manager.getPosition(1, bob).amount).to.equal(10n);
      expect(manager.isWhitelisted(1, alice)).to.equal(true);
      expect(manager.isWhitelisted(1, bob)).to.equal(false);
    });

    it('should only enable the whitelist before the round opens', async () => {
      await manager.createRound(owner, params());
      await manager.setWhitelistStatus(owner, 1, true);
      expect(await rejectedCode(manager.setWhitelistStatus(owner, 1, true))).to.equal('WhitelistAlreadyEnabled');

      await manager.setWhitelistStatus(owner, 1, false);
      clock.set(100);
      expect(await rejectedCode(manager.setWhitelistStatus(owner, 1, true))).to.equal('WindowClosed');
    });

    it('should reject modifications while disabled or empty', async () => {
      await manager.createRound(owner, params());
      expect(await rejectedCode(manager.modifyWhitelist(owner, 1, [alice], true))).to.equal('WhitelistNotEnabled');

      await manager.setWhitelistStatus(owner, 1, true);
      expect(await rejectedCode(manager.modifyWhitelist(owner, 1, [], true))).to.equal('EmptyAddressList');
      expect(await rejectedCode(manager.modifyWhitelist(alice, 1, [alice], true))).to.equal('Unauthorized');
    });

    it('should remove addresses', async () => {
      await manager.createRound(owner, params({ hasWhitelist: true }));
      await manager.modifyWhitelist(owner, 1, [alice, bob], true);
      await manager.modifyWhitelist(owner, 1, [alice], false);

      expect(Array.from(manager.getRound(1).config.whitelist)).to.deep.equal([bob.toBase58()]);
    });
  });

  describe('secondary cap', () => {
    it('should reject an over-cap contribution and leave state unchanged', async () => {
      await manager.createRound(owner, params({ idoSize: 1000n, secondaryCapBps: 5000 }));
      clock.set(150);
      await manager.participate(alice, 1, primary, 400n);

      expect(await rejectedCode(manager.participate(bob, 1, secondary, 101n))).to.equal('SecondaryCapExceeded');

      const round = manager.getRound(1);
      expect(round.config.totalFunded.get(secondary.toBase58())).to.equal(0n);
      expect(round.config.positions.has(bob.toBase58())).to.equal(false);
      expect(bank.balance(bob, secondary)).to.equal(10n ** 9n);

      await manager.participate(bob, 1, secondary, 100n);
      expect(manager.getPosition(1, bob).secondaryAmount).to.equal(100n);
    });

    it('should serialize concurrent contributions against the cap', async () => {
      await manager.createRound(owner, params({ idoSize: 1000n, secondaryCapBps: 5000 }));
      clock.set(150);

      const results = await Promise.allSettled([
        manager.participate(alice, 1, secondary, 300n),
        manager.participate(bob, 1, secondary, 300n),
      ]);

      expect(results.map((r) => r.status)).to.deep.equal(['fulfilled', 'rejected']);
      expect(manager.getRound(1).config.totalFunded.get(secondary.toBase58())).to.equal(300n);
    });

    it('should only change the cap before the round opens', async () => {
      await manager.createRound(owner, params());
      await manager.setFyTokenMaxBasisPoints(owner, 1, 2500);
      expect(manager.getRound(1).config.secondaryCapBps).to.equal(2500);

      expect(await rejectedCode(manager.setFyTokenMaxBasisPoints(owner, 1, 10_001))).to.equal('InvalidBasisPoints');
      clock.set(100);
      expect(await rejectedCode(manager.setFyTokenMaxBasisPoints(owner, 1, 3000))).to.equal('WindowClosed');
    });
  });

  describe('delays', () => {
    it('should extend the contribution window once', async () => {
      await manager.createRound(owner, params());
      await manager.delayEndTime(owner, 1, 250);
      await manager.delayEndTime(owner, 1, 250);

      clock.set(220);
      await manager.participate(alice, 1, primary, 10n);

      expect(await rejectedCode(manager.delayEndTime(owner, 1, 260))).to.equal('InvalidDelay');
      expect(events.filter((e) => e === 'endTimeDelayed')).to.have.lengthOf(1);
    });

    it('should delay claims', async () => {
      await manager.createRound(owner, params());
      bank.mint(bank.pool, idoToken, 1000n * WAD);
      clock.set(150);
      await manager.participate(alice, 1, primary, 10n);
      clock.set(200);
      await manager.finalizeRound(owner, 1);
      await manager.delayClaimableTime(owner, 1, 400);

      clock.set(300);
      expect(await rejectedCode(manager.claim(1, alice))).to.equal('NotClaimable');
      clock.set(400);
      await manager.claim(1, alice);
    });

    it('should only accept the owner', async () => {
      await manager.createRound(owner, params());
      expect(await rejectedCode(manager.delayEndTime(alice, 1, 250))).to.equal('Unauthorized');
      expect(await rejectedCode(manager.delayClaimableTime(alice, 1, 350))).to.equal('Unauthorized');
    });
  });

  describe('transfer failures', () => {
    it('should undo the ledger when the pull fails', async () => {
      await manager.createRound(owner, params());
      clock.set(150);
      bank.failNext('pull', primary);

      const error = await rejectionOf(manager.participate(alice, 1, primary, 10n));

      expect(error).to.be.instanceOf(TokenTransferError);
      expect(manager.getPosition(1, alice).amount).to.equal(0n);
      expect(manager.getRound(1).config.totalFunded.get(primary.toBase58())).to.equal(0n);
      expect(events).to.deep.equal(['roundCreated']);
    });

    it('should restore the position and refund the treasury when delivery fails', async () => {
      await manager.createRound(owner, params());
      bank.mint(bank.pool, idoToken, 1000n * WAD);
      clock.set(150);
      await manager.participate(alice, 1, primary, 10n);
      clock.set(300);
      await manager.finalizeRound(owner, 1);

      bank.failNext('push', idoToken);
      const error = await rejectionOf(manager.claim(1, alice));

      expect(error).to.be.instanceOf(TokenTransferError);
      expect(manager.getPosition(1, alice).amount).to.equal(10n);
      expect(bank.balance(treasury, primary)).to.equal(0n);
      expect(bank.balance(bank.pool, primary)).to.equal(10n);

      await manager.claim(1, alice);
      expect(bank.balance(alice, idoToken)).to.equal(5n * WAD);
    });

    it('should keep the position settled when the treasury refund fails', async () => {
      await manager.createRound(owner, params());
      bank.mint(bank.pool, idoToken, 1000n * WAD);
      clock.set(150);
      await manager.participate(alice, 1, primary, 10n);
      await manager.participate(bob, 1, primary, 10n);
      clock.set(300);
      await manager.finalizeRound(owner, 1);

      bank.failNext('push', idoToken);
      bank.failNext('pull', primary);
      const error = await rejectionOf(manager.claim(1, alice));

      expect(error).to.be.instanceOf(TransferRollbackError);
      expect(manager.getPosition(1, alice).amount).to.equal(0n);
      expect(bank.balance(treasury, primary)).to.equal(10n);
      expect(bank.balance(bank.pool, primary)).to.equal(10n);

      expect(await rejectedCode(manager.claim(1, alice))).to.equal('NoPosition');
      expect(bank.balance(treasury, primary)).to.equal(10n);
      expect(events).to.not.include('claimed');

      await manager.claim(1, bob);
      expect(bank.balance(treasury, primary)).to.equal(20n);
      expect(bank.balance(bank.pool, primary)).to.equal(0n);
    });
  });

  describe('withdrawSpareTokens', () => {
    it('should send unsold inventory to the owner', async () => {
      await manager.createRound(owner, params());
      bank.mint(bank.pool, idoToken, 1000n * WAD);
      clock.set(150);
      await manager.participate(alice, 1, primary, 500n);

      // goal 2000 > funded 500; sold = 500 / 2 * 1e18
      const amount = await manager.withdrawSpareTokens(owner, 1);

      expect(amount).to.equal(750n * WAD);
      expect(bank.balance(owner, idoToken)).to.equal(750n * WAD);
      expect(await rejectedCode(manager.withdrawSpareTokens(owner, 1))).to.equal('NoSpareTokens');
    });

    it('should refuse once funding covers the sale', async () => {
      await manager.createRound(owner, params());
      bank.mint(bank.pool, idoToken, 1000n * WAD);
      clock.set(150);
      await manager.participate(alice, 1, primary, 2000n);

      expect(await rejectedCode(manager.withdrawSpareTokens(owner, 1))).to.equal('FundingGoalReached');
    });

    it('should only accept the owner', async () => {
      await manager.createRound(owner, params());
      expect(await rejectedCode(manager.withdrawSpareTokens(alice, 1))).to.equal('Unauthorized');
    });
  });

  describe('MetaIDO', () => {
    beforeEach(async () => {
      await manager.createRound(owner, params());
      await manager.createRound(owner, params());
      await manager.createMetaIDO(owner);
    });

    it('should add and remove rounds', async () => {
      await manager.manageRoundInMetaIDO(owner, 1, 1, true);
      await manager.manageRoundInMetaIDO(owner, 1, 2, true);
      expect(manager.getMetaIDO(1).roundIds).to.deep.equal([1, 2]);
      expect(manager.getRound(1).clock.parentMetaIdoId).to.equal(1);

      await manager.manageRoundInMetaIDO(owner, 1, 1, false);
      expect(manager.getMetaIDO(1).roundIds).to.deep.equal([2]);
      expect(manager.getRound(1).clock.parentMetaIdoId).to.equal(null);

      expect(await rejectedCode(manager.manageRoundInMetaIDO(owner, 1, 1, false))).to.equal('RoundNotInMetaIDO');
    });

    it('should keep a round in at most one MetaIDO', async () => {
      await manager.manageRoundInMetaIDO(owner, 1, 1, true);
      await manager.createMetaIDO(owner);

      expect(await rejectedCode(manager.manageRoundInMetaIDO(owner, 2, 1, true))).to.equal('RoundAlreadyInMetaIDO');
      expect(await rejectedCode(manager.manageRoundInMetaIDO(owner, 1, 1, true))).to.equal('RoundAlreadyInMetaIDO');
      expect(manager.getMetaIDO(2).roundIds).to.deep.equal([]);
    });

    it('should fail on unknown IDs', async () => {
      expect(await rejectedCode(manager.manageRoundInMetaIDO(owner, 9, 1, true))).to.equal('MetaIDONotFound');
      expect(await rejectedCode(manager.manageRoundInMetaIDO(owner, 1, 9, true))).to.equal('RoundNotFound');
      expect(await rejectedCode(manager.registerForMetaIDO(alice, 9))).to.equal('MetaIDONotFound');
    });

    it('should project eligibility from ranks and the round spec', async () => {
      await manager.manageRoundInMetaIDO(owner, 1, 1, true);
      await manager.registerForMetaIDO(alice, 1);
      await manager.setRanksAndMultipliers(owner, 1, [
        { participant: alice, rank: 3, multiplier: 2n },
        { participant: bob, rank: 1, multiplier: 1n },
      ]);
      await manager.setRoundSpec(owner, 1, {
        minRank: 2,
        maxRank: 4,
        noRank: false,
        maxAlloc: 100n,
        maxAllocMultiplier: 50_000_000n,
        noMultiplier: false,
      });

      const [forAlice, unrestricted] = manager.getEligibility(alice, [1, 2]);
      expect(forAlice).to.deep.equal({
        roundId: 1,
        metaIdoId: 1,
        isRegistered: true,
        rank: 3,
        multiplier: 2n,
        eligible: true,
        maxAllocation: 100n,
      });
      expect(unrestricted.eligible).to.equal(true);
      expect(unrestricted.maxAllocation).to.equal(null);

      const [forBob] = manager.getEligibility(bob, [1]);
      expect(forBob.eligible).to.equal(false);
      expect(forBob.isRegistered).to.equal(false);
    });

    it('should validate rank batches and specs', async () => {
      expect(await rejectedCode(manager.setRanksAndMultipliers(owner, 1, []))).to.equal('EmptyAddressList');
      expect(await rejectedCode(manager.setRanksAndMultipliers(alice, 1, []))).to.equal('Unauthorized');
      expect(
        await rejectedCode(
          manager.setRoundSpec(owner, 1, {
            minRank: 5,
            maxRank: 1,
            noRank: false,
            maxAlloc: 1n,
            maxAllocMultiplier: 1n,
            noMultiplier: true,
          })
        )
      ).to.equal('InvalidParameter');
    });

    it('should register participants once', async () => {
      await manager.registerForMetaIDO(alice, 1);
      await manager.registerForMetaIDO(alice, 1);
      expect(manager.getMetaIDO(1).registered.size).to.equal(1);
      expect(events.filter((e) => e === 'metaIdoRegistered')).to.have.lengthOf(1);
    });
  });

  describe('queries', () => {
    it('should sum positions across rounds', async () => {
      await manager.createRound(owner, params());
      await manager.createRound(owner, params({ idoPrice: 1n }));
      clock.set(150);
      await manager.participate(alice, 1, primary, 10n);
      await manager.participate(alice, 2, secondary, 4n);

      const summary = manager.getParticipantSummary(alice, [1, 2]);
      expect(summary.totalAmount).to.equal(14n);
      expect(summary.totalSecondaryAmount).to.equal(4n);
      expect(summary.totalTokenAllocation).to.equal(9n * WAD);
    });

    it('should return detached copies', async () => {
      await manager.createRound(owner, params());
      const copy = manager.getRound(1);
      copy.clock.isFinalized = true;
      copy.config.whitelist.add(alice.toBase58());

      expect(manager.getRound(1).clock.isFinalized).to.equal(false);
      expect(manager.getRound(1).config.whitelist.size).to.equal(0);
    });

    it('should resume from exported state', async () => {
      await manager.createRound(owner, params());
      await manager.createMetaIDO(owner);
      clock.set(150);
      await manager.participate(alice, 1, primary, 10n);

      const resumed = new RoundManager({
        owner: new OwnerGate(owner),
        transfers: bank,
        metadata: bank,
        pool: bank.pool,
        treasury,
        clock,
        state: manager.exportState(),
      });

      expect(resumed.getPosition(1, alice).amount).to.equal(10n);
      expect(await resumed.createRound(owner, params())).to.equal(2);
      expect(await resumed.createMetaIDO(owner)).to.equal(2);
    });
  });
});
