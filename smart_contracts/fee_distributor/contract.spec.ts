import { Global, Uint64, arc4, op } from '@algorandfoundation/algorand-typescript'
import { TestExecutionContext } from '@algorandfoundation/algorand-typescript-testing'
import { afterEach, describe, expect, it } from 'vitest'
import { FeeDistributor } from './contract.algo'
import { callAs, createProtocolFixture, feeQuote, multiFeeQuote } from '../testing/fixture'

/**
 * FeeDistributor invariants:
 * - pulls move a source's whole pool into custody; the single-asset pull refuses an empty pool
 * - claimShare pays floor(held * share / 10000) of what is held at claim time
 * - only the stakeholders and the admin pull; only the stakeholders claim
 */
describe('FeeDistributor', () => {
  const ctx = new TestExecutionContext()

  afterEach(() => {
    ctx.reset()
  })

  const setup = () => {
    const fixture = createProtocolFixture(ctx, { dispatcherFeeBps: 100, ledgerFeeBps: 100 })
    const { dispatcher, dispatcherApp, ledger, ledgerApp, registry, distributor } = fixture

    // A registered transfer of `amount` leaves 1% in the dispatcher pool
    const earnDispatcherFees = (amount: number) => {
      const payee = ctx.any.account()
      const payer = ctx.any.account()
      registry.register('payee', payee)
      const pay = ctx.any.txn.payment({ sender: payer, receiver: dispatcherApp.address, amount })
      const lookup = registry.lookup('payee')
      callAs(ctx, dispatcher, payer, () => dispatcher.transfer(pay, lookup, 'payee', payee), [pay, lookup])
    }

    // Deposit then withdraw `amount`, leaving 1% in the ledger pool
    const earnLedgerFees = (amount: number) => {
      const owner = ctx.any.account()
      const payer = ctx.any.account()
      const pay = ctx.any.txn.payment({ sender: payer, receiver: ledgerApp.address, amount })
      callAs(ctx, ledger, payer, () => ledger.deposit(pay, 'escrowed'), [pay])
      registry.register('escrowed', owner)
      const lookup = registry.lookup('escrowed')
      callAs(ctx, ledger, owner, () => ledger.withdraw(lookup, 'escrowed', 0), [lookup])
    }

    const pullDispatcher = (caller = fixture.stakeholder1) => {
      const quote = feeQuote(ctx, dispatcher, 0)
      return callAs(ctx, distributor, caller, () => distributor.pullFromDispatcher(quote, 0), [quote])
    }

    return { ...fixture, earnDispatcherFees, earnLedgerFees, pullDispatcher }
  }

  describe('pulls', () => {
    it('takes the dispatcher pool into custody and calls its claim', () => {
      const { dispatcher, dispatcherApp, distributor, distributorApp, earnDispatcherFees, pullDispatcher } = setup()
      earnDispatcherFees(1_000_000)

      expect(pullDispatcher()).toEqual(10_000)
      expect(distributor.heldBalance(0)).toEqual(10_000)

      const claim = ctx.txn.lastGroup.lastItxnGroup().getApplicationCallInnerTxn(0)
      expect(claim.appId).toEqual(dispatcherApp)
      expect(claim.appArgs(0)).toEqual(arc4.methodSelector('claimFees(uint64)uint64'))
      expect(claim.appArgs(1)).toEqual(op.itob(0))

      // the inner call as the dispatcher receives it
      expect(callAs(ctx, dispatcher, distributorApp.address, () => dispatcher.claimFees(0))).toEqual(10_000)
      expect(dispatcher.accumulatedFees(0)).toEqual(0)
    })

    it('takes the ledger pool the same way', () => {
      const { ledger, ledgerApp, distributor, stakeholder2, earnLedgerFees } = setup()
      earnLedgerFees(2_000_000)
      const quote = feeQuote(ctx, ledger, 0)

      expect(callAs(ctx, distributor, stakeholder2, () => distributor.pullFromLedger(quote, 0), [quote])).toEqual(20_000)
      expect(distributor.heldBalance(0)).toEqual(20_000)
      expect(ctx.txn.lastGroup.lastItxnGroup().getApplicationCallInnerTxn(0).appId).toEqual(ledgerApp)
    })

    it('accepts the admin and the stakeholders only', () => {
      const { distributor, admin, earnDispatcherFees, pullDispatcher } = setup()
      earnDispatcherFees(1_000_000)

      expect(() => pullDispatcher(ctx.any.account())).toThrow(/Unauthorized/)
      expect(pullDispatcher(admin)).toEqual(10_000)
      expect(distributor.heldBalance(0)).toEqual(10_000)
    })

    it('fails NothingToClaim on an empty pool', () => {
      const { distributor, pullDispatcher } = setup()

      expect(() => pullDispatcher()).toThrow(/NothingToClaim/)
      expect(distributor.heldBalance(0)).toEqual(0)
      expect(distributor.locked.value).toEqual(0)
    })

    it('only trusts a quote from the named source for the named asset', () => {
      const { ledger, dispatcher, distributor, stakeholder1, earnDispatcherFees, earnLedgerFees } = setup()
      earnDispatcherFees(1_000_000)
      earnLedgerFees(1_000_000)

      const ledgerQuote = feeQuote(ctx, ledger, 0)
      expect(() =>
        callAs(ctx, distributor, stakeholder1, () => distributor.pullFromDispatcher(ledgerQuote, 0), [ledgerQuote])
      ).toThrow(/InvalidQuote/)

      const otherAsset = feeQuote(ctx, dispatcher, ctx.any.asset().id)
      expect(() =>
        callAs(ctx, distributor, stakeholder1, () => distributor.pullFromDispatcher(otherAsset, 0), [otherAsset])
      ).toThrow(/InvalidQuote/)
      expect(distributor.heldBalance(0)).toEqual(0)
    })

    it('pulls several assets, skipping empty pools', () => {
      const { dispatcher, distributor, stakeholder1, earnDispatcherFees } = setup()
      const token = ctx.any.asset()
      earnDispatcherFees(1_000_000)
      const assetIds = [Uint64(0), token.id]
      const quote = multiFeeQuote(ctx, dispatcher, assetIds)

      const pulled = callAs(ctx, distributor, stakeholder1, () => distributor.pullFromDispatcherMultiple(quote, assetIds), [quote])

      expect(pulled).toEqual([10_000, 0])
      expect(distributor.heldBalance(0)).toEqual(10_000)
      expect(distributor.heldBalance(token.id)).toEqual(0)
      const claim = ctx.txn.lastGroup.lastItxnGroup().getApplicationCallInnerTxn(0)
      expect(claim.appArgs(0)).toEqual(arc4.methodSelector('claimFeesMultiple(uint64[])uint64[]'))
      expect(claim.appArgs(1)).toEqual(arc4.encodeArc4(assetIds))
    })

    it('returns zeros without failing when every listed pool is empty', () => {
      const { ledger, distributor, stakeholder1 } = setup()
      const assetIds = [Uint64(0)]
      const quote = multiFeeQuote(ctx, ledger, assetIds)

      expect(callAs(ctx, distributor, stakeholder1, () => distributor.pullFromLedgerMultiple(quote, assetIds), [quote])).toEqual([0])
      expect(distributor.heldBalance(0)).toEqual(0)
    })

    it('refuses an empty asset list from either source', () => {
      const { dispatcher, ledger, distributor, stakeholder1 } = setup()
      const dispatcherQuote = multiFeeQuote(ctx, dispatcher, [])
      const ledgerQuote = multiFeeQuote(ctx, ledger, [])

      expect(() =>
        callAs(ctx, distributor, stakeholder1, () => distributor.pullFromDispatcherMultiple(dispatcherQuote, []), [dispatcherQuote])
      ).toThrow(/EmptyBatch/)
      expect(() =>
        callAs(ctx, distributor, stakeholder1, () => distributor.pullFromLedgerMultiple(ledgerQuote, []), [ledgerQuote])
      ).toThrow(/EmptyBatch/)
    })
  })

  describe('claimShare', () => {
    it('pays each stakeholder against the live pool, so order matters', () => {
      const { distributor, stakeholder1, stakeholder2, earnDispatcherFees, pullDispatcher } = setup()
      earnDispatcherFees(20_000)
      pullDispatcher()
      expect(distributor.heldBalance(0)).toEqual(200)
      expect(distributor.pendingShare(stakeholder1, 0)).toEqual(20)
      expect(distributor.pendingShare(stakeholder2, 0)).toEqual(180)

      expect(callAs(ctx, distributor, stakeholder2, () => distributor.claimShare(0))).toEqual(180)
      const payout = ctx.txn.lastGroup.lastItxnGroup().getPaymentInnerTxn(0)
      expect(payout.receiver).toEqual(stakeholder2)
      expect(payout.amount).toEqual(180)

      expect(callAs(ctx, distributor, stakeholder1, () => distributor.claimShare(0))).toEqual(2)
      expect(distributor.heldBalance(0)).toEqual(18)
    })

    it('gives 20 then 162 when the smaller stakeholder claims first', () => {
      const { distributor, stakeholder1, stakeholder2, earnDispatcherFees, pullDispatcher } = setup()
      earnDispatcherFees(20_000)
      pullDispatcher()

      expect(callAs(ctx, distributor, stakeholder1, () => distributor.claimShare(0))).toEqual(20)
      expect(callAs(ctx, distributor, stakeholder2, () => distributor.claimShare(0))).toEqual(162)
      expect(distributor.heldBalance(0)).toEqual(18)
    })

    it('refuses outsiders and an empty pool', () => {
      const { distributor, admin, stakeholder1 } = setup()

      expect(() => callAs(ctx, distributor, admin, () => distributor.claimShare(0))).toThrow(/Unauthorized/)
      expect(() => callAs(ctx, distributor, stakeholder1, () => distributor.claimShare(0))).toThrow(/NothingToClaim/)
      expect(distributor.pendingShare(admin, 0)).toEqual(0)
    })
  })

  describe('setup and administration', () => {
    it('reports the configured split', () => {
      const { distributor, stakeholder1, stakeholder2 } = setup()

      expect(distributor.getStakeholders()).toEqual([stakeholder1, 1_000, stakeholder2, 9_000])
    })

    it('validates shares and addresses at initialization', () => {
      const distributor = ctx.contract.create(FeeDistributor)
      const first = ctx.any.account()
      const second = ctx.any.account()
      const dispatcher = ctx.any.application()
      const ledger = ctx.any.application()

      expect(() => distributor.initialize(first, 5_000, second, 4_000, dispatcher, ledger)).toThrow(/InvalidShares/)
      expect(() => distributor.initialize(first, 5_000, first, 5_000, dispatcher, ledger)).toThrow(/InvalidAddress/)
      expect(() => distributor.initialize(first, 5_000, Global.zeroAddress, 5_000, dispatcher, ledger)).toThrow(
        /InvalidAddress/
      )
      expect(() => distributor.initialize(ctx.defaultSender, 5_000, second, 5_000, dispatcher, ledger)).not.toThrow()
      expect(() => distributor.initialize(first, 5_000, second, 5_000, dispatcher, ledger)).toThrow(/AlreadyInitialized/)
    })

    it('lets only the admin repoint the sources', () => {
      const { distributor, admin, stakeholder1 } = setup()
      const dispatcher = ctx.any.application()
      const ledger = ctx.any.application()

      expect(() => callAs(ctx, distributor, stakeholder1, () => distributor.setSources(dispatcher, ledger))).toThrow(
        /Unauthorized/
      )
      callAs(ctx, distributor, admin, () => distributor.setSources(dispatcher, ledger))
      expect(distributor.dispatcherApp.value).toEqual(dispatcher.id)
      expect(distributor.ledgerApp.value).toEqual(ledger.id)
    })

    it('refuses every state change while a payout holds the lock', () => {
      const { distributor, dispatcherApp, admin, stakeholder1, earnDispatcherFees, pullDispatcher } = setup()
      earnDispatcherFees(20_000)
      pullDispatcher()
      distributor.locked.value = Uint64(1)

      expect(() =>
        callAs(ctx, distributor, admin, () => distributor.setSources(ctx.any.application(), ctx.any.application()))
      ).toThrow(/ReentrantCall/)
      expect(() => callAs(ctx, distributor, admin, () => distributor.transferOwnership(stakeholder1))).toThrow(
        /ReentrantCall/
      )
      expect(() => callAs(ctx, distributor, stakeholder1, () => distributor.claimShare(0))).toThrow(/ReentrantCall/)

      expect(distributor.dispatcherApp.value).toEqual(dispatcherApp.id)
      expect(distributor.heldBalance(0)).toEqual(200)
    })
  })
})
