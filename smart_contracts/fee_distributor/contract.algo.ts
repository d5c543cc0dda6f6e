import {
  Application,
  Asset,
  BoxMap,
  Bytes,
  Global,
  GlobalState,
  Txn,
  Uint64,
  arc4,
  assert,
  gtxn,
  itxn,
  log,
  op,
} from '@algorandfoundation/algorand-typescript'
import type { Account, bytes, uint64 } from '@algorandfoundation/algorand-typescript'
import { BPS_DENOMINATOR, NATIVE_ASSET, ProtocolContract } from '../shared/protocol-contract.algo'

/**
 * FeeDistributor: collects both fee pools and splits them between two stakeholders
 *
 * Core Responsibilities:
 * 1. Pull the Dispatcher's and the Escrow Ledger's fee pools into custody
 * 2. Pay each stakeholder its share of what is held at claim time
 *
 * Pulls:
 * The caller puts the source's `accumulatedFees` call earlier in the group;
 * the quoted amount is what this app adds to `held`, then it calls the
 * source's `claimFees`, which pays this app.
 *
 * Economics:
 * - share1Bps + share2Bps == 10000
 * - claimShare pays floor(held * shareBps / 10000) of the live balance, so
 *   claim order changes the amounts when claims interleave with new pulls
 */
export class FeeDistributor extends ProtocolContract {
  // -----------------------
  // Global State: Stakeholders and sources
  // -----------------------
  stakeholder1 = GlobalState<Account>({ initialValue: Global.zeroAddress })
  stakeholder2 = GlobalState<Account>({ initialValue: Global.zeroAddress })
  share1Bps = GlobalState<uint64>({ initialValue: Uint64(0) })
  share2Bps = GlobalState<uint64>({ initialValue: Uint64(0) })

  dispatcherApp = GlobalState<uint64>({ initialValue: Uint64(0) })
  ledgerApp = GlobalState<uint64>({ initialValue: Uint64(0) })

  // Custody per asset id, counted apart from the account's minimum balance
  held = BoxMap<uint64, uint64>({ keyPrefix: Bytes('held:') })

  // -----------------------
  // Setup
  // -----------------------
  initialize(
    stakeholder1: Account,
    share1Bps: uint64,
    stakeholder2: Account,
    share2Bps: uint64,
    dispatcher: Application,
    ledger: Application
  ): void {
    this.onlyAdmin()
    this.requireUninitialized()
    assert(share1Bps + share2Bps === BPS_DENOMINATOR, 'InvalidShares')
    assert(stakeholder1 !== Global.zeroAddress, 'InvalidAddress')
    assert(stakeholder2 !== Global.zeroAddress, 'InvalidAddress')
    assert(stakeholder1 !== stakeholder2, 'InvalidAddress')
    this.acquire()

    this.stakeholder1.value = stakeholder1
    this.stakeholder2.value = stakeholder2
    this.share1Bps.value = share1Bps
    this.share2Bps.value = share2Bps
    this.dispatcherApp.value = dispatcher.id
    this.ledgerApp.value = ledger.id
    this.initialized.value = Uint64(1)

    this.release()
  }

  setSources(dispatcher: Application, ledger: Application): void {
    this.onlyAdmin()
    this.acquire()

    this.dispatcherApp.value = dispatcher.id
    this.ledgerApp.value = ledger.id
    log(Bytes('SourcesUpdated:'), op.itob(dispatcher.id), op.itob(ledger.id))

    this.release()
  }

  // -----------------------
  // Pulls
  // -----------------------
  pullFromDispatcher(quote: gtxn.ApplicationCallTxn, assetId: uint64): uint64 {
    return this.pull(this.dispatcherApp.value, quote, assetId)
  }

  pullFromDispatcherMultiple(quote: gtxn.ApplicationCallTxn, assetIds: uint64[]): uint64[] {
    return this.pullMultiple(this.dispatcherApp.value, quote, assetIds)
  }

  pullFromLedger(quote: gtxn.ApplicationCallTxn, assetId: uint64): uint64 {
    return this.pull(this.ledgerApp.value, quote, assetId)
  }

  pullFromLedgerMultiple(quote: gtxn.ApplicationCallTxn, assetIds: uint64[]): uint64[] {
    return this.pullMultiple(this.ledgerApp.value, quote, assetIds)
  }

  // -----------------------
  // Claims
  // -----------------------
  claimShare(assetId: uint64): uint64 {
    const share = this.shareOf(Txn.sender)
    assert(share > Uint64(0), 'Unauthorized')
    const amount = this.bpsOf(this.heldBalance(assetId), share)
    assert(amount > Uint64(0), 'NothingToClaim')
    this.requireReceivable(Txn.sender, assetId)
    this.acquire()

    this.held(assetId).value = this.heldBalance(assetId) - amount
    this.payOut(Txn.sender, assetId, amount)
    log(Bytes('ShareClaimed:'), Txn.sender.bytes, op.itob(assetId), op.itob(amount))

    this.release()
    return amount
  }

  // -----------------------
  // Views
  // -----------------------
  getStakeholders(): [Account, uint64, Account, uint64] {
    return [this.stakeholder1.value, this.share1Bps.value, this.stakeholder2.value, this.share2Bps.value]
  }

  pendingShare(stakeholder: Account, assetId: uint64): uint64 {
    return this.bpsOf(this.heldBalance(assetId), this.shareOf(stakeholder))
  }

  heldBalance(assetId: uint64): uint64 {
    return this.held(assetId).get({ default: Uint64(0) })
  }

  // -----------------------
  // Internals
  // -----------------------
  private shareOf(account: Account): uint64 {
    if (account === this.stakeholder1.value) {
      return this.share1Bps.value
    }
    if (account === this.stakeholder2.value) {
      return this.share2Bps.value
    }
    return Uint64(0)
  }

  private onlyPuller(): void {
    this.requireInitialized()
    assert(
      Txn.sender === this.stakeholder1.value || Txn.sender === this.stakeholder2.value || Txn.sender === this.admin.value,
      'Unauthorized'
    )
  }

  private pull(source: uint64, quote: gtxn.ApplicationCallTxn, assetId: uint64): uint64 {
    this.onlyPuller()
    const quoted = this.quotedResult(
      quote,
      source,
      arc4.methodSelector('accumulatedFees(uint64)uint64'),
      op.itob(assetId)
    )
    assert(quoted.length === Uint64(8), 'InvalidQuote')
    const amount = op.btoi(quoted)
    assert(amount > Uint64(0), 'NothingToClaim')
    this.acquire()

    this.held(assetId).value = this.heldBalance(assetId) + amount
    this.callSource(source, assetId, arc4.methodSelector('claimFees(uint64)uint64'), op.itob(assetId))
    log(Bytes('FeesPulled:'), op.itob(source), op.itob(assetId), op.itob(amount))

    this.release()
    return amount
  }

  /**
   * Zero pools in the list are skipped; the source is called only when something is owed.
   */
  private pullMultiple(source: uint64, quote: gtxn.ApplicationCallTxn, assetIds: uint64[]): uint64[] {
    this.onlyPuller()
    assert(assetIds.length > 0, 'EmptyBatch')
    const encodedIds = arc4.encodeArc4(assetIds)
    const quoted = this.quotedResult(
      quote,
      source,
      arc4.methodSelector('accumulatedFeesMultiple(uint64[])uint64[]'),
      encodedIds
    )
    // uint16 length prefix, then one uint64 per asset
    assert(quoted.length === Uint64(2) + Uint64(8) * assetIds.length, 'InvalidQuote')
    assert(op.extractUint16(quoted, 0) === assetIds.length, 'InvalidQuote')

    const amounts: uint64[] = []
    let total: uint64 = 0
    for (let i: uint64 = 0; i < assetIds.length; i++) {
      const amount = op.extractUint64(quoted, Uint64(2) + Uint64(8) * i)
      amounts.push(amount)
      total += amount
    }
    if (total === Uint64(0)) {
      return amounts
    }
    this.acquire()

    for (let i: uint64 = 0; i < assetIds.length; i++) {
      if (amounts[i] > Uint64(0)) {
        this.held(assetIds[i]).value = this.heldBalance(assetIds[i]) + amounts[i]
        log(Bytes('FeesPulled:'), op.itob(source), op.itob(assetIds[i]), op.itob(amounts[i]))
      }
    }
    itxn
      .applicationCall({
        appId: Application(source),
        appArgs: [arc4.methodSelector('claimFeesMultiple(uint64[])uint64[]'), encodedIds],
      })
      .submit()

    this.release()
    return amounts
  }

  private callSource(source: uint64, assetId: uint64, selector: bytes, arg: bytes): void {
    if (assetId === NATIVE_ASSET) {
      itxn.applicationCall({ appId: Application(source), appArgs: [selector, arg] }).submit()
    } else {
      itxn.applicationCall({ appId: Application(source), appArgs: [selector, arg], assets: [Asset(assetId)] }).submit()
    }
  }
}
