import {
  Application,
  Asset,
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
import type { Account, uint64 } from '@algorandfoundation/algorand-typescript'
import { FeeCollector } from '../shared/fee-collector.algo'
import { BPS_DENOMINATOR, NATIVE_ASSET } from '../shared/protocol-contract.algo'

export const MAX_DISPATCHER_FEE_BPS: uint64 = 300

/**
 * Dispatcher: pays a handle, directly or through the Escrow Ledger
 *
 * Core Responsibilities:
 * 1. Resolve the handle through the registry at call time
 * 2. Registered: take the fee and pay the owner at once
 * 3. Unregistered: forward the full amount, fee-free, to the ledger's deposit
 * 4. Batches: pay a caller-split list of direct recipients and escrow the rest in one deposit
 *
 * Group layout for `transfer`:
 *   (0) payment or asset transfer of `amount` to this app
 *   (1) registry.resolve(handle)  (read-only; its return log is the owner)
 *   (2) Dispatcher.transfer
 * The caller also names the recipient so the account reaches the app's
 * references; it must match what the registry returned.
 *
 * Economics:
 * - direct: fee = floor(amount * feeBps / 10000), net = amount - fee
 * - batch: each direct recipient gets floor(a * (10000 - feeBps) / 10000);
 *   the pool keeps what the batch actually retained, directTotal - sum(nets),
 *   so value in == value out + pool + escrow exactly
 */
export class Dispatcher extends FeeCollector {
  // -----------------------
  // Global State: Configuration
  // -----------------------
  registryApp = GlobalState<uint64>({ initialValue: Uint64(0) })
  ledgerApp = GlobalState<uint64>({ initialValue: Uint64(0) })

  protected feeCeiling(): uint64 {
    return MAX_DISPATCHER_FEE_BPS
  }

  // -----------------------
  // Setup
  // -----------------------
  initialize(registry: Application, ledger: Application, feeRateBps: uint64, feeReceiver: Account): void {
    this.onlyAdmin()
    this.requireUninitialized()
    this.checkFeeConfig(feeRateBps, feeReceiver)
    this.acquire()

    this.registryApp.value = registry.id
    this.ledgerApp.value = ledger.id
    this.configureFees(feeRateBps, feeReceiver)
    this.initialized.value = Uint64(1)

    this.release()
  }

  setRegistry(registry: Application): void {
    this.onlyAdmin()
    this.acquire()

    const previous = this.registryApp.value
    this.registryApp.value = registry.id
    log(Bytes('RegistryUpdated:'), op.itob(previous), op.itob(registry.id))

    this.release()
  }

  setLedger(ledger: Application): void {
    this.onlyAdmin()
    this.acquire()

    const previous = this.ledgerApp.value
    this.ledgerApp.value = ledger.id
    log(Bytes('LedgerUpdated:'), op.itob(previous), op.itob(ledger.id))

    this.release()
  }

  // -----------------------
  // Single transfers
  // -----------------------
  /**
   * Returns [net, fee, escrowed]: escrowed is the amount sent to the ledger (0 when paid directly).
   */
  transfer(
    payment: gtxn.PaymentTxn,
    lookup: gtxn.ApplicationCallTxn,
    handle: string,
    recipient: Account
  ): [uint64, uint64, uint64] {
    return this.route(NATIVE_ASSET, this.receivedPayment(payment), lookup, handle, recipient)
  }

  transferAsset(
    xfer: gtxn.AssetTransferTxn,
    lookup: gtxn.ApplicationCallTxn,
    handle: string,
    recipient: Account
  ): [uint64, uint64, uint64] {
    return this.route(xfer.xferAsset.id, this.receivedAsset(xfer), lookup, handle, recipient)
  }

  // -----------------------
  // Batches
  // -----------------------
  /**
   * Registered recipients are given as addresses and are not re-resolved.
   * Returns [escrowedTotal, directTotal, fee, retained].
   */
  batchTransfer(
    payment: gtxn.PaymentTxn,
    unregisteredHandles: string[],
    vaultAmounts: uint64[],
    registeredAddresses: Account[],
    directAmounts: uint64[]
  ): [uint64, uint64, uint64, uint64] {
    return this.dispatchBatch(
      NATIVE_ASSET,
      this.receivedPayment(payment),
      unregisteredHandles,
      vaultAmounts,
      registeredAddresses,
      directAmounts
    )
  }

  batchTransferAsset(
    xfer: gtxn.AssetTransferTxn,
    unregisteredHandles: string[],
    vaultAmounts: uint64[],
    registeredAddresses: Account[],
    directAmounts: uint64[]
  ): [uint64, uint64, uint64, uint64] {
    return this.dispatchBatch(
      xfer.xferAsset.id,
      this.receivedAsset(xfer),
      unregisteredHandles,
      vaultAmounts,
      registeredAddresses,
      directAmounts
    )
  }

  // -----------------------
  // Views
  // -----------------------
  /**
   * [net, fee] a direct transfer of `amount` would produce at the current rate.
   */
  previewTransfer(amount: uint64): [uint64, uint64] {
    const fee = this.bpsOf(amount, this.feeBps.value)
    return [amount - fee, fee]
  }

  getRegistry(): uint64 {
    return this.registryApp.value
  }

  getLedger(): uint64 {
    return this.ledgerApp.value
  }

  // -----------------------
  // Internals
  // -----------------------
  private route(
    assetId: uint64,
    amount: uint64,
    lookup: gtxn.ApplicationCallTxn,
    handle: string,
    recipient: Account
  ): [uint64, uint64, uint64] {
    this.requireInitialized()
    assert(amount > Uint64(0), 'InvalidAmount')
    const handleHash = this.handleHash(handle)
    const owner = this.resolvedOwner(lookup, this.registryApp.value, handle)

    if (owner === Global.zeroAddress.bytes) {
      this.acquire()
      this.escrow(assetId, handle, amount)
      log(Bytes('TransferCompleted:'), Txn.sender.bytes, handleHash, owner, op.itob(assetId), op.itob(0), op.itob(0), op.itob(amount))
      this.release()
      return [Uint64(0), Uint64(0), amount]
    }

    assert(recipient.bytes === owner, 'RecipientMismatch')
    this.requireReceivable(recipient, assetId)
    const fee = this.bpsOf(amount, this.feeBps.value)
    const net: uint64 = amount - fee
    this.acquire()

    this.accrueFee(assetId, fee)
    this.payOut(recipient, assetId, net)
    log(Bytes('TransferCompleted:'), Txn.sender.bytes, handleHash, owner, op.itob(assetId), op.itob(net), op.itob(fee), op.itob(0))

    this.release()
    return [net, fee, Uint64(0)]
  }

  private dispatchBatch(
    assetId: uint64,
    received: uint64,
    handles: string[],
    vaultAmounts: uint64[],
    addresses: Account[],
    directAmounts: uint64[]
  ): [uint64, uint64, uint64, uint64] {
    this.requireInitialized()
    assert(handles.length === vaultAmounts.length, 'LengthMismatch')
    assert(addresses.length === directAmounts.length, 'LengthMismatch')
    assert(handles.length + addresses.length > 0, 'EmptyBatch')

    let vaultTotal: uint64 = 0
    for (let i: uint64 = 0; i < handles.length; i++) {
      this.handleHash(handles[i])
      assert(vaultAmounts[i] > Uint64(0), 'InvalidAmount')
      vaultTotal += vaultAmounts[i]
    }

    const keepBps: uint64 = BPS_DENOMINATOR - this.feeBps.value
    let directTotal: uint64 = 0
    let paidTotal: uint64 = 0
    for (let i: uint64 = 0; i < addresses.length; i++) {
      this.requireReceivable(addresses[i], assetId)
      assert(directAmounts[i] > Uint64(0), 'InvalidAmount')
      directTotal += directAmounts[i]
      paidTotal += this.bpsOf(directAmounts[i], keepBps)
    }
    assert(vaultTotal + directTotal === received, 'AmountMismatch')

    const fee = this.bpsOf(directTotal, this.feeBps.value)
    const retained: uint64 = directTotal - paidTotal
    this.acquire()

    this.accrueFee(assetId, retained)
    for (let i: uint64 = 0; i < addresses.length; i++) {
      this.payOut(addresses[i], assetId, this.bpsOf(directAmounts[i], keepBps))
    }
    if (vaultTotal > Uint64(0)) {
      this.escrowBatch(assetId, handles, vaultAmounts, vaultTotal)
    }
    log(
      Bytes('BatchTransferCompleted:'),
      Txn.sender.bytes,
      op.itob(assetId),
      op.itob(vaultTotal),
      op.itob(directTotal),
      op.itob(fee),
      op.itob(retained)
    )

    this.release()
    return [vaultTotal, directTotal, fee, retained]
  }

  // The ledger's deposit takes the value transfer as the preceding txn of the inner group
  private escrow(assetId: uint64, handle: string, amount: uint64): void {
    const ledger = Application(this.ledgerApp.value)
    if (assetId === NATIVE_ASSET) {
      const funds = itxn.payment({ receiver: ledger.address, amount: amount })
      const call = itxn.applicationCall({
        appId: ledger,
        appArgs: [arc4.methodSelector('deposit(pay,string)uint64'), arc4.encodeArc4(handle)],
      })
      itxn.submitGroup(funds, call)
    } else {
      const funds = itxn.assetTransfer({ xferAsset: Asset(assetId), assetReceiver: ledger.address, assetAmount: amount })
      const call = itxn.applicationCall({
        appId: ledger,
        appArgs: [arc4.methodSelector('depositAsset(axfer,string)uint64'), arc4.encodeArc4(handle)],
      })
      itxn.submitGroup(funds, call)
    }
  }

  private escrowBatch(assetId: uint64, handles: string[], amounts: uint64[], total: uint64): void {
    const ledger = Application(this.ledgerApp.value)
    if (assetId === NATIVE_ASSET) {
      const funds = itxn.payment({ receiver: ledger.address, amount: total })
      const call = itxn.applicationCall({
        appId: ledger,
        appArgs: [
          arc4.methodSelector('batchDeposit(pay,string[],uint64[])uint64'),
          arc4.encodeArc4(handles),
          arc4.encodeArc4(amounts),
        ],
      })
      itxn.submitGroup(funds, call)
    } else {
      const funds = itxn.assetTransfer({ xferAsset: Asset(assetId), assetReceiver: ledger.address, assetAmount: total })
      const call = itxn.applicationCall({
        appId: ledger,
        appArgs: [
          arc4.methodSelector('batchDepositAsset(axfer,string[],uint64[])uint64'),
          arc4.encodeArc4(handles),
          arc4.encodeArc4(amounts),
        ],
      })
      itxn.submitGroup(funds, call)
    }
  }
}
