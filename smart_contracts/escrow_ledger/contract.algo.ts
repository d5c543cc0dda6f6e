import { BoxMap, Bytes, GlobalState, Txn, Uint64, assert, gtxn, log, op } from '@algorandfoundation/algorand-typescript'
import type { Application, Account, bytes, uint64 } from '@algorandfoundation/algorand-typescript'
import { FeeCollector } from '../shared/fee-collector.algo'
import { NATIVE_ASSET } from '../shared/protocol-contract.algo'

export const MAX_LEDGER_FEE_BPS: uint64 = 1_000

/**
 * EscrowLedger: custody for payments to handles that have no owner yet
 *
 * Core Responsibilities:
 * 1. Accept deposits for any handle (single or batched, ALGO or ASA); anyone may deposit
 * 2. Keep one balance per (sha256(handle), asset)
 * 3. Release a balance to the address the registry currently resolves the handle to
 * 4. Charge the withdrawal fee and hold it for the fee receiver
 *
 * NOT Responsible For:
 * - Registering handles (the registry app does)
 * - Deciding whether a payment is escrowed (the Dispatcher does)
 *
 * Registry reads:
 * Withdrawals carry the registry's `resolve(string)address` call as the
 * preceding transaction of the group. The ledger checks the call targets the
 * configured registry with this handle and takes the owner from its return log.
 *
 * Economics:
 * - deposits are fee-free
 * - fee = floor(balance * feeBps / 10000), net = balance - fee, paid to the owner
 * - invariant: sum of balances for an asset == totalEscrowed(asset)
 */
export class EscrowLedger extends FeeCollector {
  // -----------------------
  // Global State: Configuration
  // -----------------------
  registryApp = GlobalState<uint64>({ initialValue: Uint64(0) })

  // -----------------------
  // Box Storage
  // Key: sha256(handle) || itob(assetId)
  // -----------------------
  balances = BoxMap<bytes, uint64>({ keyPrefix: Bytes('bal:') })
  escrowed = BoxMap<uint64, uint64>({ keyPrefix: Bytes('esc:') })

  protected feeCeiling(): uint64 {
    return MAX_LEDGER_FEE_BPS
  }

  // -----------------------
  // Setup
  // -----------------------
  initialize(registry: Application, feeRateBps: uint64, feeReceiver: Account): void {
    this.onlyAdmin()
    this.requireUninitialized()
    this.checkFeeConfig(feeRateBps, feeReceiver)
    this.acquire()

    this.registryApp.value = registry.id
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

  // -----------------------
  // Deposits
  // -----------------------
  deposit(payment: gtxn.PaymentTxn, handle: string): uint64 {
    const amount = this.receivedPayment(payment)
    return this.credit(handle, NATIVE_ASSET, amount)
  }

  depositAsset(xfer: gtxn.AssetTransferTxn, handle: string): uint64 {
    const amount = this.receivedAsset(xfer)
    return this.credit(handle, xfer.xferAsset.id, amount)
  }

  batchDeposit(payment: gtxn.PaymentTxn, handles: string[], amounts: uint64[]): uint64 {
    const total = this.receivedPayment(payment)
    return this.creditMany(handles, amounts, NATIVE_ASSET, total)
  }

  batchDepositAsset(xfer: gtxn.AssetTransferTxn, handles: string[], amounts: uint64[]): uint64 {
    const total = this.receivedAsset(xfer)
    return this.creditMany(handles, amounts, xfer.xferAsset.id, total)
  }

  // -----------------------
  // Withdrawals
  // -----------------------
  /**
   * Pays the handle's whole balance, less the ledger fee, to the caller.
   * `lookup` is the registry's resolve call for `handle`, earlier in the group.
   * Returns [net, fee].
   */
  withdraw(lookup: gtxn.ApplicationCallTxn, handle: string, assetId: uint64): [uint64, uint64] {
    this.requireOwner(lookup, handle)
    const key = this.balanceKey(handle, assetId)
    const balance = this.balances(key).get({ default: Uint64(0) })
    assert(balance > Uint64(0), 'NothingToWithdraw')
    this.requireReceivable(Txn.sender, assetId)
    this.acquire()

    const [net, fee] = this.payBalance(key, handle, assetId, balance)

    this.release()
    return [net, fee]
  }

  /**
   * ALGO first, then each listed asset; empty balances are skipped.
   * Returns the net paid per position: [ALGO, ...assetIds].
   */
  withdrawAll(lookup: gtxn.ApplicationCallTxn, handle: string, assetIds: uint64[]): uint64[] {
    this.requireOwner(lookup, handle)
    let funded = this.balances(this.balanceKey(handle, NATIVE_ASSET)).get({ default: Uint64(0) }) > Uint64(0)
    for (const assetId of assetIds) {
      if (this.balances(this.balanceKey(handle, assetId)).get({ default: Uint64(0) }) > Uint64(0)) {
        this.requireReceivable(Txn.sender, assetId)
        funded = true
      }
    }
    assert(funded, 'NothingToWithdraw')
    this.acquire()

    const paid: uint64[] = [this.releaseIfFunded(handle, NATIVE_ASSET)]
    for (const assetId of assetIds) {
      paid.push(this.releaseIfFunded(handle, assetId))
    }

    this.release()
    return paid
  }

  // -----------------------
  // Views
  // -----------------------
  balanceOf(handle: string, assetId: uint64): uint64 {
    return this.balances(this.balanceKey(handle, assetId)).get({ default: Uint64(0) })
  }

  totalEscrowed(assetId: uint64): uint64 {
    return this.escrowed(assetId).get({ default: Uint64(0) })
  }

  getRegistry(): uint64 {
    return this.registryApp.value
  }

  // -----------------------
  // Internals
  // -----------------------
  private credit(handle: string, assetId: uint64, amount: uint64): uint64 {
    assert(amount > Uint64(0), 'InvalidAmount')
    const key = this.balanceKey(handle, assetId)
    this.acquire()

    const balance: uint64 = this.balances(key).get({ default: Uint64(0) }) + amount
    this.balances(key).value = balance
    this.escrowed(assetId).value = this.totalEscrowed(assetId) + amount
    log(Bytes('Deposited:'), Txn.sender.bytes, this.handleHash(handle), op.itob(assetId), op.itob(amount))

    this.release()
    return balance
  }

  private creditMany(handles: string[], amounts: uint64[], assetId: uint64, total: uint64): uint64 {
    assert(handles.length === amounts.length, 'LengthMismatch')
    assert(handles.length > 0, 'EmptyBatch')
    let sum: uint64 = 0
    for (let i: uint64 = 0; i < handles.length; i++) {
      this.handleHash(handles[i])
      assert(amounts[i] > Uint64(0), 'InvalidAmount')
      sum += amounts[i]
    }
    assert(sum === total, 'AmountMismatch')
    this.acquire()

    for (let i: uint64 = 0; i < handles.length; i++) {
      const key = this.balanceKey(handles[i], assetId)
      this.balances(key).value = this.balances(key).get({ default: Uint64(0) }) + amounts[i]
    }
    this.escrowed(assetId).value = this.totalEscrowed(assetId) + sum
    log(Bytes('BatchDeposited:'), Txn.sender.bytes, op.itob(assetId), op.itob(handles.length), op.itob(sum))

    this.release()
    return sum
  }

  private requireOwner(lookup: gtxn.ApplicationCallTxn, handle: string): void {
    this.requireInitialized()
    this.handleHash(handle)
    const owner = this.resolvedOwner(lookup, this.registryApp.value, handle)
    assert(owner === Txn.sender.bytes, 'Unauthorized')
  }

  private releaseIfFunded(handle: string, assetId: uint64): uint64 {
    const key = this.balanceKey(handle, assetId)
    const balance = this.balances(key).get({ default: Uint64(0) })
    if (balance === Uint64(0)) {
      return Uint64(0)
    }
    const paid = this.payBalance(key, handle, assetId, balance)
    return paid[0]
  }

  // Entry and total go down, the fee is accrued, then the net leaves custody
  private payBalance(key: bytes, handle: string, assetId: uint64, balance: uint64): [uint64, uint64] {
    const fee = this.bpsOf(balance, this.feeBps.value)
    const net: uint64 = balance - fee

    this.balances(key).value = Uint64(0)
    this.escrowed(assetId).value = this.totalEscrowed(assetId) - balance
    this.accrueFee(assetId, fee)
    this.payOut(Txn.sender, assetId, net)
    log(Bytes('Withdrawn:'), Txn.sender.bytes, this.handleHash(handle), op.itob(assetId), op.itob(net), op.itob(fee))

    return [net, fee]
  }

  private balanceKey(handle: string, assetId: uint64): bytes {
    return this.handleHash(handle).concat(op.itob(assetId))
  }
}
