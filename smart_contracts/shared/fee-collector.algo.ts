import { BoxMap, Bytes, Global, GlobalState, Txn, Uint64, assert, log, op } from '@algorandfoundation/algorand-typescript'
import type { Account, uint64 } from '@algorandfoundation/algorand-typescript'
import { BPS_DENOMINATOR, NATIVE_ASSET, ProtocolContract } from './protocol-contract.algo'

/**
 * Fee pool shared by the Dispatcher and the Escrow Ledger.
 *
 * Economics:
 * - fee = floor(amount * feeBps / 10000), accrued per asset into `fees`
 * - only the fee receiver claims; a claim zeroes the pool before paying it out
 * - the rate is bounded by `feeCeiling()`, set per component
 */
export abstract class FeeCollector extends ProtocolContract {
  // -----------------------
  // Global State: Fees
  // -----------------------
  feeBps = GlobalState<uint64>({ initialValue: Uint64(0) })
  feeReceiver = GlobalState<Account>({ initialValue: Global.zeroAddress })

  // Accumulated fee per asset id
  fees = BoxMap<uint64, uint64>({ keyPrefix: Bytes('fee:') })

  protected feeCeiling(): uint64 {
    return BPS_DENOMINATOR
  }

  // -----------------------
  // Views
  // -----------------------
  getFeeRate(): uint64 {
    return this.feeBps.value
  }

  getFeeReceiver(): Account {
    return this.feeReceiver.value
  }

  accumulatedFees(assetId: uint64): uint64 {
    return this.fees(assetId).get({ default: Uint64(0) })
  }

  accumulatedFeesMultiple(assetIds: uint64[]): uint64[] {
    const amounts: uint64[] = []
    for (const assetId of assetIds) {
      amounts.push(this.fees(assetId).get({ default: Uint64(0) }))
    }
    return amounts
  }

  // -----------------------
  // Claims
  // -----------------------
  claimFees(assetId: uint64): uint64 {
    this.onlyFeeReceiver()
    const amount = this.fees(assetId).get({ default: Uint64(0) })
    assert(amount > Uint64(0), 'NothingToClaim')
    this.requireReceivable(Txn.sender, assetId)
    this.acquire()

    this.fees(assetId).value = Uint64(0)
    this.payOut(Txn.sender, assetId, amount)
    log(Bytes('FeesClaimed:'), Txn.sender.bytes, op.itob(assetId), op.itob(amount))

    this.release()
    return amount
  }

  /**
   * Claims every listed pool; an empty pool is skipped and reported as 0.
   */
  claimFeesMultiple(assetIds: uint64[]): uint64[] {
    this.onlyFeeReceiver()
    assert(assetIds.length > 0, 'EmptyBatch')
    for (const assetId of assetIds) {
      if (this.fees(assetId).get({ default: Uint64(0) }) > Uint64(0)) {
        this.requireReceivable(Txn.sender, assetId)
      }
    }
    this.acquire()

    const claimed: uint64[] = []
    for (const assetId of assetIds) {
      const amount = this.fees(assetId).get({ default: Uint64(0) })
      if (amount > Uint64(0)) {
        this.fees(assetId).value = Uint64(0)
        this.payOut(Txn.sender, assetId, amount)
        log(Bytes('FeesClaimed:'), Txn.sender.bytes, op.itob(assetId), op.itob(amount))
      }
      claimed.push(amount)
    }

    this.release()
    return claimed
  }

  claimNativeFees(): uint64 {
    return this.claimFees(NATIVE_ASSET)
  }

  // -----------------------
  // Admin
  // -----------------------
  setFeeRate(feeBps: uint64): void {
    this.onlyAdmin()
    assert(feeBps <= this.feeCeiling(), 'FeeTooHigh')
    this.acquire()

    const previous = this.feeBps.value
    this.feeBps.value = feeBps
    log(Bytes('FeeRateUpdated:'), op.itob(previous), op.itob(feeBps))

    this.release()
  }

  setFeeReceiver(receiver: Account): void {
    this.onlyAdmin()
    assert(receiver !== Global.zeroAddress, 'InvalidAddress')
    this.acquire()

    this.feeReceiver.value = receiver
    log(Bytes('FeeReceiverUpdated:'), receiver.bytes)

    this.release()
  }

  // -----------------------
  // Internals
  // -----------------------
  protected checkFeeConfig(feeBps: uint64, receiver: Account): void {
    assert(feeBps <= this.feeCeiling(), 'FeeTooHigh')
    assert(receiver !== Global.zeroAddress, 'InvalidAddress')
  }

  protected configureFees(feeBps: uint64, receiver: Account): void {
    this.feeBps.value = feeBps
    this.feeReceiver.value = receiver
  }

  protected accrueFee(assetId: uint64, fee: uint64): void {
    if (fee === Uint64(0)) {
      return
    }
    this.fees(assetId).value = this.fees(assetId).get({ default: Uint64(0) }) + fee
    log(Bytes('FeesAccrued:'), op.itob(assetId), op.itob(fee))
  }

  private onlyFeeReceiver(): void {
    assert(Txn.sender === this.feeReceiver.value, 'Unauthorized')
  }
}
