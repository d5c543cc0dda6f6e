import {
  Asset,
  Bytes,
  Contract,
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

// Asset id 0 is ALGO; every other id is an ASA
export const NATIVE_ASSET: uint64 = 0

export const BPS_DENOMINATOR: uint64 = 10_000

/**
 * Base for the three protocol components.
 *
 * - admin: set to the creator, moved with transferOwnership
 * - locked: the call-in-progress flag. Every entry point that writes state
 *   takes it once its checks pass and drops it before returning; a failed
 *   call leaves no state behind, so the flag never outlives its call
 * - cross-app reads: read-only ABI calls placed earlier in the same group,
 *   verified here by app id, selector and argument
 */
export abstract class ProtocolContract extends Contract {
  admin = GlobalState<Account>({ initialValue: Txn.sender })
  locked = GlobalState<uint64>({ initialValue: Uint64(0) })
  initialized = GlobalState<uint64>({ initialValue: Uint64(0) })

  // -----------------------
  // Ownership
  // -----------------------
  transferOwnership(next: Account): void {
    this.onlyAdmin()
    assert(next !== Global.zeroAddress, 'InvalidAddress')
    this.acquire()

    const previous = this.admin.value
    this.admin.value = next
    log(Bytes('OwnershipTransferred:'), previous.bytes, next.bytes)

    this.release()
  }

  getOwner(): Account {
    return this.admin.value
  }

  // Needed before the app account can hold an ASA
  optInAsset(asset: Asset): void {
    this.onlyAdmin()
    this.acquire()

    itxn
      .assetTransfer({ xferAsset: asset, assetReceiver: Global.currentApplicationAddress, assetAmount: Uint64(0) })
      .submit()

    this.release()
  }

  // -----------------------
  // Guards
  // -----------------------
  protected onlyAdmin(): void {
    assert(Txn.sender === this.admin.value, 'Unauthorized')
  }

  protected requireInitialized(): void {
    assert(this.initialized.value === Uint64(1), 'NotInitialized')
  }

  protected requireUninitialized(): void {
    assert(this.initialized.value === Uint64(0), 'AlreadyInitialized')
  }

  protected acquire(): void {
    assert(this.locked.value === Uint64(0), 'ReentrantCall')
    this.locked.value = Uint64(1)
  }

  protected release(): void {
    this.locked.value = Uint64(0)
  }

  // -----------------------
  // Arithmetic
  // -----------------------
  /**
   * floor(amount * bps / 10_000) with a 128-bit intermediate product.
   */
  protected bpsOf(amount: uint64, bps: uint64): uint64 {
    const [high, low] = op.mulw(amount, bps)
    return op.divw(high, low, BPS_DENOMINATOR)
  }

  // -----------------------
  // Value out
  // -----------------------
  /**
   * Checked before any state changes: an ASA payout needs an opted-in receiver.
   */
  protected requireReceivable(receiver: Account, assetId: uint64): void {
    assert(receiver !== Global.zeroAddress, 'InvalidAddress')
    if (assetId !== NATIVE_ASSET) {
      assert(receiver.isOptedIn(Asset(assetId)), 'TransferFailed')
    }
  }

  protected payOut(receiver: Account, assetId: uint64, amount: uint64): void {
    if (assetId === NATIVE_ASSET) {
      itxn.payment({ receiver: receiver, amount: amount }).submit()
    } else {
      itxn.assetTransfer({ xferAsset: Asset(assetId), assetReceiver: receiver, assetAmount: amount }).submit()
    }
  }

  // -----------------------
  // Value in
  // -----------------------
  protected receivedPayment(payment: gtxn.PaymentTxn): uint64 {
    assert(payment.receiver === Global.currentApplicationAddress, 'InvalidPayment')
    return payment.amount
  }

  protected receivedAsset(xfer: gtxn.AssetTransferTxn): uint64 {
    assert(xfer.assetReceiver === Global.currentApplicationAddress, 'InvalidPayment')
    return xfer.assetAmount
  }

  // -----------------------
  // Cross-app reads
  // -----------------------
  /**
   * Return value of a read-only call earlier in this group: the call must
   * target `appId`, name `selector` and pass `arg` as its argument.
   */
  protected quotedResult(quote: gtxn.ApplicationCallTxn, appId: uint64, selector: bytes, arg: bytes): bytes {
    assert(appId !== Uint64(0), 'NotInitialized')
    assert(quote.appId.id === appId, 'InvalidQuote')
    assert(quote.appArgs(0) === selector, 'InvalidQuote')
    assert(quote.appArgs(1) === arg, 'InvalidQuote')

    const logged = quote.lastLog
    assert(logged.length >= Uint64(4), 'InvalidQuote')
    assert(logged.slice(0, 4) === Bytes.fromHex('151f7c75'), 'InvalidQuote')
    return logged.slice(4)
  }

  /**
   * Registry answer for `handle`: the 32-byte owner address, zero when unregistered.
   */
  protected resolvedOwner(lookup: gtxn.ApplicationCallTxn, registryAppId: uint64, handle: string): bytes {
    const owner = this.quotedResult(
      lookup,
      registryAppId,
      arc4.methodSelector('resolve(string)address'),
      arc4.encodeArc4(handle)
    )
    assert(owner.length === Uint64(32), 'InvalidQuote')
    return owner
  }

  protected handleHash(handle: string): bytes {
    assert(Bytes(handle).length > Uint64(0), 'InvalidHandle')
    return op.sha256(Bytes(handle))
  }
}
