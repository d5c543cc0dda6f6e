import { Bytes, Uint64, arc4, op } from '@algorandfoundation/algorand-typescript'
import type { Account, Application, Contract, bytes, uint64 } from '@algorandfoundation/algorand-typescript'
import type { TestExecutionContext } from '@algorandfoundation/algorand-typescript-testing'
import { DEFAULT_FEES } from '../config/protocol'
import { Dispatcher } from '../dispatcher/contract.algo'
import { EscrowLedger } from '../escrow_ledger/contract.algo'
import { FeeDistributor } from '../fee_distributor/contract.algo'
import type { FeeCollector } from '../shared/fee-collector.algo'

type Group = Parameters<TestExecutionContext['txn']['createScope']>[0]

// ARC-4 return-value log prefix
export const ABI_RETURN = Bytes.fromHex('151f7c75')

const ZERO_ADDRESS_BYTES = Bytes.fromHex('00'.repeat(32))

/**
 * Runs `fn` as the app call of `contract` sent by `sender`, with `preceding`
 * placed before it in the group.
 */
export function callAs<T>(
  ctx: TestExecutionContext,
  contract: Contract,
  sender: Account,
  fn: () => T,
  preceding: Group = []
): T {
  const call = ctx.any.txn.applicationCall({ appId: ctx.ledger.getApplicationForContract(contract), sender })
  return ctx.txn.createScope([...preceding, call], preceding.length).execute(fn)
}

export function appAddress(ctx: TestExecutionContext, contract: Contract): Account {
  return ctx.ledger.getApplicationForContract(contract).address
}

/**
 * In-process stand-in for the handle registry app. `lookup` builds the
 * read-only `resolve(string)address` call with the answer in its return log.
 */
export class HandleDirectory {
  readonly app: Application
  private readonly owners = new Map<string, Account>()

  constructor(private readonly ctx: TestExecutionContext) {
    this.app = ctx.any.application()
  }

  register(handle: string, owner: Account): void {
    this.owners.set(handle, owner)
  }

  resolve(handle: string): Account | undefined {
    return this.owners.get(handle)
  }

  lookup(handle: string) {
    const owner = this.owners.get(handle)
    return this.ctx.any.txn.applicationCall({
      appId: this.app,
      appArgs: [arc4.methodSelector('resolve(string)address'), arc4.encodeArc4(handle)],
      appLogs: [ABI_RETURN.concat(owner === undefined ? ZERO_ADDRESS_BYTES : owner.bytes)],
    })
  }
}

/**
 * The `accumulatedFees(uint64)uint64` call a distributor pull reads,
 * answered with the source's current pool.
 */
export function feeQuote(ctx: TestExecutionContext, source: FeeCollector, assetId: uint64) {
  return answeredCall(
    ctx,
    ctx.ledger.getApplicationForContract(source),
    [arc4.methodSelector('accumulatedFees(uint64)uint64'), op.itob(assetId)],
    op.itob(source.accumulatedFees(assetId))
  )
}

export function multiFeeQuote(ctx: TestExecutionContext, source: FeeCollector, assetIds: uint64[]) {
  return answeredCall(
    ctx,
    ctx.ledger.getApplicationForContract(source),
    [arc4.methodSelector('accumulatedFeesMultiple(uint64[])uint64[]'), arc4.encodeArc4(assetIds)],
    arc4.encodeArc4(source.accumulatedFeesMultiple(assetIds))
  )
}

export function answeredCall(ctx: TestExecutionContext, app: Application, appArgs: bytes[], result: bytes) {
  return ctx.any.txn.applicationCall({ appId: app, appArgs, appLogs: [ABI_RETURN.concat(result)] })
}

export interface ProtocolFixtureOptions {
  dispatcherFeeBps?: number
  ledgerFeeBps?: number
}

/**
 * Creates the three apps, as the default sender, and wires them the way a
 * deployment does: both fee receivers are the distributor's address and the
 * stakeholders split 10% / 90%.
 */
export function createProtocolFixture(ctx: TestExecutionContext, options: ProtocolFixtureOptions = {}) {
  const dispatcherFeeBps = options.dispatcherFeeBps ?? Number(DEFAULT_FEES.dispatcherFeeBps)
  const ledgerFeeBps = options.ledgerFeeBps ?? Number(DEFAULT_FEES.ledgerFeeBps)
  const [share1, share2] = DEFAULT_FEES.stakeholderShares

  const registry = new HandleDirectory(ctx)
  const ledger = ctx.contract.create(EscrowLedger)
  const dispatcher = ctx.contract.create(Dispatcher)
  const distributor = ctx.contract.create(FeeDistributor)
  const ledgerApp = ctx.ledger.getApplicationForContract(ledger)
  const dispatcherApp = ctx.ledger.getApplicationForContract(dispatcher)
  const distributorApp = ctx.ledger.getApplicationForContract(distributor)
  const stakeholder1 = ctx.any.account()
  const stakeholder2 = ctx.any.account()

  ledger.initialize(registry.app, ledgerFeeBps, distributorApp.address)
  dispatcher.initialize(registry.app, ledgerApp, dispatcherFeeBps, distributorApp.address)
  distributor.initialize(stakeholder1, Number(share1), stakeholder2, Number(share2), dispatcherApp, ledgerApp)

  return {
    registry,
    ledger,
    dispatcher,
    distributor,
    ledgerApp,
    dispatcherApp,
    distributorApp,
    stakeholder1,
    stakeholder2,
    admin: ctx.defaultSender,
  }
}

export function optedInAccount(ctx: TestExecutionContext, assetId: uint64): Account {
  return ctx.any.account({ optedAssetBalances: new Map([[assetId, Uint64(0)]]) })
}
