/**
 * Batch Transfer Builder
 *
 * Dispatcher.batchTransfer trusts the caller to split recipients into
 * "unregistered handles" and "registered addresses". This builder does the
 * split off-chain by resolving every handle against the registry.
 */

import { validateHandle, validatePositiveAmount } from '../config/validate'

/** Off-chain view of the handle registry; undefined means unregistered */
export interface HandleResolver<A> {
  resolve(handle: string): A | undefined
}

export interface BatchEntry {
  handle: string
  amount: bigint
}

export interface BatchTransferPlan<A> {
  unregisteredHandles: string[]
  vaultAmounts: bigint[]
  registeredAddresses: A[]
  directAmounts: bigint[]
  /** Amount of the payment or asset transfer that goes first in the group */
  total: bigint
}

// uint64 on the AVM
const MAX_AMOUNT = 2n ** 64n - 1n

/**
 * Resolve and split entries. Repeated handles, and handles that resolve to
 * the same address, are merged so each recipient appears once.
 */
export function planBatchTransfer<A>(resolver: HandleResolver<A>, entries: readonly BatchEntry[]): BatchTransferPlan<A> {
  const vault = new Map<string, bigint>()
  const direct = new Map<A, bigint>()
  let total = 0n

  for (const [i, entry] of entries.entries()) {
    validateHandle(entry.handle, `entries[${i}].handle`)
    validatePositiveAmount(entry.amount, `entries[${i}].amount`)
    total += entry.amount
    if (total > MAX_AMOUNT) {
      throw new RangeError(`entries: total exceeds ${MAX_AMOUNT}`)
    }

    const owner = resolver.resolve(entry.handle)
    if (owner === undefined) {
      vault.set(entry.handle, (vault.get(entry.handle) ?? 0n) + entry.amount)
    } else {
      direct.set(owner, (direct.get(owner) ?? 0n) + entry.amount)
    }
  }

  return {
    unregisteredHandles: [...vault.keys()],
    vaultAmounts: [...vault.values()],
    registeredAddresses: [...direct.keys()],
    directAmounts: [...direct.values()],
    total,
  }
}
