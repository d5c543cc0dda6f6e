/**
 * Protocol Configuration
 *
 * Fee rates and the fee split for one deployment of the three components:
 * - Dispatcher (direct-transfer fee, capped at 300 bps)
 * - EscrowLedger (withdrawal fee, capped at 1000 bps)
 * - FeeDistributor (two stakeholders, shares summing to 10_000 bps)
 *
 * Values come from the environment; test fixtures take the defaults.
 * Addresses are base32 Algorand addresses.
 */

import { ValidationError, parseBigIntSetting, validateAddress, validateBasisPoints } from './validate'

// Mirrors MAX_DISPATCHER_FEE_BPS / MAX_LEDGER_FEE_BPS enforced on-chain
export const FEE_CEILINGS = {
  dispatcherFeeBps: 300n,
  ledgerFeeBps: 1_000n,
} as const

export interface StakeholderConfig {
  /** Stakeholder payout address */
  address: string

  /** Share of distributor custody in basis points */
  shareBps: bigint
}

export interface ProtocolConfig {
  /** Dispatcher direct-transfer fee (bps) */
  dispatcherFeeBps: bigint

  /** EscrowLedger withdrawal fee (bps) */
  ledgerFeeBps: bigint

  /** The two fee stakeholders */
  stakeholders: readonly [StakeholderConfig, StakeholderConfig]
}

/**
 * Default economics: 1% direct fee, 1% withdrawal fee, 10% / 90% split.
 * Stakeholder addresses have no default and must be supplied.
 */
export const DEFAULT_FEES = {
  dispatcherFeeBps: 100n,
  ledgerFeeBps: 100n,
  stakeholderShares: [1_000n, 9_000n] as const,
}

export const ENV_KEYS = {
  dispatcherFeeBps: 'DISPATCHER_FEE_BPS',
  ledgerFeeBps: 'LEDGER_FEE_BPS',
  stakeholder1Address: 'STAKEHOLDER_1_ADDRESS',
  stakeholder1ShareBps: 'STAKEHOLDER_1_SHARE_BPS',
  stakeholder2Address: 'STAKEHOLDER_2_ADDRESS',
  stakeholder2ShareBps: 'STAKEHOLDER_2_SHARE_BPS',
} as const

/**
 * Check a config against the component limits before deploying it.
 */
export function validateProtocolConfig(config: ProtocolConfig): ProtocolConfig {
  validateBasisPoints(config.dispatcherFeeBps, 'dispatcherFeeBps', FEE_CEILINGS.dispatcherFeeBps)
  validateBasisPoints(config.ledgerFeeBps, 'ledgerFeeBps', FEE_CEILINGS.ledgerFeeBps)

  const [first, second] = config.stakeholders
  validateAddress(first.address, 'stakeholders[0].address')
  validateAddress(second.address, 'stakeholders[1].address')
  validateBasisPoints(first.shareBps, 'stakeholders[0].shareBps')
  validateBasisPoints(second.shareBps, 'stakeholders[1].shareBps')

  if (first.address === second.address) {
    throw new ValidationError('stakeholders', 'the two stakeholders must be different addresses')
  }
  if (first.shareBps + second.shareBps !== 10_000n) {
    throw new ValidationError('stakeholders', `shares must sum to 10000, got ${first.shareBps + second.shareBps}`)
  }
  return config
}

/**
 * Build a ProtocolConfig from environment variables, falling back to
 * DEFAULT_FEES for anything numeric that is unset.
 */
export function loadProtocolConfig(env: NodeJS.ProcessEnv = process.env): ProtocolConfig {
  const setting = (key: string, fallback: bigint): bigint => {
    const raw = env[key]
    return raw === undefined || raw === '' ? fallback : parseBigIntSetting(raw, key)
  }
  const required = (key: string): string => {
    const raw = env[key]
    if (raw === undefined || raw === '') {
      throw new ValidationError(key, 'missing environment variable')
    }
    return raw.trim()
  }

  return validateProtocolConfig({
    dispatcherFeeBps: setting(ENV_KEYS.dispatcherFeeBps, DEFAULT_FEES.dispatcherFeeBps),
    ledgerFeeBps: setting(ENV_KEYS.ledgerFeeBps, DEFAULT_FEES.ledgerFeeBps),
    stakeholders: [
      {
        address: required(ENV_KEYS.stakeholder1Address),
        shareBps: setting(ENV_KEYS.stakeholder1ShareBps, DEFAULT_FEES.stakeholderShares[0]),
      },
      {
        address: required(ENV_KEYS.stakeholder2Address),
        shareBps: setting(ENV_KEYS.stakeholder2ShareBps, DEFAULT_FEES.stakeholderShares[1]),
      },
    ],
  })
}
