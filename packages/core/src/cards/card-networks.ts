import type { CardNetwork } from '@card-ledger/types';

export type NetworkProfile = {
  prefix: string;
  panLength: number;
  country: string;
  issuer: string;
  binRange: string;
};

/**
 * The two supported networks and their fixed issuing metadata
 */
export const NETWORK_PROFILES = {
  visa: {
    prefix: '4',
    panLength: 16,
    country: 'US',
    issuer: 'Meridian Synthetic Bank',
    binRange: 'VISA 400000-499999',
  },
  mastercard: {
    prefix: '51',
    panLength: 16,
    country: 'GB',
    issuer: 'Harbourline Test Issuer',
    binRange: 'MC 510000-519999',
  },
} as const satisfies Record<CardNetwork, NetworkProfile>;

/**
 * Even seeds issue on visa, odd seeds on mastercard
 */
export function networkForSeed(seed: bigint): CardNetwork {
  return seed % 2n === 0n ? 'visa' : 'mastercard';
}
