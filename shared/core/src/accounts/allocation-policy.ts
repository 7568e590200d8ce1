/**
 * Bybit account selection for new ads.
 *
 * A policy receives the eligible candidates (available, below the cap) in
 * ascending id order and picks one. It must be a pure function of its input
 * so allocation stays deterministic.
 */

import type { BybitAccount } from '@p2p-settle/types';

export type AllocationPolicy = (candidates: readonly BybitAccount[]) => BybitAccount | undefined;

export type AllocationPolicyName = 'most-free-slots' | 'lowest-id';

/**
 * Fewest active ads first, lowest id on ties. Spreads ads evenly.
 */
export const mostFreeSlotsFirst: AllocationPolicy = (candidates) => {
  let best: BybitAccount | undefined;
  for (const account of candidates) {
    if (
      !best ||
      account.activeAdCount < best.activeAdCount ||
      (account.activeAdCount === best.activeAdCount && account.id < best.id)
    ) {
      best = account;
    }
  }
  return best;
};

/**
 * Lowest id first. Fills one account before moving to the next.
 */
export const lowestIdFirst: AllocationPolicy = (candidates) => {
  let best: BybitAccount | undefined;
  for (const account of candidates) {
    if (!best || account.id < best.id) {
      best = account;
    }
  }
  return best;
};

const POLICIES: Record<AllocationPolicyName, AllocationPolicy> = {
  'most-free-slots': mostFreeSlotsFirst,
  'lowest-id': lowestIdFirst,
};

export function resolveAllocationPolicy(policy: AllocationPolicy | AllocationPolicyName): AllocationPolicy {
  return typeof policy === 'function' ? policy : POLICIES[policy];
}
