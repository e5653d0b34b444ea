/**
 * Contract version history of one proposal.
 *
 * Every contract is a numbered version; at most one of them is current.
 * Promoting a new version demotes whatever is current in the same step.
 */

import type { Contract } from '../../types/contract.types';

export type VersionEntry = Pick<Contract, 'id' | 'version' | 'isActive'>;

export interface PromotionPlan {
  /** Version number for the contract being promoted. */
  version: number;
  /** Existing contracts that must stop being current. */
  demote: number[];
}

export function currentVersion(history: readonly VersionEntry[]): VersionEntry | undefined {
  return history.find(entry => entry.isActive);
}

export function planPromotion(history: readonly VersionEntry[]): PromotionPlan {
  const latest = history.reduce((max, entry) => Math.max(max, entry.version), 0);
  return {
    version: latest + 1,
    demote: history.filter(entry => entry.isActive).map(entry => entry.id),
  };
}
