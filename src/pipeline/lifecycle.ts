/**
 * Feedgate — Item Lifecycle
 *
 * pending → approved | rejected, approved → published.
 * rejected and published are terminal.
 */

import type { ItemStatus } from '../types';
import { InvalidTransitionError } from '../lib/errors';

export const INITIAL_STATUS: ItemStatus = 'pending';

export const TRANSITIONS: Readonly<Record<ItemStatus, readonly ItemStatus[]>> = {
  pending: ['approved', 'rejected'],
  approved: ['published'],
  rejected: [],
  published: [],
};

export function canTransition(from: ItemStatus, to: ItemStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: ItemStatus, to: ItemStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

export function isTerminal(status: ItemStatus): boolean {
  return TRANSITIONS[status].length === 0;
}
