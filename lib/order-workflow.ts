import { InvalidTransitionError } from '@/lib/errors';
import type { OrderStatus } from '@/lib/shop-types';

// Returned is terminal. A completed sale can still be taken back over the counter.
const TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  pending: ['completed', 'returned'],
  completed: ['returned'],
  returned: [],
};

export function canTransition(from: OrderStatus, to: OrderStatus) {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: OrderStatus, to: OrderStatus) {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

export function nextStatuses(from: OrderStatus): readonly OrderStatus[] {
  return TRANSITIONS[from];
}

