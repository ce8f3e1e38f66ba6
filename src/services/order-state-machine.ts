/**
 * Order status state machine
 *
 * ```
 *   PENDING ──► PAID ──► ACCEPTED ──► DELIVERED
 *      │          │
 *      └──────────┴──► CANCELLED
 * ```
 *
 * CANCELLED and DELIVERED are terminal. Customer-facing edges require the
 * actor to own the order; restaurant-facing edges require the actor to be an
 * employee of the order's restaurant.
 */

import { ORDER_STATUSES, type OrderStatus } from '../types/order';
import { OrderIntegrityError } from '../utils/error-handler';

export type EdgeAuthority = 'customer' | 'employee';

export const ORDER_TRANSITIONS: Readonly<Record<OrderStatus, Readonly<Partial<Record<OrderStatus, EdgeAuthority>>>>> = {
  PENDING: { PAID: 'customer', CANCELLED: 'customer' },
  PAID: { ACCEPTED: 'employee', CANCELLED: 'customer' },
  ACCEPTED: { DELIVERED: 'employee' },
  CANCELLED: {},
  DELIVERED: {}
};

export function isOrderStatus(value: string): value is OrderStatus {
  return ORDER_STATUSES.some(status => status === value);
}

/**
 * Narrow a status read from storage; anything unknown means the data is corrupt
 */
export function parseOrderStatus(value: string, orderId: number): OrderStatus {
  if (!isOrderStatus(value)) {
    throw new OrderIntegrityError(`invalid order status ${JSON.stringify(value)} from database`, orderId, value);
  }
  return value;
}

export function edgeAuthority(from: OrderStatus, to: OrderStatus): EdgeAuthority | null {
  const edges = ORDER_TRANSITIONS[from];
  // own keys only: untyped callers can pass names inherited from Object.prototype
  return Object.hasOwn(edges, to) ? edges[to] ?? null : null;
}

export function isLegalTransition(from: OrderStatus, to: OrderStatus): boolean {
  return edgeAuthority(from, to) !== null;
}

export function nextStatuses(from: OrderStatus): OrderStatus[] {
  return ORDER_STATUSES.filter(to => isLegalTransition(from, to));
}

export function isTerminal(status: OrderStatus): boolean {
  return nextStatuses(status).length === 0;
}
