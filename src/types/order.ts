/**
 * Order lifecycle types
 */

export const ORDER_STATUSES = ['PENDING', 'PAID', 'CANCELLED', 'ACCEPTED', 'DELIVERED'] as const;

/**
 * - PENDING: created by the customer, cart still editable, not visible to the restaurant
 * - PAID: billing snapshot taken, waiting for the restaurant
 * - CANCELLED: cancelled by the customer
 * - ACCEPTED: accepted by the restaurant, can no longer be cancelled
 * - DELIVERED: delivered by the restaurant
 */
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const FAILURE_KINDS = [
  'NotFound',
  'RestaurantUnavailable',
  'InvalidTransition',
  'NotOwner',
  'NotEmployee',
  'IncompleteBilling',
  'EmptyOrder',
  'DeletedItem',
  'CrossRestaurantItem',
  'NotEditable'
] as const;

export type FailureKind = (typeof FAILURE_KINDS)[number];

export type BillingField = 'address' | 'cardNumber' | 'cardExpiry' | 'cardCode';

/**
 * Ids and names the caller needs to turn a refusal into a message
 */
export interface FailureContext {
  orderId?: number;
  restaurantId?: number | null;
  actor?: string;
  username?: string;
  from?: OrderStatus;
  to?: OrderStatus;
  itemId?: number;
  itemName?: string | null;
  missingFields?: BillingField[];
}

export interface OrderFailure {
  ok: false;
  kind: FailureKind;
  message: string;
  context: FailureContext;
}

export interface OrderSuccess<T> {
  ok: true;
  value: T;
}

export type OrderResult<T> = OrderSuccess<T> | OrderFailure;

export function succeed<T>(value: T): OrderSuccess<T> {
  return { ok: true, value };
}

export function refuse(kind: FailureKind, message: string, context: FailureContext = {}): OrderFailure {
  return { ok: false, kind, message, context };
}

export interface TransitionRequest {
  actor: string;
  /** Restaurant the caller is acting for; null for customer calls looked up by order id alone */
  restaurantScope: number | null;
  orderId: number;
  targetStatus: OrderStatus;
}

export interface BillingSnapshot {
  address: string;
  total: number;
}

export interface TransitionOutcome {
  orderId: number;
  from: OrderStatus;
  to: OrderStatus;
  snapshot?: BillingSnapshot;
}
