/**
 * Order Transition Engine
 * Validates and applies order status changes inside one store transaction
 */

import type { AccountRecord, OrderLineRecord, OrderRecord } from '../types/database';
import {
  type BillingField,
  type BillingSnapshot,
  type OrderResult,
  type OrderStatus,
  type TransitionOutcome,
  type TransitionRequest,
  refuse,
  succeed
} from '../types/order';
import { Logger } from '../utils/logger';
import { ErrorHandler, StoreBusyError } from '../utils/error-handler';
import type { OrderStore, StoreTransaction } from './order-store';
import { edgeAuthority, parseOrderStatus } from './order-state-machine';

const BILLING_FIELDS: BillingField[] = ['address', 'cardNumber', 'cardExpiry', 'cardCode'];

const BILLING_COLUMNS: Record<BillingField, keyof AccountRecord> = {
  address: 'address',
  cardNumber: 'card_number',
  cardExpiry: 'card_expiry',
  cardCode: 'card_code'
};

/**
 * Billing fields still empty on the account, in a fixed order
 */
export function missingBillingFields(account: AccountRecord | null): BillingField[] {
  return BILLING_FIELDS.filter(field => !account || account[BILLING_COLUMNS[field]] === '');
}

/**
 * Take the billing snapshot for PENDING -> PAID.
 *
 * Lines with quantity 0 are ignored. Every other line must reference a live
 * item of the order's own restaurant; the first offending line decides the
 * refusal.
 */
export function snapshotBilling(
  order: Pick<OrderRecord, 'id' | 'restaurant_id'>,
  account: AccountRecord | null,
  lines: OrderLineRecord[]
): OrderResult<BillingSnapshot> {
  const missingFields = missingBillingFields(account);
  if (!account || missingFields.length > 0) {
    return refuse('IncompleteBilling', 'cannot pay for order without address and billing information set for account', {
      orderId: order.id,
      username: account?.username,
      missingFields
    });
  }

  let total = 0;
  let items = 0;
  for (const line of lines) {
    if (line.quantity <= 0) continue;

    if (line.item_restaurant_id !== order.restaurant_id || line.price === null) {
      return refuse('CrossRestaurantItem', `order contains item ${line.item_name ?? line.item_id} from another restaurant`, {
        orderId: order.id,
        restaurantId: order.restaurant_id,
        itemId: line.item_id,
        itemName: line.item_name
      });
    }
    if (line.item_deleted) {
      return refuse('DeletedItem', `cannot order deleted item ${line.item_name ?? line.item_id}`, {
        orderId: order.id,
        itemId: line.item_id,
        itemName: line.item_name
      });
    }

    total += line.price * line.quantity;
    items += 1;
  }

  if (items === 0) {
    return refuse('EmptyOrder', 'order must contain at least one item', { orderId: order.id });
  }

  return succeed({ address: account.address, total });
}

export interface TransitionFacts {
  /** Order as locked for this request; null when it does not exist within the requested scope */
  order: OrderRecord | null;
  restaurantLive: boolean;
  actorIsEmployee: boolean;
  /** Account of the order's customer */
  account: AccountRecord | null;
  lines: OrderLineRecord[];
}

const NO_ORDER: TransitionFacts = {
  order: null,
  restaurantLive: false,
  actorIsEmployee: false,
  account: null,
  lines: []
};

/**
 * Decide a transition from facts read under the order lock.
 *
 * Gates run in a fixed order: order found, restaurant live, legal edge,
 * ownership or employment, then billing for PENDING -> PAID. Throws
 * OrderIntegrityError when the stored status is unknown.
 */
export function decideTransition(facts: TransitionFacts, request: TransitionRequest): OrderResult<TransitionOutcome> {
  const { actor, restaurantScope, orderId, targetStatus } = request;
  const { order } = facts;

  if (!order) {
    return refuse('NotFound', `no such order ${orderId} for restaurant ${restaurantScope ?? 'any'}`, {
      orderId,
      restaurantId: restaurantScope
    });
  }

  if (!facts.restaurantLive) {
    return refuse('RestaurantUnavailable', 'restaurant does not exist or has been deleted', {
      orderId,
      restaurantId: order.restaurant_id
    });
  }

  const from = parseOrderStatus(order.status, order.id);
  const authority = edgeAuthority(from, targetStatus);
  if (authority === null) {
    return refuse('InvalidTransition', `bad transition ${from} -> ${targetStatus}`, {
      orderId,
      from,
      to: targetStatus
    });
  }

  if (authority === 'customer' && order.username !== actor) {
    return refuse('NotOwner', `cannot move someone else's order to ${targetStatus}`, {
      orderId,
      actor,
      from,
      to: targetStatus
    });
  }

  if (authority === 'employee' && !facts.actorIsEmployee) {
    return refuse('NotEmployee', `cannot move an order to ${targetStatus} as a non-employee`, {
      orderId,
      restaurantId: order.restaurant_id,
      actor,
      from,
      to: targetStatus
    });
  }

  if (from === 'PENDING' && targetStatus === 'PAID') {
    const billing = snapshotBilling(order, facts.account, facts.lines);
    if (!billing.ok) return billing;
    return succeed({ orderId: order.id, from, to: targetStatus, snapshot: billing.value });
  }

  return succeed({ orderId: order.id, from, to: targetStatus });
}

export class OrderTransitionEngine {
  private logger: Logger;
  private errorHandler: ErrorHandler;

  constructor(private store: OrderStore) {
    this.logger = new Logger('OrderTransitionEngine');
    this.errorHandler = new ErrorHandler('OrderTransitionEngine');
  }

  /**
   * Move an order to `targetStatus` on behalf of `actor`.
   *
   * Refusals come back as values and leave storage untouched. An unknown
   * stored status throws OrderIntegrityError; lock timeouts throw StoreBusyError.
   */
  async transition(request: TransitionRequest): Promise<OrderResult<TransitionOutcome>> {
    const result = await this.errorHandler.withErrorHandling(
      () => this.store.withTransaction(tx => this.applyTransition(tx, request)),
      `transition order ${request.orderId} -> ${request.targetStatus}`
    );

    if (result.ok) {
      const { from, to, snapshot } = result.value;
      const charged = snapshot ? ` (total ${snapshot.total})` : '';
      this.logger.info(`Order ${request.orderId} ${from} -> ${to} by ${request.actor}${charged}`);
    } else {
      this.logger.warn(`Refused ${result.kind} for order ${request.orderId} -> ${request.targetStatus} by ${request.actor}: ${result.message}`);
    }
    return result;
  }

  private async applyTransition(tx: StoreTransaction, request: TransitionRequest): Promise<OrderResult<TransitionOutcome>> {
    const order = await tx.lockOrder(request.orderId, request.restaurantScope);
    const facts = order ? await this.gatherFacts(tx, order, request.actor) : NO_ORDER;

    const decision = decideTransition(facts, request);
    if (decision.ok) {
      const { orderId, from, to, snapshot } = decision.value;
      await this.commit(tx, orderId, from, to, snapshot);
    }
    return decision;
  }

  /**
   * Everything the decision needs, read while the order row is locked
   */
  private async gatherFacts(tx: StoreTransaction, order: OrderRecord, actor: string): Promise<TransitionFacts> {
    const restaurant = await tx.findLiveRestaurant(order.restaurant_id);
    return {
      order,
      restaurantLive: restaurant !== null,
      actorIsEmployee: await tx.isEmployee(order.restaurant_id, actor),
      account: await tx.findAccount(order.username),
      lines: await tx.listOrderLines(order.id)
    };
  }

  private async commit(
    tx: StoreTransaction,
    orderId: number,
    from: OrderStatus,
    to: OrderStatus,
    snapshot?: BillingSnapshot
  ): Promise<void> {
    const updated = await tx.updateOrderStatus(orderId, from, to, snapshot);
    if (!updated) {
      // the row lock makes this unreachable unless another writer bypassed the store
      throw new StoreBusyError(`order ${orderId} changed while locked`);
    }
  }
}
