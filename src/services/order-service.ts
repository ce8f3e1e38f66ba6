/**
 * Order creation and cart editing
 */

import { type OrderResult, refuse, succeed } from '../types/order';
import { Logger } from '../utils/logger';
import { ErrorHandler, ValidationError } from '../utils/error-handler';
import type { OrderStore } from './order-store';
import { parseOrderStatus } from './order-state-machine';

export interface CartLineChange {
  orderId: number;
  itemId: number;
  quantity: number;
}

export class OrderService {
  private logger: Logger;
  private errorHandler: ErrorHandler;

  constructor(private store: OrderStore, private clock: () => Date = () => new Date()) {
    this.logger = new Logger('OrderService');
    this.errorHandler = new ErrorHandler('OrderService');
  }

  /**
   * Open an empty PENDING order for `customer`
   */
  async createOrder(restaurantId: number, customer: string): Promise<OrderResult<number>> {
    const result = await this.errorHandler.withErrorHandling(
      () => this.store.withTransaction(async tx => {
        const restaurant = await tx.findLiveRestaurant(restaurantId);
        if (!restaurant) {
          return refuse('RestaurantUnavailable', 'restaurant does not exist or has been deleted', { restaurantId });
        }
        const orderId = await tx.insertOrder(restaurantId, customer, this.clock().toISOString());
        return succeed(orderId);
      }),
      `create order at restaurant ${restaurantId}`
    );

    if (result.ok) {
      this.logger.info(`Order ${result.value} created for ${customer} at restaurant ${restaurantId}`);
    }
    return result;
  }

  /**
   * Change the quantity of one item in a PENDING order, never going below zero.
   *
   * The item must exist but is not checked against the order's restaurant or
   * its deleted flag here; paying the order is where that is enforced.
   */
  async modifyItemQuantity(orderId: number, itemId: number, delta: number): Promise<OrderResult<CartLineChange>> {
    if (!Number.isSafeInteger(delta)) {
      throw new ValidationError(`Quantity change must be a whole number, got ${delta}`, 'delta');
    }

    return this.errorHandler.withErrorHandling(
      () => this.store.withTransaction(async tx => {
        const order = await tx.lockOrder(orderId, null);
        if (!order) {
          return refuse('NotFound', `order ${orderId} does not exist`, { orderId });
        }

        const status = parseOrderStatus(order.status, order.id);
        if (status !== 'PENDING') {
          return refuse('NotEditable', `cannot modify items for non-pending order ${orderId} (is ${status})`, {
            orderId,
            itemId,
            from: status
          });
        }

        if (!(await tx.menuItemExists(itemId))) {
          return refuse('NotFound', `menu item ${itemId} does not exist`, { orderId, itemId });
        }

        const quantity = await tx.adjustOrderItem(orderId, itemId, delta);
        this.logger.debug(`Order ${orderId} item ${itemId} quantity now ${quantity}`);
        return succeed({ orderId, itemId, quantity });
      }),
      `modify item ${itemId} in order ${orderId}`
    );
  }
}
