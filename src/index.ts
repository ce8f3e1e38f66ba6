/**
 * Restaurant order engine: entry point for embedding applications
 */

import type { OrderStatus, OrderResult, TransitionOutcome } from './types/order';
import { DatabaseFactory } from './services/database-factory';
import type { OrderStore } from './services/order-store';
import { OrderTransitionEngine } from './services/order-transition-engine';
import { type CartLineChange, OrderService } from './services/order-service';
import { CatalogService } from './services/catalog-service';
import { OrderReadModel } from './services/order-read-model';
import { Logger } from './utils/logger';

export class RestaurantOrderSystem {
  public readonly engine: OrderTransitionEngine;
  public readonly orders: OrderService;
  public readonly catalog: CatalogService;
  public readonly reads: OrderReadModel;
  private logger: Logger;

  constructor(private store: OrderStore) {
    this.logger = new Logger('RestaurantOrderSystem');
    this.engine = new OrderTransitionEngine(store);
    this.orders = new OrderService(store);
    this.catalog = new CatalogService(store);
    this.reads = new OrderReadModel(store);
  }

  /**
   * Initialize `store` (by default the one selected by configuration) and wrap it
   */
  static async open(store: OrderStore = DatabaseFactory.createStore()): Promise<RestaurantOrderSystem> {
    await store.initialize();
    return new RestaurantOrderSystem(store);
  }

  /**
   * @param restaurantScope restaurant the actor is working for, or null for a customer acting on their own order
   */
  transition(
    actor: string,
    restaurantScope: number | null,
    orderId: number,
    targetStatus: OrderStatus
  ): Promise<OrderResult<TransitionOutcome>> {
    return this.engine.transition({ actor, restaurantScope, orderId, targetStatus });
  }

  createOrder(restaurantId: number, customer: string): Promise<OrderResult<number>> {
    return this.orders.createOrder(restaurantId, customer);
  }

  modifyItemQuantity(orderId: number, itemId: number, delta: number): Promise<OrderResult<CartLineChange>> {
    return this.orders.modifyItemQuantity(orderId, itemId, delta);
  }

  async close(): Promise<void> {
    await this.store.close();
    this.logger.debug('Order system closed');
  }
}

export * from './types/order';
export type * from './types/database';
export type { OrderStore, StoreTransaction, OrderWithRestaurantRecord } from './services/order-store';
export { ORDER_TRANSITIONS, isLegalTransition, isTerminal, nextStatuses, parseOrderStatus } from './services/order-state-machine';
export { OrderTransitionEngine, missingBillingFields, snapshotBilling } from './services/order-transition-engine';
export { OrderService, type CartLineChange } from './services/order-service';
export { CatalogService, hashPassword } from './services/catalog-service';
export { OrderReadModel } from './services/order-read-model';
export { SQLiteOrderStore } from './services/sqlite-order-store';
export { MySQLOrderStore } from './services/mysql-order-store';
export { DatabaseFactory } from './services/database-factory';
export { ConfigManager } from './utils/config';
export { Logger } from './utils/logger';
export {
  ConfigurationError,
  ErrorHandler,
  OrderIntegrityError,
  StoreBusyError,
  ValidationError
} from './utils/error-handler';
export { DataValidator } from './utils/validator';
