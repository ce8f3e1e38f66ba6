/**
 * Denormalized views over the store: restaurants, orders and accounts
 */

import type {
  AccountDetails,
  OrderDetail,
  OrderSummary,
  RestaurantDetail,
  RestaurantSummary
} from '../types/database';
import type { OrderStore, OrderWithRestaurantRecord } from './order-store';
import { parseOrderStatus } from './order-state-machine';

function toSummary(record: OrderWithRestaurantRecord): OrderSummary {
  return {
    id: record.id,
    createdAt: record.created_at,
    restaurantId: record.restaurant_id,
    restaurantName: record.restaurant_name,
    username: record.username,
    address: record.address,
    total: record.total,
    status: parseOrderStatus(record.status, record.id)
  };
}

export class OrderReadModel {
  constructor(private store: OrderStore) {}

  async listRestaurants(): Promise<RestaurantSummary[]> {
    return this.store.withTransaction(tx => tx.listRestaurants());
  }

  /**
   * Restaurant page: live menu, staff, orders waiting on the kitchen, and what
   * `viewer` may do there. Null for missing or deleted restaurants.
   */
  async getRestaurantDetail(restaurantId: number, viewer?: string): Promise<RestaurantDetail | null> {
    return this.store.withTransaction(async tx => {
      const restaurant = await tx.findLiveRestaurant(restaurantId);
      if (!restaurant) return null;

      const menu = await tx.listMenuItems(restaurantId);
      const employees = await tx.listEmployees(restaurantId);
      const activeOrders = await tx.listActiveOrders(restaurantId);

      return {
        id: restaurant.id,
        name: restaurant.name,
        owner: restaurant.owner,
        menu,
        employees,
        activeOrders: activeOrders.map(toSummary),
        viewer: {
          isOwner: viewer !== undefined && restaurant.owner === viewer,
          isEmployee: viewer !== undefined && employees.includes(viewer)
        }
      };
    });
  }

  /**
   * A PENDING order lists every live menu item of its restaurant with the cart
   * quantity; any other order lists its own frozen lines.
   */
  async getOrderDetail(orderId: number): Promise<OrderDetail | null> {
    return this.store.withTransaction(async tx => {
      const record = await tx.findOrderWithRestaurant(orderId);
      if (!record) return null;

      const summary = toSummary(record);
      if (summary.status === 'PENDING') {
        const items = await tx.listCartLines(record.id, record.restaurant_id);
        return { ...summary, status: summary.status, items };
      }

      const lines = await tx.listOrderLines(record.id);
      return {
        ...summary,
        status: summary.status,
        items: lines.map(line => ({ itemId: line.item_id, name: line.item_name, quantity: line.quantity }))
      };
    });
  }

  /**
   * Order history of a customer, newest first
   */
  async getUserOrders(username: string): Promise<OrderSummary[]> {
    const records = await this.store.withTransaction(tx => tx.listUserOrders(username));
    return records.map(toSummary);
  }

  async getAccountDetails(username: string): Promise<AccountDetails | null> {
    const account = await this.store.withTransaction(tx => tx.findAccount(username));
    if (!account) return null;
    return {
      username: account.username,
      firstName: account.first_name,
      lastName: account.last_name,
      address: account.address,
      cardNumber: account.card_number,
      cardExpiry: account.card_expiry,
      cardCode: account.card_code
    };
  }
}
