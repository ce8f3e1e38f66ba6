/**
 * Storage contract shared by the SQLite and MySQL backends
 *
 * Every read and write goes through a StoreTransaction handed out by
 * OrderStore.withTransaction(); nothing outside the store talks to the database.
 */

import type {
  AccountRecord,
  AccountUpdate,
  CartLineView,
  MenuItemView,
  NewAccount,
  OrderLineRecord,
  OrderRecord,
  RestaurantRecord,
  RestaurantSummary
} from '../types/database';
import type { BillingSnapshot, OrderStatus } from '../types/order';

/**
 * Order row joined with the restaurant name, for the read model
 */
export interface OrderWithRestaurantRecord extends OrderRecord {
  restaurant_name: string | null;
}

export interface StoreTransaction {
  // Orders
  lockOrder(orderId: number, restaurantScope: number | null): Promise<OrderRecord | null>;
  listOrderLines(orderId: number): Promise<OrderLineRecord[]>;
  updateOrderStatus(orderId: number, from: OrderStatus, to: OrderStatus, snapshot?: BillingSnapshot): Promise<boolean>;
  insertOrder(restaurantId: number, username: string, createdAt: string): Promise<number>;
  adjustOrderItem(orderId: number, itemId: number, delta: number): Promise<number>;

  // Restaurants and staff
  findLiveRestaurant(restaurantId: number): Promise<RestaurantRecord | null>;
  isEmployee(restaurantId: number, username: string): Promise<boolean>;
  insertRestaurant(name: string, owner: string): Promise<number>;
  renameRestaurant(restaurantId: number, name: string): Promise<boolean>;
  markRestaurantDeleted(restaurantId: number): Promise<boolean>;
  addEmployee(restaurantId: number, username: string): Promise<void>;
  removeEmployee(restaurantId: number, username: string): Promise<boolean>;

  // Menu
  /** True for any item id ever created, deleted or not */
  menuItemExists(itemId: number): Promise<boolean>;
  insertMenuItem(restaurantId: number, name: string, price: number): Promise<number>;
  updateMenuItem(restaurantId: number, itemId: number, name: string, price: number): Promise<boolean>;
  markMenuItemDeleted(restaurantId: number, itemId: number): Promise<boolean>;

  // Accounts
  findAccount(username: string): Promise<AccountRecord | null>;
  insertAccount(account: NewAccount): Promise<boolean>;
  updateAccount(username: string, update: AccountUpdate): Promise<boolean>;
  updatePassword(username: string, passwordSha256: string): Promise<boolean>;

  // Read model
  listRestaurants(): Promise<RestaurantSummary[]>;
  listMenuItems(restaurantId: number): Promise<MenuItemView[]>;
  listEmployees(restaurantId: number): Promise<string[]>;
  listActiveOrders(restaurantId: number): Promise<OrderWithRestaurantRecord[]>;
  findOrderWithRestaurant(orderId: number): Promise<OrderWithRestaurantRecord | null>;
  listCartLines(orderId: number, restaurantId: number): Promise<CartLineView[]>;
  listUserOrders(username: string): Promise<OrderWithRestaurantRecord[]>;
}

export interface OrderStore {
  readonly kind: 'sqlite' | 'mysql';
  initialize(): Promise<void>;
  /**
   * Run `work` in one transaction: committed when it resolves, rolled back when it rejects
   */
  withTransaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
