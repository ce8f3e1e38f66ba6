/**
 * Queries shared by the SQLite and MySQL transactions
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
import type { OrderWithRestaurantRecord, StoreTransaction } from './order-store';
import {
  type RunResult,
  type SqlParam,
  type SqlRow,
  readBoolean,
  readNullableBoolean,
  readNullableNumber,
  readNullableString,
  readNumber,
  readString
} from './sql-rows';

const ORDER_COLUMNS = 'o.id, o.restaurant_id, o.username, o.created_at, o.address, o.total, o.status';

function toOrderRecord(row: SqlRow): OrderRecord {
  return {
    id: readNumber(row, 'id'),
    restaurant_id: readNumber(row, 'restaurant_id'),
    username: readString(row, 'username'),
    created_at: readString(row, 'created_at'),
    address: readString(row, 'address'),
    total: readNumber(row, 'total'),
    status: readString(row, 'status')
  };
}

function toOrderWithRestaurant(row: SqlRow): OrderWithRestaurantRecord {
  return {
    ...toOrderRecord(row),
    restaurant_name: readNullableString(row, 'restaurant_name')
  };
}

export abstract class SqlTransaction implements StoreTransaction {
  /** Appended to the order read that starts a transition or cart edit */
  protected abstract readonly lockClause: string;
  /** Two-argument maximum function of the dialect */
  protected abstract readonly greatestFunction: string;

  protected abstract all(sql: string, params?: SqlParam[]): Promise<SqlRow[]>;
  protected abstract run(sql: string, params?: SqlParam[]): Promise<RunResult>;
  /** Suffix turning an INSERT into a no-op when the key already exists */
  protected abstract ignoreDuplicate(keyColumns: string[]): string;
  protected abstract isDuplicateKeyError(error: unknown): boolean;

  protected async get(sql: string, params: SqlParam[] = []): Promise<SqlRow | null> {
    const rows = await this.all(sql, params);
    return rows.length > 0 ? rows[0] : null;
  }

  // ---------------------------------------------------------------------------
  // Orders
  // ---------------------------------------------------------------------------

  async lockOrder(orderId: number, restaurantScope: number | null): Promise<OrderRecord | null> {
    const row = restaurantScope === null
      ? await this.get(`SELECT ${ORDER_COLUMNS} FROM orders o WHERE o.id = ? ${this.lockClause}`, [orderId])
      : await this.get(
        `SELECT ${ORDER_COLUMNS} FROM orders o WHERE o.restaurant_id = ? AND o.id = ? ${this.lockClause}`,
        [restaurantScope, orderId]
      );
    return row ? toOrderRecord(row) : null;
  }

  async listOrderLines(orderId: number): Promise<OrderLineRecord[]> {
    const rows = await this.all(
      `SELECT oi.item_id, oi.quantity, m.restaurant_id AS item_restaurant_id, m.name AS item_name,
              m.price, m.deleted AS item_deleted
         FROM order_items oi
         LEFT JOIN menu_items m ON m.id = oi.item_id
        WHERE oi.order_id = ?
        ORDER BY oi.item_id`,
      [orderId]
    );
    return rows.map(row => ({
      item_id: readNumber(row, 'item_id'),
      quantity: readNumber(row, 'quantity'),
      item_restaurant_id: readNullableNumber(row, 'item_restaurant_id'),
      item_name: readNullableString(row, 'item_name'),
      price: readNullableNumber(row, 'price'),
      item_deleted: readNullableBoolean(row, 'item_deleted')
    }));
  }

  async updateOrderStatus(orderId: number, from: OrderStatus, to: OrderStatus, snapshot?: BillingSnapshot): Promise<boolean> {
    const result = snapshot
      ? await this.run(
        'UPDATE orders SET status = ?, address = ?, total = ? WHERE id = ? AND status = ?',
        [to, snapshot.address, snapshot.total, orderId, from]
      )
      : await this.run('UPDATE orders SET status = ? WHERE id = ? AND status = ?', [to, orderId, from]);
    return result.changes === 1;
  }

  async insertOrder(restaurantId: number, username: string, createdAt: string): Promise<number> {
    const result = await this.run(
      "INSERT INTO orders (restaurant_id, username, created_at, address, total, status) VALUES (?, ?, ?, '', 0, 'PENDING')",
      [restaurantId, username, createdAt]
    );
    return result.lastInsertId;
  }

  async adjustOrderItem(orderId: number, itemId: number, delta: number): Promise<number> {
    await this.run(
      `INSERT INTO order_items (order_id, item_id, quantity) VALUES (?, ?, 0) ${this.ignoreDuplicate(['order_id', 'item_id'])}`,
      [orderId, itemId]
    );
    await this.run(
      `UPDATE order_items SET quantity = ${this.greatestFunction}(0, quantity + ?) WHERE order_id = ? AND item_id = ?`,
      [delta, orderId, itemId]
    );
    const row = await this.get('SELECT quantity FROM order_items WHERE order_id = ? AND item_id = ?', [orderId, itemId]);
    return row ? readNumber(row, 'quantity') : 0;
  }

  // ---------------------------------------------------------------------------
  // Restaurants and staff
  // ---------------------------------------------------------------------------

  async findLiveRestaurant(restaurantId: number): Promise<RestaurantRecord | null> {
    const row = await this.get('SELECT id, owner, name, deleted FROM restaurants WHERE id = ? AND deleted = 0', [restaurantId]);
    if (!row) return null;
    return {
      id: readNumber(row, 'id'),
      owner: readString(row, 'owner'),
      name: readString(row, 'name'),
      deleted: readBoolean(row, 'deleted')
    };
  }

  async isEmployee(restaurantId: number, username: string): Promise<boolean> {
    const row = await this.get(
      'SELECT restaurant_id FROM restaurant_employees WHERE restaurant_id = ? AND username = ?',
      [restaurantId, username]
    );
    return row !== null;
  }

  async insertRestaurant(name: string, owner: string): Promise<number> {
    const result = await this.run('INSERT INTO restaurants (name, owner, deleted) VALUES (?, ?, 0)', [name, owner]);
    return result.lastInsertId;
  }

  async renameRestaurant(restaurantId: number, name: string): Promise<boolean> {
    const result = await this.run('UPDATE restaurants SET name = ? WHERE id = ? AND deleted = 0', [name, restaurantId]);
    return result.changes > 0;
  }

  async markRestaurantDeleted(restaurantId: number): Promise<boolean> {
    const result = await this.run('UPDATE restaurants SET deleted = 1 WHERE id = ?', [restaurantId]);
    return result.changes > 0;
  }

  async addEmployee(restaurantId: number, username: string): Promise<void> {
    await this.run(
      `INSERT INTO restaurant_employees (restaurant_id, username) VALUES (?, ?) ${this.ignoreDuplicate(['restaurant_id', 'username'])}`,
      [restaurantId, username]
    );
  }

  async removeEmployee(restaurantId: number, username: string): Promise<boolean> {
    const result = await this.run(
      'DELETE FROM restaurant_employees WHERE restaurant_id = ? AND username = ?',
      [restaurantId, username]
    );
    return result.changes > 0;
  }

  // ---------------------------------------------------------------------------
  // Menu
  // ---------------------------------------------------------------------------

  async menuItemExists(itemId: number): Promise<boolean> {
    const row = await this.get('SELECT id FROM menu_items WHERE id = ?', [itemId]);
    return row !== null;
  }

  async insertMenuItem(restaurantId: number, name: string, price: number): Promise<number> {
    const result = await this.run(
      'INSERT INTO menu_items (restaurant_id, name, price, deleted) VALUES (?, ?, ?, 0)',
      [restaurantId, name, price]
    );
    return result.lastInsertId;
  }

  async updateMenuItem(restaurantId: number, itemId: number, name: string, price: number): Promise<boolean> {
    // restaurant_id in the filter keeps one restaurant from editing another's items
    const result = await this.run(
      'UPDATE menu_items SET name = ?, price = ? WHERE restaurant_id = ? AND id = ?',
      [name, price, restaurantId, itemId]
    );
    return result.changes > 0;
  }

  async markMenuItemDeleted(restaurantId: number, itemId: number): Promise<boolean> {
    const result = await this.run('UPDATE menu_items SET deleted = 1 WHERE restaurant_id = ? AND id = ?', [restaurantId, itemId]);
    return result.changes > 0;
  }

  // ---------------------------------------------------------------------------
  // Accounts
  // ---------------------------------------------------------------------------

  async findAccount(username: string): Promise<AccountRecord | null> {
    const row = await this.get(
      `SELECT username, password_sha256, first_name, last_name, address, card_number, card_expiry, card_code
         FROM accounts WHERE username = ?`,
      [username]
    );
    if (!row) return null;
    return {
      username: readString(row, 'username'),
      password_sha256: readString(row, 'password_sha256'),
      first_name: readString(row, 'first_name'),
      last_name: readString(row, 'last_name'),
      address: readString(row, 'address'),
      card_number: readString(row, 'card_number'),
      card_expiry: readString(row, 'card_expiry'),
      card_code: readString(row, 'card_code')
    };
  }

  async insertAccount(account: NewAccount): Promise<boolean> {
    try {
      await this.run(
        'INSERT INTO accounts (username, password_sha256, first_name, last_name) VALUES (?, ?, ?, ?)',
        [account.username, account.passwordSha256, account.firstName, account.lastName]
      );
      return true;
    } catch (error) {
      if (this.isDuplicateKeyError(error)) return false;
      throw error;
    }
  }

  async updateAccount(username: string, update: AccountUpdate): Promise<boolean> {
    const result = await this.run(
      `UPDATE accounts
          SET first_name = ?, last_name = ?, address = ?, card_number = ?, card_expiry = ?, card_code = ?
        WHERE username = ?`,
      [update.firstName, update.lastName, update.address, update.cardNumber, update.cardExpiry, update.cardCode, username]
    );
    return result.changes > 0;
  }

  async updatePassword(username: string, passwordSha256: string): Promise<boolean> {
    const result = await this.run('UPDATE accounts SET password_sha256 = ? WHERE username = ?', [passwordSha256, username]);
    return result.changes > 0;
  }

  // ---------------------------------------------------------------------------
  // Read model
  // ---------------------------------------------------------------------------

  async listRestaurants(): Promise<RestaurantSummary[]> {
    const rows = await this.all('SELECT id, name, owner FROM restaurants WHERE deleted = 0 ORDER BY id');
    return rows.map(row => ({
      id: readNumber(row, 'id'),
      name: readString(row, 'name'),
      owner: readString(row, 'owner')
    }));
  }

  async listMenuItems(restaurantId: number): Promise<MenuItemView[]> {
    const rows = await this.all(
      'SELECT id, name, price FROM menu_items WHERE restaurant_id = ? AND deleted = 0 ORDER BY id',
      [restaurantId]
    );
    return rows.map(row => ({
      id: readNumber(row, 'id'),
      name: readString(row, 'name'),
      price: readNumber(row, 'price')
    }));
  }

  async listEmployees(restaurantId: number): Promise<string[]> {
    const rows = await this.all(
      'SELECT username FROM restaurant_employees WHERE restaurant_id = ? ORDER BY username',
      [restaurantId]
    );
    return rows.map(row => readString(row, 'username'));
  }

  async listActiveOrders(restaurantId: number): Promise<OrderWithRestaurantRecord[]> {
    const rows = await this.all(
      `SELECT ${ORDER_COLUMNS}, r.name AS restaurant_name
         FROM orders o
         LEFT JOIN restaurants r ON r.id = o.restaurant_id
        WHERE o.restaurant_id = ? AND o.status IN ('PAID', 'ACCEPTED')
        ORDER BY o.id`,
      [restaurantId]
    );
    return rows.map(toOrderWithRestaurant);
  }

  async findOrderWithRestaurant(orderId: number): Promise<OrderWithRestaurantRecord | null> {
    const row = await this.get(
      `SELECT ${ORDER_COLUMNS}, r.name AS restaurant_name
         FROM orders o
         LEFT JOIN restaurants r ON r.id = o.restaurant_id
        WHERE o.id = ?`,
      [orderId]
    );
    return row ? toOrderWithRestaurant(row) : null;
  }

  async listCartLines(orderId: number, restaurantId: number): Promise<CartLineView[]> {
    const rows = await this.all(
      `SELECT m.id AS item_id, m.name, m.price, oi.quantity
         FROM menu_items m
         LEFT JOIN order_items oi ON oi.item_id = m.id AND oi.order_id = ?
        WHERE m.restaurant_id = ? AND m.deleted = 0
        ORDER BY m.id`,
      [orderId, restaurantId]
    );
    return rows.map(row => ({
      itemId: readNumber(row, 'item_id'),
      name: readString(row, 'name'),
      price: readNumber(row, 'price'),
      quantity: readNullableNumber(row, 'quantity') ?? 0
    }));
  }

  async listUserOrders(username: string): Promise<OrderWithRestaurantRecord[]> {
    const rows = await this.all(
      `SELECT ${ORDER_COLUMNS}, r.name AS restaurant_name
         FROM orders o
         LEFT JOIN restaurants r ON r.id = o.restaurant_id
        WHERE o.username = ?
        ORDER BY o.created_at DESC, o.id DESC`,
      [username]
    );
    return rows.map(toOrderWithRestaurant);
  }
}
