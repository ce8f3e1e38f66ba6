/**
 * Catalog Service
 * Accounts, restaurants, staff and menu maintenance
 */

import crypto from 'crypto';
import type { AccountUpdate } from '../types/database';
import { type OrderResult, refuse, succeed } from '../types/order';
import { Logger } from '../utils/logger';
import { ErrorHandler } from '../utils/error-handler';
import type { OrderStore, StoreTransaction } from './order-store';

export function hashPassword(password: string): string {
  return crypto.createHash('sha256').update(password, 'utf8').digest('hex');
}

export class CatalogService {
  private logger: Logger;
  private errorHandler: ErrorHandler;

  constructor(private store: OrderStore) {
    this.logger = new Logger('CatalogService');
    this.errorHandler = new ErrorHandler('CatalogService');
  }

  private transaction<T>(context: string, work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    return this.errorHandler.withErrorHandling(() => this.store.withTransaction(work), context);
  }

  // ---------------------------------------------------------------------------
  // Accounts
  // ---------------------------------------------------------------------------

  /**
   * Returns false when the username is already taken
   */
  async createAccount(username: string, password: string, firstName: string, lastName: string): Promise<boolean> {
    const created = await this.transaction(`create account ${username}`, tx =>
      tx.insertAccount({ username, passwordSha256: hashPassword(password), firstName, lastName })
    );
    if (created) {
      this.logger.info(`Account ${username} created`);
    }
    return created;
  }

  async verifyPassword(username: string, password: string): Promise<boolean> {
    const account = await this.transaction(`verify password for ${username}`, tx => tx.findAccount(username));
    if (!account) return false;

    const expected = Buffer.from(account.password_sha256, 'hex');
    const actual = Buffer.from(hashPassword(password), 'hex');
    return expected.length === actual.length && crypto.timingSafeEqual(expected, actual);
  }

  /**
   * Replace names and billing details, and the password when one is given
   */
  async updateAccount(username: string, update: AccountUpdate, newPassword?: string): Promise<OrderResult<void>> {
    return this.transaction(`update account ${username}`, async tx => {
      const updated = await tx.updateAccount(username, update);
      if (!updated) {
        return refuse('NotFound', `account ${username} does not exist`, { username });
      }
      if (newPassword !== undefined) {
        await tx.updatePassword(username, hashPassword(newPassword));
      }
      return succeed(undefined);
    });
  }

  // ---------------------------------------------------------------------------
  // Restaurants and staff
  // ---------------------------------------------------------------------------

  /**
   * Create a restaurant and register its owner as an employee
   */
  async createRestaurant(name: string, owner: string): Promise<number> {
    const restaurantId = await this.transaction(`create restaurant ${name}`, async tx => {
      const id = await tx.insertRestaurant(name, owner);
      await tx.addEmployee(id, owner);
      return id;
    });
    this.logger.info(`Restaurant ${restaurantId} "${name}" created for ${owner}`);
    return restaurantId;
  }

  async renameRestaurant(restaurantId: number, name: string): Promise<OrderResult<void>> {
    return this.transaction(`rename restaurant ${restaurantId}`, async tx => {
      const renamed = await tx.renameRestaurant(restaurantId, name);
      return renamed
        ? succeed(undefined)
        : refuse('RestaurantUnavailable', 'restaurant does not exist or has been deleted', { restaurantId });
    });
  }

  /**
   * Soft delete; menu items and orders stay in storage
   */
  async deleteRestaurant(restaurantId: number): Promise<OrderResult<void>> {
    const result = await this.transaction(`delete restaurant ${restaurantId}`, async tx => {
      const deleted = await tx.markRestaurantDeleted(restaurantId);
      return deleted
        ? succeed(undefined)
        : refuse('NotFound', `restaurant ${restaurantId} does not exist`, { restaurantId });
    });
    if (result.ok) {
      this.logger.info(`Restaurant ${restaurantId} marked deleted`);
    }
    return result;
  }

  async addEmployee(restaurantId: number, username: string): Promise<OrderResult<void>> {
    return this.transaction(`add employee ${username} to restaurant ${restaurantId}`, async tx => {
      if (!(await tx.findAccount(username))) {
        return refuse('NotFound', `user ${username} does not exist`, { restaurantId, username });
      }
      if (!(await tx.findLiveRestaurant(restaurantId))) {
        return refuse('RestaurantUnavailable', 'restaurant does not exist or has been deleted', { restaurantId });
      }
      await tx.addEmployee(restaurantId, username);
      return succeed(undefined);
    });
  }

  async removeEmployee(restaurantId: number, username: string): Promise<boolean> {
    return this.transaction(`remove employee ${username} from restaurant ${restaurantId}`, tx =>
      tx.removeEmployee(restaurantId, username)
    );
  }

  // ---------------------------------------------------------------------------
  // Menu
  // ---------------------------------------------------------------------------

  async addMenuItem(restaurantId: number, name: string, price: number): Promise<OrderResult<number>> {
    return this.transaction(`add menu item to restaurant ${restaurantId}`, async tx => {
      if (!(await tx.findLiveRestaurant(restaurantId))) {
        return refuse('RestaurantUnavailable', 'restaurant does not exist or has been deleted', { restaurantId });
      }
      return succeed(await tx.insertMenuItem(restaurantId, name, price));
    });
  }

  /**
   * Only touches the item when it belongs to `restaurantId`
   */
  async updateMenuItem(restaurantId: number, itemId: number, name: string, price: number): Promise<OrderResult<void>> {
    return this.transaction(`update menu item ${itemId}`, async tx => {
      if (!(await tx.findLiveRestaurant(restaurantId))) {
        return refuse('RestaurantUnavailable', 'restaurant does not exist or has been deleted', { restaurantId });
      }
      const updated = await tx.updateMenuItem(restaurantId, itemId, name, price);
      return updated
        ? succeed(undefined)
        : refuse('NotFound', `menu item ${itemId} does not exist at restaurant ${restaurantId}`, { restaurantId, itemId });
    });
  }

  async deleteMenuItem(restaurantId: number, itemId: number): Promise<OrderResult<void>> {
    return this.transaction(`delete menu item ${itemId}`, async tx => {
      const deleted = await tx.markMenuItemDeleted(restaurantId, itemId);
      return deleted
        ? succeed(undefined)
        : refuse('NotFound', `menu item ${itemId} does not exist at restaurant ${restaurantId}`, { restaurantId, itemId });
    });
  }
}
