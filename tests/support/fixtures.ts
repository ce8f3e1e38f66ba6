import { RestaurantOrderSystem } from '../../src/index';
import { SQLiteOrderStore } from '../../src/services/sqlite-order-store';
import type { OrderResult, OrderStatus } from '../../src/types/order';

export interface OrderFixture {
  store: SQLiteOrderStore;
  system: RestaurantOrderSystem;
  /** "Test Diner", owned by `owner`, staffed by `owner` and `cook` */
  restaurantId: number;
  /** "Other Place", owned by `stranger` */
  otherRestaurantId: number;
  /** $3.45 at Test Diner */
  burgerId: number;
  /** $1.50 at Test Diner */
  friesId: number;
  /** $5.00 at Other Place */
  saladId: number;
}

export const CUSTOMER_BILLING = {
  firstName: 'Casey',
  lastName: 'Customer',
  address: '123 Main St',
  cardNumber: '4111111111111111',
  cardExpiry: '12/30',
  cardCode: '123'
};

export function expectOk<T>(result: OrderResult<T>): T {
  if (!result.ok) {
    throw new Error(`expected success, got ${result.kind}: ${result.message}`);
  }
  return result.value;
}

export async function createMemoryStore(): Promise<SQLiteOrderStore> {
  const store = new SQLiteOrderStore({ databasePath: ':memory:', busyTimeoutMs: 1000 });
  await store.initialize();
  return store;
}

/**
 * Accounts `owner`, `customer` (complete billing), `cook` and `stranger`
 * (no billing), two restaurants and three menu items
 */
export async function createFixture(): Promise<OrderFixture> {
  const store = await createMemoryStore();
  const system = new RestaurantOrderSystem(store);
  const { catalog } = system;

  await catalog.createAccount('owner', 'test-password', 'Olive', 'Owner');
  await catalog.createAccount('customer', 'test-password', 'Casey', 'Customer');
  await catalog.createAccount('cook', 'test-password', 'Cory', 'Cook');
  await catalog.createAccount('stranger', 'test-password', 'Sam', 'Stranger');
  expectOk(await catalog.updateAccount('customer', CUSTOMER_BILLING));

  const restaurantId = await catalog.createRestaurant('Test Diner', 'owner');
  const otherRestaurantId = await catalog.createRestaurant('Other Place', 'stranger');
  expectOk(await catalog.addEmployee(restaurantId, 'cook'));

  const burgerId = expectOk(await catalog.addMenuItem(restaurantId, 'Burger', 345));
  const friesId = expectOk(await catalog.addMenuItem(restaurantId, 'Fries', 150));
  const saladId = expectOk(await catalog.addMenuItem(otherRestaurantId, 'Salad', 500));

  return { store, system, restaurantId, otherRestaurantId, burgerId, friesId, saladId };
}

/**
 * Open an order for `customer` at Test Diner holding the given quantities
 */
export async function placeCart(
  fixture: OrderFixture,
  lines: Array<[itemId: number, quantity: number]>,
  customer = 'customer'
): Promise<number> {
  const orderId = expectOk(await fixture.system.createOrder(fixture.restaurantId, customer));
  for (const [itemId, quantity] of lines) {
    expectOk(await fixture.system.modifyItemQuantity(orderId, itemId, quantity));
  }
  return orderId;
}

/**
 * Drive a one-burger order for `customer` to `status` through legal transitions
 */
export async function orderInStatus(fixture: OrderFixture, status: OrderStatus): Promise<number> {
  const { system } = fixture;
  const orderId = await placeCart(fixture, [[fixture.burgerId, 1]]);

  switch (status) {
    case 'PENDING':
      break;
    case 'CANCELLED':
      expectOk(await system.transition('customer', null, orderId, 'CANCELLED'));
      break;
    case 'PAID':
      expectOk(await system.transition('customer', null, orderId, 'PAID'));
      break;
    case 'ACCEPTED':
      expectOk(await system.transition('customer', null, orderId, 'PAID'));
      expectOk(await system.transition('cook', fixture.restaurantId, orderId, 'ACCEPTED'));
      break;
    case 'DELIVERED':
      expectOk(await system.transition('customer', null, orderId, 'PAID'));
      expectOk(await system.transition('cook', fixture.restaurantId, orderId, 'ACCEPTED'));
      expectOk(await system.transition('cook', fixture.restaurantId, orderId, 'DELIVERED'));
      break;
  }
  return orderId;
}
