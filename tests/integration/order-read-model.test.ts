import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { OrderService } from '../../src/services/order-service';
import { type OrderFixture, createFixture, expectOk, orderInStatus, placeCart } from '../support/fixtures';

describe('OrderReadModel', () => {
  let fixture: OrderFixture;

  beforeEach(async () => {
    fixture = await createFixture();
  });

  afterEach(async () => {
    await fixture.system.close();
  });

  it('lists live restaurants in id order', async () => {
    expect(await fixture.system.reads.listRestaurants()).toEqual([
      { id: fixture.restaurantId, name: 'Test Diner', owner: 'owner' },
      { id: fixture.otherRestaurantId, name: 'Other Place', owner: 'stranger' }
    ]);

    expectOk(await fixture.system.catalog.deleteRestaurant(fixture.restaurantId));
    expect(await fixture.system.reads.listRestaurants()).toEqual([
      { id: fixture.otherRestaurantId, name: 'Other Place', owner: 'stranger' }
    ]);
  });

  describe('getRestaurantDetail', () => {
    it('shows menu, staff, and the orders waiting on the kitchen', async () => {
      await orderInStatus(fixture, 'PENDING');
      const paidId = await orderInStatus(fixture, 'PAID');
      const acceptedId = await orderInStatus(fixture, 'ACCEPTED');
      await orderInStatus(fixture, 'DELIVERED');
      await orderInStatus(fixture, 'CANCELLED');

      const detail = await fixture.system.reads.getRestaurantDetail(fixture.restaurantId, 'cook');
      expect(detail).toMatchObject({
        id: fixture.restaurantId,
        name: 'Test Diner',
        owner: 'owner',
        menu: [
          { id: fixture.burgerId, name: 'Burger', price: 345 },
          { id: fixture.friesId, name: 'Fries', price: 150 }
        ],
        employees: ['cook', 'owner'],
        viewer: { isOwner: false, isEmployee: true }
      });
      expect(detail?.activeOrders.map(order => [order.id, order.status])).toEqual([
        [paidId, 'PAID'],
        [acceptedId, 'ACCEPTED']
      ]);
    });

    it('describes an anonymous or outside viewer', async () => {
      expect((await fixture.system.reads.getRestaurantDetail(fixture.restaurantId))?.viewer).toEqual({
        isOwner: false,
        isEmployee: false
      });
      expect((await fixture.system.reads.getRestaurantDetail(fixture.restaurantId, 'owner'))?.viewer).toEqual({
        isOwner: true,
        isEmployee: true
      });
    });

    it('returns null for missing and deleted restaurants', async () => {
      expectOk(await fixture.system.catalog.deleteRestaurant(fixture.otherRestaurantId));
      expect(await fixture.system.reads.getRestaurantDetail(fixture.otherRestaurantId)).toBeNull();
      expect(await fixture.system.reads.getRestaurantDetail(99)).toBeNull();
    });
  });

  describe('getOrderDetail', () => {
    it('shows the whole live menu with cart quantities while PENDING', async () => {
      const orderId = await placeCart(fixture, [[fixture.burgerId, 2]]);

      const detail = await fixture.system.reads.getOrderDetail(orderId);
      expect(detail?.items).toEqual([
        { itemId: fixture.burgerId, name: 'Burger', price: 345, quantity: 2 },
        { itemId: fixture.friesId, name: 'Fries', price: 150, quantity: 0 }
      ]);
    });

    it('shows only the ordered lines once paid', async () => {
      const orderId = await placeCart(fixture, [[fixture.burgerId, 2]]);
      expectOk(await fixture.system.transition('customer', null, orderId, 'PAID'));
      expectOk(await fixture.system.catalog.deleteMenuItem(fixture.restaurantId, fixture.burgerId));

      const detail = await fixture.system.reads.getOrderDetail(orderId);
      expect(detail).toMatchObject({ status: 'PAID', total: 690 });
      expect(detail?.items).toEqual([{ itemId: fixture.burgerId, name: 'Burger', quantity: 2 }]);
    });

    it('returns null for a missing order', async () => {
      expect(await fixture.system.reads.getOrderDetail(404)).toBeNull();
    });
  });

  it('lists a customer history newest first', async () => {
    const times = ['2026-01-01T10:00:00.000Z', '2026-01-03T10:00:00.000Z', '2026-01-02T10:00:00.000Z'];
    const service = new OrderService(fixture.store, () => new Date(times.shift() ?? '2026-01-04T00:00:00.000Z'));

    const first = expectOk(await service.createOrder(fixture.restaurantId, 'customer'));
    const second = expectOk(await service.createOrder(fixture.otherRestaurantId, 'customer'));
    const third = expectOk(await service.createOrder(fixture.restaurantId, 'customer'));
    await service.createOrder(fixture.restaurantId, 'stranger');

    const history = await fixture.system.reads.getUserOrders('customer');
    expect(history.map(order => [order.id, order.restaurantName])).toEqual([
      [second, 'Other Place'],
      [third, 'Test Diner'],
      [first, 'Test Diner']
    ]);
  });

  it('returns null details for an unknown account', async () => {
    expect(await fixture.system.reads.getAccountDetails('nobody')).toBeNull();
  });
});
