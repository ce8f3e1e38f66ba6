import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { OrderService } from '../../src/services/order-service';
import { ValidationError } from '../../src/utils/error-handler';
import { type OrderFixture, createFixture, expectOk, orderInStatus, placeCart } from '../support/fixtures';

describe('OrderService', () => {
  let fixture: OrderFixture;

  beforeEach(async () => {
    fixture = await createFixture();
  });

  afterEach(async () => {
    await fixture.system.close();
  });

  describe('createOrder', () => {
    it('opens an empty PENDING order stamped by the clock', async () => {
      const service = new OrderService(fixture.store, () => new Date('2026-03-01T12:00:00.000Z'));
      const orderId = expectOk(await service.createOrder(fixture.restaurantId, 'customer'));

      const detail = await fixture.system.reads.getOrderDetail(orderId);
      expect(detail).toMatchObject({
        id: orderId,
        createdAt: '2026-03-01T12:00:00.000Z',
        restaurantId: fixture.restaurantId,
        restaurantName: 'Test Diner',
        username: 'customer',
        address: '',
        total: 0,
        status: 'PENDING'
      });
    });

    it('refuses a deleted restaurant', async () => {
      expectOk(await fixture.system.catalog.deleteRestaurant(fixture.otherRestaurantId));
      const result = await fixture.system.createOrder(fixture.otherRestaurantId, 'customer');
      expect(result).toEqual({
        ok: false,
        kind: 'RestaurantUnavailable',
        message: 'restaurant does not exist or has been deleted',
        context: { restaurantId: fixture.otherRestaurantId }
      });
    });

    it('refuses a restaurant that never existed', async () => {
      const result = await fixture.system.createOrder(42, 'customer');
      expect(result).toMatchObject({ ok: false, kind: 'RestaurantUnavailable' });
    });
  });

  describe('modifyItemQuantity', () => {
    it('adds and removes quantities', async () => {
      const orderId = await placeCart(fixture, []);

      expect(await fixture.system.modifyItemQuantity(orderId, fixture.burgerId, 1)).toEqual({
        ok: true,
        value: { orderId, itemId: fixture.burgerId, quantity: 1 }
      });
      expect(expectOk(await fixture.system.modifyItemQuantity(orderId, fixture.burgerId, 2)).quantity).toBe(3);
      expect(expectOk(await fixture.system.modifyItemQuantity(orderId, fixture.burgerId, -1)).quantity).toBe(2);
    });

    it('never goes below zero', async () => {
      const orderId = await placeCart(fixture, [[fixture.burgerId, 2]]);

      expect(expectOk(await fixture.system.modifyItemQuantity(orderId, fixture.burgerId, -5)).quantity).toBe(0);
      expect(expectOk(await fixture.system.modifyItemQuantity(orderId, fixture.burgerId, 1)).quantity).toBe(1);
    });

    it('starts a removal on an untouched item at zero', async () => {
      const orderId = await placeCart(fixture, []);
      expect(expectOk(await fixture.system.modifyItemQuantity(orderId, fixture.friesId, -1)).quantity).toBe(0);
    });

    it('accepts items from other restaurants until payment', async () => {
      const orderId = await placeCart(fixture, []);
      expect(expectOk(await fixture.system.modifyItemQuantity(orderId, fixture.saladId, 1)).quantity).toBe(1);
    });

    it('refuses a missing order', async () => {
      const result = await fixture.system.modifyItemQuantity(999, fixture.burgerId, 1);
      expect(result).toEqual({
        ok: false,
        kind: 'NotFound',
        message: 'order 999 does not exist',
        context: { orderId: 999 }
      });
    });

    it.each(['PAID', 'CANCELLED', 'ACCEPTED', 'DELIVERED'] as const)('refuses a %s order', async status => {
      const orderId = await orderInStatus(fixture, status);
      const result = await fixture.system.modifyItemQuantity(orderId, fixture.burgerId, 1);
      expect(result).toEqual({
        ok: false,
        kind: 'NotEditable',
        message: `cannot modify items for non-pending order ${orderId} (is ${status})`,
        context: { orderId, itemId: fixture.burgerId, from: status }
      });
    });

    it('refuses an item id the menu never had', async () => {
      const orderId = await placeCart(fixture, []);
      expect(await fixture.system.modifyItemQuantity(orderId, 999, 1)).toEqual({
        ok: false,
        kind: 'NotFound',
        message: 'menu item 999 does not exist',
        context: { orderId, itemId: 999 }
      });

      const detail = await fixture.system.reads.getOrderDetail(orderId);
      expect(detail?.status).toBe('PENDING');
    });

    it.each([0.5, Number.NaN, Number.POSITIVE_INFINITY])('rejects a quantity change of %s', async delta => {
      const orderId = await placeCart(fixture, [[fixture.burgerId, 1]]);

      await expect(fixture.system.modifyItemQuantity(orderId, fixture.burgerId, delta)).rejects.toBeInstanceOf(ValidationError);
      const detail = await fixture.system.reads.getOrderDetail(orderId);
      expect(detail?.items.find(item => item.itemId === fixture.burgerId)?.quantity).toBe(1);
    });
  });
});
