import { describe, it, expect } from 'vitest';
import { type TransitionFacts, decideTransition } from '../../src/services/order-transition-engine';
import type { AccountRecord, OrderRecord } from '../../src/types/database';
import type { OrderStatus, TransitionRequest } from '../../src/types/order';
import { OrderIntegrityError } from '../../src/utils/error-handler';

const account: AccountRecord = {
  username: 'customer',
  password_sha256: 'test-hash',
  first_name: 'Casey',
  last_name: 'Customer',
  address: '123 Main St',
  card_number: '4111111111111111',
  card_expiry: '12/30',
  card_code: '123'
};

function order(status: string): OrderRecord {
  return {
    id: 7,
    restaurant_id: 1,
    username: 'customer',
    created_at: '2026-01-01T00:00:00.000Z',
    address: '',
    total: 0,
    status
  };
}

function facts(status: string, overrides: Partial<TransitionFacts> = {}): TransitionFacts {
  return {
    order: order(status),
    restaurantLive: true,
    actorIsEmployee: false,
    account,
    lines: [
      { item_id: 1, quantity: 2, item_restaurant_id: 1, item_name: 'Burger', price: 345, item_deleted: false }
    ],
    ...overrides
  };
}

function request(actor: string, targetStatus: OrderStatus, restaurantScope: number | null = null): TransitionRequest {
  return { actor, restaurantScope, orderId: 7, targetStatus };
}

describe('decideTransition', () => {
  it('reports a missing order with the requested scope', () => {
    expect(decideTransition(facts('PENDING', { order: null }), request('customer', 'PAID', 3))).toEqual({
      ok: false,
      kind: 'NotFound',
      message: 'no such order 7 for restaurant 3',
      context: { orderId: 7, restaurantId: 3 }
    });
  });

  it('checks the restaurant before the edge', () => {
    const result = decideTransition(facts('DELIVERED', { restaurantLive: false }), request('customer', 'PENDING'));
    expect(result).toMatchObject({ ok: false, kind: 'RestaurantUnavailable', context: { orderId: 7, restaurantId: 1 } });
  });

  it('refuses an edge missing from the table', () => {
    expect(decideTransition(facts('ACCEPTED'), request('customer', 'CANCELLED'))).toEqual({
      ok: false,
      kind: 'InvalidTransition',
      message: 'bad transition ACCEPTED -> CANCELLED',
      context: { orderId: 7, from: 'ACCEPTED', to: 'CANCELLED' }
    });
  });

  it('checks ownership before billing', () => {
    const result = decideTransition(facts('PENDING', { account: null, lines: [] }), request('stranger', 'PAID'));
    expect(result).toMatchObject({ ok: false, kind: 'NotOwner', context: { actor: 'stranger', from: 'PENDING', to: 'PAID' } });
  });

  it('needs an employee for restaurant-facing edges', () => {
    expect(decideTransition(facts('PAID'), request('customer', 'ACCEPTED'))).toMatchObject({
      ok: false,
      kind: 'NotEmployee',
      context: { restaurantId: 1, actor: 'customer' }
    });
    expect(decideTransition(facts('PAID', { actorIsEmployee: true }), request('cook', 'ACCEPTED'))).toEqual({
      ok: true,
      value: { orderId: 7, from: 'PAID', to: 'ACCEPTED' }
    });
  });

  it('attaches the billing snapshot to a payment', () => {
    expect(decideTransition(facts('PENDING'), request('customer', 'PAID'))).toEqual({
      ok: true,
      value: { orderId: 7, from: 'PENDING', to: 'PAID', snapshot: { address: '123 Main St', total: 690 } }
    });
  });

  it('passes billing refusals through', () => {
    const result = decideTransition(facts('PENDING', { lines: [] }), request('customer', 'PAID'));
    expect(result).toMatchObject({ ok: false, kind: 'EmptyOrder', context: { orderId: 7 } });
  });

  it('decides customer edges by ownership alone', () => {
    const result = decideTransition(facts('PENDING', { actorIsEmployee: true }), request('customer', 'CANCELLED'));
    expect(result).toEqual({ ok: true, value: { orderId: 7, from: 'PENDING', to: 'CANCELLED' } });
  });

  it('throws on a stored status it does not know', () => {
    expect(() => decideTransition(facts('SHIPPED'), request('customer', 'PAID'))).toThrow(OrderIntegrityError);
  });
});
