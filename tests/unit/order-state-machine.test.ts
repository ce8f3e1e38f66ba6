import { describe, it, expect } from 'vitest';
import {
  ORDER_TRANSITIONS,
  edgeAuthority,
  isLegalTransition,
  isOrderStatus,
  isTerminal,
  nextStatuses,
  parseOrderStatus
} from '../../src/services/order-state-machine';
import { ORDER_STATUSES, type OrderStatus } from '../../src/types/order';
import { OrderIntegrityError } from '../../src/utils/error-handler';

const LEGAL_EDGES = [
  'PENDING->PAID',
  'PENDING->CANCELLED',
  'PAID->ACCEPTED',
  'PAID->CANCELLED',
  'ACCEPTED->DELIVERED'
];

describe('order state machine', () => {
  describe('transition table', () => {
    const pairs: Array<[OrderStatus, OrderStatus]> = ORDER_STATUSES.flatMap(from =>
      ORDER_STATUSES.map((to): [OrderStatus, OrderStatus] => [from, to])
    );

    it('covers every ordered pair of statuses', () => {
      expect(pairs).toHaveLength(25);
    });

    it.each(pairs)('%s -> %s', (from, to) => {
      expect(isLegalTransition(from, to)).toBe(LEGAL_EDGES.includes(`${from}->${to}`));
    });

    it('never allows a status to move to itself', () => {
      for (const status of ORDER_STATUSES) {
        expect(isLegalTransition(status, status)).toBe(false);
      }
    });
  });

  describe('edge authority', () => {
    it('gives customer-facing edges to the order owner', () => {
      expect(edgeAuthority('PENDING', 'PAID')).toBe('customer');
      expect(edgeAuthority('PENDING', 'CANCELLED')).toBe('customer');
      expect(edgeAuthority('PAID', 'CANCELLED')).toBe('customer');
    });

    it('gives restaurant-facing edges to employees', () => {
      expect(edgeAuthority('PAID', 'ACCEPTED')).toBe('employee');
      expect(edgeAuthority('ACCEPTED', 'DELIVERED')).toBe('employee');
    });

    it('returns null for illegal edges', () => {
      expect(edgeAuthority('ACCEPTED', 'CANCELLED')).toBeNull();
      expect(edgeAuthority('DELIVERED', 'PENDING')).toBeNull();
    });

    it('ignores names inherited from Object', () => {
      const inherited: OrderStatus[] = JSON.parse('["constructor", "toString", "__proto__"]');
      for (const to of inherited) {
        expect(edgeAuthority('PENDING', to)).toBeNull();
        expect(isLegalTransition('PAID', to)).toBe(false);
      }
    });
  });

  describe('nextStatuses / isTerminal', () => {
    it('lists successors in status order', () => {
      expect(nextStatuses('PENDING')).toEqual(['PAID', 'CANCELLED']);
      expect(nextStatuses('PAID')).toEqual(['CANCELLED', 'ACCEPTED']);
      expect(nextStatuses('ACCEPTED')).toEqual(['DELIVERED']);
    });

    it('treats CANCELLED and DELIVERED as terminal', () => {
      expect(ORDER_STATUSES.filter(isTerminal)).toEqual(['CANCELLED', 'DELIVERED']);
      expect(ORDER_TRANSITIONS.CANCELLED).toEqual({});
      expect(ORDER_TRANSITIONS.DELIVERED).toEqual({});
    });
  });

  describe('parseOrderStatus', () => {
    it('accepts every known status', () => {
      for (const status of ORDER_STATUSES) {
        expect(parseOrderStatus(status, 1)).toBe(status);
      }
    });

    it('is case sensitive', () => {
      expect(isOrderStatus('paid')).toBe(false);
    });

    it('throws OrderIntegrityError for unknown values', () => {
      let caught: unknown;
      try {
        parseOrderStatus('SHIPPED', 7);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(OrderIntegrityError);
      expect(caught).toMatchObject({ orderId: 7, status: 'SHIPPED' });
    });
  });
});
