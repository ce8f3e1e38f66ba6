/**
 * Database Models and Types
 */

import type { OrderStatus } from './order';

export interface AccountRecord {
  username: string;
  password_sha256: string;
  first_name: string;
  last_name: string;
  address: string;
  card_number: string;
  card_expiry: string;
  card_code: string;
}

export interface RestaurantRecord {
  id: number;
  owner: string;
  name: string;
  deleted: boolean;
}

/**
 * Order row as read from storage; status is checked against OrderStatus by the engine
 */
export interface OrderRecord {
  id: number;
  restaurant_id: number;
  username: string;
  created_at: string;
  address: string;
  total: number; // cents
  status: string;
}

/**
 * An order item joined to its menu item. Menu fields are null when the item row is gone.
 */
export interface OrderLineRecord {
  item_id: number;
  quantity: number;
  item_restaurant_id: number | null;
  item_name: string | null;
  price: number | null;
  item_deleted: boolean | null;
}

export interface AccountBilling {
  address: string;
  cardNumber: string;
  cardExpiry: string;
  cardCode: string;
}

export interface AccountDetails extends AccountBilling {
  username: string;
  firstName: string;
  lastName: string;
}

export interface RestaurantSummary {
  id: number;
  name: string;
  owner: string;
}

export interface MenuItemView {
  id: number;
  name: string;
  price: number;
}

export interface OrderSummary {
  id: number;
  createdAt: string;
  restaurantId: number;
  restaurantName: string | null;
  username: string;
  address: string;
  total: number;
  status: OrderStatus;
}

export interface RestaurantDetail extends RestaurantSummary {
  menu: MenuItemView[];
  employees: string[];
  activeOrders: OrderSummary[];
  viewer: {
    isOwner: boolean;
    isEmployee: boolean;
  };
}

/**
 * Cart row of a PENDING order: every live menu item with the quantity in the cart
 */
export interface CartLineView {
  itemId: number;
  name: string;
  price: number;
  quantity: number;
}

/**
 * Frozen line of a placed order; the name survives menu deletion
 */
export interface PlacedLineView {
  itemId: number;
  name: string | null;
  quantity: number;
}

export type OrderDetail =
  | (OrderSummary & { status: 'PENDING'; items: CartLineView[] })
  | (OrderSummary & { status: Exclude<OrderStatus, 'PENDING'>; items: PlacedLineView[] });

export interface NewAccount {
  username: string;
  passwordSha256: string;
  firstName: string;
  lastName: string;
}

export interface AccountUpdate extends AccountBilling {
  firstName: string;
  lastName: string;
}
