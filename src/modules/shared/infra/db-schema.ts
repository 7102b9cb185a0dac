import type { ColumnType } from "kysely";

/**
 * Table interfaces for the cart tables created in `database/migrations`.
 * `numeric` columns come back from pg as strings; writes accept numbers.
 */
type Numeric = ColumnType<string, number | string, number | string>;
type Timestamp = ColumnType<Date, Date | string, Date | string>;

export interface CartsTable {
  id: string;
  user_id: string | null;
  session_id: string | null;
  status: string;
  cart_type: string;
  currency: string;
  subtotal: Numeric;
  discount_amount: Numeric;
  tax_amount: Numeric;
  shipping_amount: Numeric;
  total_amount: Numeric;
  item_count: number;
  total_quantity: number;
  coupon_code: string | null;
  created_at: Timestamp;
  updated_at: Timestamp;
  last_activity_at: Timestamp;
  expires_at: Timestamp;
  deleted_at: ColumnType<Date | null, Date | string | null, Date | string | null>;
  merged_to_cart_id: string | null;
  version: number;
}

export interface CartItemsTable {
  id: string;
  cart_id: string;
  product_id: string;
  variant_id: string | null;
  product_name: string;
  category: string | null;
  quantity: number;
  unit_price: Numeric;
  stock_quantity: number | null;
  stock_issue: string | null;
  special_instructions: string | null;
  is_gift: boolean;
  gift_message: string | null;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface CartDatabase {
  carts: CartsTable;
  cart_items: CartItemsTable;
}
