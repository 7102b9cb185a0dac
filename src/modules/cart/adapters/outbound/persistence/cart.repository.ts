/**
 * Cart Repository Adapter - Implements the outbound repository port
 * This is the persistence adapter using Kysely over the carts and cart_items tables
 */

import type { Insertable, Selectable } from "kysely";
import type {
  CartItemsTable,
  CartsTable,
} from "../../../../shared/infra/db-schema.js";
import {
  dbQuery,
  withTransaction,
  type DatabaseExecutor,
} from "../../../../shared/infra/db.js";
import type { Logger } from "../../../../shared/infra/logger.js";
import {
  CartStatusSchema,
  CartTypeSchema,
  StockIssueSchema,
  type CartEntity,
  type CartItem,
} from "../../../domain/cart.entity.js";
import { ConcurrentCartModificationError } from "../../../errors.js";
import type { CartRepositoryPort } from "../../../application/ports/outbound/cart-repository.port.js";

type CartRow = Selectable<CartsTable>;
type ItemRow = Selectable<CartItemsTable>;

const EXPIRABLE_STATUSES = ["ACTIVE", "SAVED", "CHECKOUT"] as const;

export function createCartRepository({
  db,
  logger,
}: {
  db: DatabaseExecutor;
  logger: Logger;
}): CartRepositoryPort {
  async function withItems(rows: CartRow[]): Promise<CartEntity[]> {
    if (rows.length === 0) return [];
    const items = await dbQuery(
      () =>
        db
          .selectFrom("cart_items")
          .selectAll()
          .where(
            "cart_id",
            "in",
            rows.map((row) => row.id),
          )
          .orderBy("created_at")
          .orderBy("id")
          .execute(),
      "Failed to load cart items",
    );
    const byCart = new Map<string, CartItem[]>();
    for (const row of items) {
      const list = byCart.get(row.cart_id) ?? [];
      list.push(mapItem(row));
      byCart.set(row.cart_id, list);
    }
    return rows.map((row) => mapCart(row, byCart.get(row.id) ?? []));
  }

  const repository: CartRepositoryPort = {
    async findById(cartId) {
      logger.debug({ cartId }, "cart.repository.findById");
      const row = await dbQuery(
        () =>
          db
            .selectFrom("carts")
            .selectAll()
            .where("id", "=", cartId)
            .executeTakeFirst(),
        "Failed to find cart",
      );
      if (!row) return undefined;
      const [cart] = await withItems([row]);
      return cart;
    },

    async findActiveByOwner(owner) {
      logger.debug({ owner }, "cart.repository.findActiveByOwner");
      let query = db
        .selectFrom("carts")
        .selectAll()
        .where("status", "=", "ACTIVE");
      query =
        owner.kind === "user"
          ? query.where("user_id", "=", owner.userId)
          : query
              .where("session_id", "=", owner.sessionId)
              .where("user_id", "is", null);
      const row = await dbQuery(
        () => query.orderBy("updated_at", "desc").limit(1).executeTakeFirst(),
        "Failed to find active cart",
      );
      if (!row) return undefined;
      const [cart] = await withItems([row]);
      return cart;
    },

    async findActiveUpdatedSince({ since, afterId, limit }) {
      logger.debug({ since, afterId, limit }, "cart.repository.activeSince");
      let query = db
        .selectFrom("carts")
        .selectAll()
        .where("status", "=", "ACTIVE")
        .where("last_activity_at", ">=", since);
      if (afterId) query = query.where("id", ">", afterId);
      const rows = await dbQuery(
        () => query.orderBy("id").limit(limit).execute(),
        "Failed to scan active carts",
      );
      return withItems(rows);
    },

    async findInactiveUpdatedSince({ since, afterId, limit }) {
      logger.debug({ since, afterId, limit }, "cart.repository.inactiveSince");
      let query = db
        .selectFrom("carts")
        .selectAll()
        .where("status", "!=", "ACTIVE")
        .where("updated_at", ">=", since);
      if (afterId) query = query.where("id", ">", afterId);
      const rows = await dbQuery(
        () => query.orderBy("id").limit(limit).execute(),
        "Failed to scan inactive carts",
      );
      return withItems(rows);
    },

    async findActiveContainingProduct(productId) {
      logger.debug({ productId }, "cart.repository.containingProduct");
      const rows = await dbQuery(
        () =>
          db
            .selectFrom("carts")
            .selectAll()
            .where("status", "=", "ACTIVE")
            .where("id", "in", (eb) =>
              eb
                .selectFrom("cart_items")
                .select("cart_items.cart_id")
                .where("cart_items.product_id", "=", productId),
            )
            .orderBy("id")
            .execute(),
        "Failed to find carts holding product",
      );
      return withItems(rows);
    },

    async findExpired({ now, limit }) {
      logger.debug({ now, limit }, "cart.repository.findExpired");
      const rows = await dbQuery(
        () =>
          db
            .selectFrom("carts")
            .selectAll()
            .where("status", "in", EXPIRABLE_STATUSES)
            .where("expires_at", "<=", now)
            .orderBy("expires_at")
            .limit(limit)
            .execute(),
        "Failed to find expired carts",
      );
      return withItems(rows);
    },

    async saveCart(cart) {
      const version = cart.version + 1;
      logger.info(
        { cartId: cart.id, version, status: cart.status },
        "cart.repository.saveCart",
      );
      await withTransaction(db, async (trx) => {
        const row = toCartRow(cart, version);
        if (cart.version === 0) {
          await dbQuery(
            () => trx.insertInto("carts").values(row).execute(),
            "Failed to insert cart",
          );
        } else {
          const result = await dbQuery(
            () =>
              trx
                .updateTable("carts")
                .set(row)
                .where("id", "=", cart.id)
                .where("version", "=", cart.version)
                .executeTakeFirst(),
            "Failed to update cart",
          );
          if (result.numUpdatedRows === 0n) {
            throw new ConcurrentCartModificationError(cart.id, cart.version);
          }
        }

        if (cart.items.length > 0) {
          await dbQuery(
            () =>
              trx
                .insertInto("cart_items")
                .values(cart.items.map((item) => toItemRow(item, cart.id)))
                .onConflict((oc) =>
                  oc.column("id").doUpdateSet((eb) => ({
                    cart_id: eb.ref("excluded.cart_id"),
                    quantity: eb.ref("excluded.quantity"),
                    unit_price: eb.ref("excluded.unit_price"),
                    stock_quantity: eb.ref("excluded.stock_quantity"),
                    stock_issue: eb.ref("excluded.stock_issue"),
                    special_instructions: eb.ref(
                      "excluded.special_instructions",
                    ),
                    is_gift: eb.ref("excluded.is_gift"),
                    gift_message: eb.ref("excluded.gift_message"),
                    updated_at: eb.ref("excluded.updated_at"),
                  })),
                )
                .execute(),
            "Failed to write cart items",
          );
        }

        let remove = trx.deleteFrom("cart_items").where("cart_id", "=", cart.id);
        if (cart.items.length > 0) {
          remove = remove.where(
            "id",
            "not in",
            cart.items.map((item) => item.id),
          );
        }
        await dbQuery(() => remove.execute(), "Failed to prune cart items");
      });
      return { ...cart, version };
    },

    transaction(fn) {
      return withTransaction(db, (trx) =>
        fn(createCartRepository({ db: trx, logger })),
      );
    },
  };

  return repository;
}

function toCartRow(cart: CartEntity, version: number): Insertable<CartsTable> {
  return {
    id: cart.id,
    user_id: cart.userId,
    session_id: cart.sessionId,
    status: cart.status,
    cart_type: cart.cartType,
    currency: cart.currency,
    subtotal: cart.subtotal,
    discount_amount: cart.discountAmount,
    tax_amount: cart.taxAmount,
    shipping_amount: cart.shippingAmount,
    total_amount: cart.totalAmount,
    item_count: cart.itemCount,
    total_quantity: cart.totalQuantity,
    coupon_code: cart.couponCode,
    created_at: cart.createdAt,
    updated_at: cart.updatedAt,
    last_activity_at: cart.lastActivityAt,
    expires_at: cart.expiresAt,
    deleted_at: cart.deletedAt,
    merged_to_cart_id: cart.mergedToCartId,
    version,
  };
}

function toItemRow(item: CartItem, cartId: string): Insertable<CartItemsTable> {
  return {
    id: item.id,
    cart_id: cartId,
    product_id: item.productId,
    variant_id: item.variantId,
    product_name: item.productName,
    category: item.category,
    quantity: item.quantity,
    unit_price: item.unitPrice,
    stock_quantity: item.stockQuantity,
    stock_issue: item.stockIssue,
    special_instructions: item.specialInstructions,
    is_gift: item.isGift,
    gift_message: item.giftMessage,
    created_at: item.createdAt,
    updated_at: item.updatedAt,
  };
}

function mapCart(row: CartRow, items: CartItem[]): CartEntity {
  return {
    id: row.id,
    userId: row.user_id,
    sessionId: row.session_id,
    status: CartStatusSchema.parse(row.status),
    cartType: CartTypeSchema.parse(row.cart_type),
    currency: row.currency.trim(),
    subtotal: Number(row.subtotal),
    discountAmount: Number(row.discount_amount),
    taxAmount: Number(row.tax_amount),
    shippingAmount: Number(row.shipping_amount),
    totalAmount: Number(row.total_amount),
    itemCount: row.item_count,
    totalQuantity: row.total_quantity,
    couponCode: row.coupon_code,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    lastActivityAt: row.last_activity_at,
    expiresAt: row.expires_at,
    deletedAt: row.deleted_at,
    mergedToCartId: row.merged_to_cart_id,
    version: row.version,
    items,
  };
}

function mapItem(row: ItemRow): CartItem {
  return {
    id: row.id,
    cartId: row.cart_id,
    productId: row.product_id,
    variantId: row.variant_id,
    productName: row.product_name,
    category: row.category,
    quantity: row.quantity,
    unitPrice: Number(row.unit_price),
    stockQuantity: row.stock_quantity,
    stockIssue:
      row.stock_issue === null ? null : StockIssueSchema.parse(row.stock_issue),
    specialInstructions: row.special_instructions,
    isGift: row.is_gift,
    giftMessage: row.gift_message,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
