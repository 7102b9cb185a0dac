import { sql, type Kysely } from "kysely";

// Migrations are frozen in time, so they do not use the application's schema types.
export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable("carts")
    .ifNotExists()
    .addColumn("id", "uuid", (col) => col.primaryKey())
    .addColumn("user_id", "text")
    .addColumn("session_id", "text")
    .addColumn("status", "text", (col) => col.notNull())
    .addColumn("cart_type", "text", (col) => col.notNull())
    .addColumn("currency", "char(3)", (col) => col.notNull().defaultTo("USD"))
    .addColumn("subtotal", "numeric(12, 2)", (col) => col.notNull().defaultTo(0))
    .addColumn("discount_amount", "numeric(12, 2)", (col) =>
      col.notNull().defaultTo(0),
    )
    .addColumn("tax_amount", "numeric(12, 2)", (col) =>
      col.notNull().defaultTo(0),
    )
    .addColumn("shipping_amount", "numeric(12, 2)", (col) =>
      col.notNull().defaultTo(0),
    )
    .addColumn("total_amount", "numeric(12, 2)", (col) =>
      col.notNull().defaultTo(0),
    )
    .addColumn("item_count", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("total_quantity", "integer", (col) =>
      col.notNull().defaultTo(0),
    )
    .addColumn("coupon_code", "text")
    .addColumn("created_at", "timestamptz(3)", (col) =>
      col.notNull().defaultTo(sql`now()`),
    )
    .addColumn("updated_at", "timestamptz(3)", (col) =>
      col.notNull().defaultTo(sql`now()`),
    )
    .addColumn("last_activity_at", "timestamptz(3)", (col) =>
      col.notNull().defaultTo(sql`now()`),
    )
    .addColumn("expires_at", "timestamptz(3)", (col) => col.notNull())
    .addColumn("deleted_at", "timestamptz(3)")
    .addColumn("merged_to_cart_id", "uuid", (col) =>
      col.references("carts.id"),
    )
    .addColumn("version", "integer", (col) => col.notNull().defaultTo(1))
    .addCheckConstraint(
      "ck_carts_owner",
      sql`user_id is not null or session_id is not null`,
    )
    .execute();

  await db.schema
    .createTable("cart_items")
    .ifNotExists()
    .addColumn("id", "uuid", (col) => col.primaryKey())
    .addColumn("cart_id", "uuid", (col) =>
      col.notNull().references("carts.id").onDelete("cascade"),
    )
    .addColumn("product_id", "text", (col) => col.notNull())
    .addColumn("variant_id", "text")
    .addColumn("product_name", "text", (col) => col.notNull())
    .addColumn("category", "text")
    .addColumn("quantity", "integer", (col) =>
      col.notNull().check(sql`quantity between 1 and 99`),
    )
    .addColumn("unit_price", "numeric(12, 2)", (col) => col.notNull())
    .addColumn("stock_quantity", "integer")
    .addColumn("stock_issue", "text")
    .addColumn("special_instructions", "text")
    .addColumn("is_gift", "boolean", (col) => col.notNull().defaultTo(false))
    .addColumn("gift_message", "text")
    .addColumn("created_at", "timestamptz(3)", (col) =>
      col.notNull().defaultTo(sql`now()`),
    )
    .addColumn("updated_at", "timestamptz(3)", (col) =>
      col.notNull().defaultTo(sql`now()`),
    )
    .execute();

  await db.schema
    .createIndex("idx_carts_user_status")
    .on("carts")
    .columns(["user_id", "status"])
    .execute();

  await db.schema
    .createIndex("idx_carts_session_status")
    .on("carts")
    .columns(["session_id", "status"])
    .execute();

  await db.schema
    .createIndex("idx_carts_status_last_activity")
    .on("carts")
    .columns(["status", "last_activity_at", "id"])
    .execute();

  await db.schema
    .createIndex("idx_carts_updated_at")
    .on("carts")
    .columns(["updated_at", "id"])
    .execute();

  await db.schema
    .createIndex("idx_carts_status_expires")
    .on("carts")
    .columns(["status", "expires_at"])
    .execute();

  await db.schema
    .createIndex("idx_cart_items_cart")
    .on("cart_items")
    .column("cart_id")
    .execute();

  await db.schema
    .createIndex("idx_cart_items_product")
    .on("cart_items")
    .column("product_id")
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropIndex("idx_cart_items_product").ifExists().execute();
  await db.schema.dropIndex("idx_cart_items_cart").ifExists().execute();
  await db.schema.dropIndex("idx_carts_status_expires").ifExists().execute();
  await db.schema.dropIndex("idx_carts_updated_at").ifExists().execute();
  await db.schema
    .dropIndex("idx_carts_status_last_activity")
    .ifExists()
    .execute();
  await db.schema.dropIndex("idx_carts_session_status").ifExists().execute();
  await db.schema.dropIndex("idx_carts_user_status").ifExists().execute();
  await db.schema.dropTable("cart_items").ifExists().execute();
  await db.schema.dropTable("carts").ifExists().execute();
}
