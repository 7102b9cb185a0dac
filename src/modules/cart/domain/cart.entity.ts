import { z } from "zod";

export const MAX_ITEM_QUANTITY = 99;

export const CartStatusSchema = z.enum([
  "ACTIVE",
  "ABANDONED",
  "CHECKOUT",
  "CONVERTED",
  "EXPIRED",
  "SAVED",
  "MERGED",
  "DELETED",
]);

export const CartTypeSchema = z.enum(["USER", "GUEST"]);

export const StockIssueSchema = z.enum(["INSUFFICIENT_STOCK", "UNAVAILABLE"]);

const Money = z.number().nonnegative();

export const CartItemSchema = z.object({
  id: z.uuid(),
  cartId: z.uuid(),
  productId: z.string().min(1),
  variantId: z.string().min(1).nullable(),
  productName: z.string(),
  category: z.string().nullable(),
  quantity: z.number().int().min(1).max(MAX_ITEM_QUANTITY),
  unitPrice: Money,
  stockQuantity: z.number().int().nonnegative().nullable(),
  stockIssue: StockIssueSchema.nullable(),
  specialInstructions: z.string().max(500).nullable(),
  isGift: z.boolean(),
  giftMessage: z.string().max(500).nullable(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

// Dates are coerced so that a JSON snapshot read back from the cache parses.
export const CartEntitySchema = z.object({
  id: z.uuid(),
  userId: z.string().min(1).nullable(),
  sessionId: z.string().min(1).nullable(),
  status: CartStatusSchema,
  cartType: CartTypeSchema,
  currency: z.string().length(3),
  subtotal: Money,
  discountAmount: Money,
  taxAmount: Money,
  shippingAmount: Money,
  totalAmount: Money,
  itemCount: z.number().int().nonnegative(),
  totalQuantity: z.number().int().nonnegative(),
  couponCode: z.string().nullable(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
  lastActivityAt: z.coerce.date(),
  expiresAt: z.coerce.date(),
  deletedAt: z.coerce.date().nullable(),
  mergedToCartId: z.uuid().nullable(),
  version: z.number().int().nonnegative(),
  items: z.array(CartItemSchema),
});

export type CartStatus = z.infer<typeof CartStatusSchema>;
export type CartType = z.infer<typeof CartTypeSchema>;
export type StockIssue = z.infer<typeof StockIssueSchema>;
export type CartItem = z.infer<typeof CartItemSchema>;
export type CartEntity = z.infer<typeof CartEntitySchema>;

export type OwnerKey =
  | { kind: "user"; userId: string }
  | { kind: "session"; sessionId: string };

export const OwnerKeySchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("user"), userId: z.string().min(1) }),
  z.object({ kind: z.literal("session"), sessionId: z.string().min(1) }),
]);
