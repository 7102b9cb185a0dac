import { z } from "zod";

export const CartValidationIssueSchema = z.object({
  code: z.enum([
    "CART_EXPIRED",
    "PRODUCT_NOT_FOUND",
    "PRODUCT_UNAVAILABLE",
    "INSUFFICIENT_STOCK",
    "PRICE_CHANGED",
  ]),
  itemId: z.string().nullable(),
  productId: z.string().nullable(),
  message: z.string(),
  currentPrice: z.number().optional(),
  availableQuantity: z.number().int().optional(),
});

export const CartValidationResultSchema = z.object({
  cartId: z.uuid(),
  version: z.number().int(),
  valid: z.boolean(),
  issues: z.array(CartValidationIssueSchema),
  checkedAt: z.coerce.date(),
});

export type CartValidationIssue = z.infer<typeof CartValidationIssueSchema>;
export type CartValidationResult = z.infer<typeof CartValidationResultSchema>;
