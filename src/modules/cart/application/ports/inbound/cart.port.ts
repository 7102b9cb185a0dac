/**
 * Inbound Port - Defines what the Cart module offers to the outside world
 * This is the contract that external modules should depend on
 */

import { z } from "zod";
import {
  MAX_ITEM_QUANTITY,
  type CartEntity,
  type OwnerKey,
} from "../../../domain/cart.entity.js";
import type { CartValidationResult } from "../../../domain/cart-validation.js";
import type {
  GuestMergeOutcome,
  UserMergeOutcome,
} from "../../merge/merge-engine.js";
import type { PriceBreakdown } from "../../pricing/pricing.types.js";
import type { RecoveryResult } from "../../store/consistency-synchronizer.js";
import type { CacheHealthReport } from "../../store/health-monitor.js";
import type { ProductChangeResult } from "../../store/invalidation-broadcaster.js";

const Quantity = z.number().int().min(1).max(MAX_ITEM_QUANTITY);

export const AddItemInputSchema = z.object({
  productId: z.string().min(1),
  variantId: z.string().min(1).nullable().default(null),
  quantity: Quantity,
  specialInstructions: z.string().max(500).nullable().default(null),
  isGift: z.boolean().default(false),
  giftMessage: z.string().max(500).nullable().default(null),
});

export const UpdateItemInputSchema = z.object({
  itemId: z.uuid(),
  quantity: Quantity,
});

export const RemoveItemInputSchema = z.object({ itemId: z.uuid() });

export const ApplyCouponInputSchema = z.object({
  couponCode: z.string().trim().min(1).max(64),
});

export const GuestMergeInputSchema = z.object({
  sessionId: z.string().min(1),
  userId: z.string().min(1),
});

export const UserMergeInputSchema = z.object({
  userId: z.string().min(1),
  sourceCartIds: z.array(z.uuid()).min(1),
  targetCartId: z.uuid(),
});

type WithOwner<T extends z.ZodType> = z.input<T> & { owner: OwnerKey };

export type ExpirationResult = { processed: number; failed: number };

export interface CartPort {
  // Commands (write operations)
  getOrCreateCart(owner: OwnerKey): Promise<CartEntity>;
  addItem(input: WithOwner<typeof AddItemInputSchema>): Promise<CartEntity>;
  updateItemQuantity(
    input: WithOwner<typeof UpdateItemInputSchema>,
  ): Promise<CartEntity>;
  removeItem(input: WithOwner<typeof RemoveItemInputSchema>): Promise<CartEntity>;
  applyCoupon(
    input: WithOwner<typeof ApplyCouponInputSchema>,
  ): Promise<CartEntity>;
  removeCoupon(owner: OwnerKey): Promise<CartEntity>;
  clearCart(owner: OwnerKey): Promise<CartEntity>;
  deleteCart(owner: OwnerKey): Promise<void>;
  mergeGuestCartToUser(
    input: z.input<typeof GuestMergeInputSchema>,
  ): Promise<GuestMergeOutcome>;
  mergeUserCarts(
    input: z.input<typeof UserMergeInputSchema>,
  ): Promise<UserMergeOutcome>;
  repriceCart(
    owner: OwnerKey,
  ): Promise<{ cart: CartEntity; pricing: PriceBreakdown }>;
  handleProductEvent(input: unknown): Promise<ProductChangeResult>;
  processExpiredCarts(): Promise<ExpirationResult>;
  recoverCache(): Promise<RecoveryResult>;

  // Queries (read operations)
  getActiveCart(owner: OwnerKey): Promise<CartEntity>;
  calculateCartPricing(owner: OwnerKey): Promise<PriceBreakdown>;
  validateCart(owner: OwnerKey): Promise<CartValidationResult>;
  getCacheHealth(): CacheHealthReport;
}
