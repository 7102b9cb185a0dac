import { toCents } from "../../../shared/money.js";
import type { QuantityOverflowPolicy } from "../../../shared/infra/config.js";
import type { Logger } from "../../../shared/infra/logger.js";
import {
  MAX_ITEM_QUANTITY,
  type CartEntity,
  type CartItem,
  type OwnerKey,
} from "../../domain/cart.entity.js";
import {
  expiresAtFor,
  isExpired,
  isMergeable,
  isOwnedBy,
  isSameLine,
  newCart,
  rebuildAggregates,
  touch,
  type CartTtl,
} from "../../domain/cart.model.js";
import { transitionTo } from "../../domain/cart.status.js";
import {
  CartNotFoundError,
  CartOwnershipError,
  ConcurrentCartModificationError,
  MergeRejectedError,
  type MergeRejectionReason,
} from "../../errors.js";
import { createDerivedAmounts } from "../pricing/derived-amounts.js";
import type { CartRepositoryPort } from "../ports/outbound/cart-repository.port.js";
import type { CouponPort } from "../ports/outbound/coupon.port.js";
import type { CartStore } from "../store/cart-store.js";
import type { InvalidationBroadcaster } from "../store/invalidation-broadcaster.js";

export type MergeVerdict =
  | { ok: true }
  | { ok: false; reason: MergeRejectionReason; message: string };

export type GuestMergeOutcome = {
  cart: CartEntity;
  action: "unchanged" | "created" | "promoted" | "merged";
  droppedItems: CartItem[];
};

export type UserMergeOutcome = {
  target: CartEntity;
  merged: string[];
  rejected: Array<{ cartId: string; reason: MergeRejectionReason }>;
  droppedItems: CartItem[];
};

export type MergeEngine = {
  checkMerge(source: CartEntity, target: CartEntity): MergeVerdict;
  canMerge(source: CartEntity, target: CartEntity): boolean;
  mergeGuestCartToUser(
    sessionId: string,
    userId: string,
  ): Promise<GuestMergeOutcome>;
  mergeUserCarts(
    userId: string,
    sourceIds: string[],
    targetId: string,
  ): Promise<UserMergeOutcome>;
};

export type MergeConfig = {
  maxItemCount: number;
  maxTotalAmount: number;
  quantityOverflow: QuantityOverflowPolicy;
  currency: string;
  ttl: CartTtl;
};

type Dependencies = {
  store: CartStore;
  repository: CartRepositoryPort;
  broadcaster: InvalidationBroadcaster;
  coupons: CouponPort;
  logger: Logger;
  config: MergeConfig;
  now?: () => Date;
  newId?: () => string;
};

type PairResult =
  | { ok: true; source: CartEntity; target: CartEntity; dropped: CartItem[] }
  | { ok: false; reason: MergeRejectionReason; message: string };

/**
 * Folds one cart's lines into another. Lines keyed by product, variant and
 * price add up; a sum above the per-line cap leaves the target line as it
 * was (`drop-line`) or rejects the pair (`reject`). Unmatched lines move to
 * the target. Both carts come back with rebuilt aggregates; the source keeps
 * only the lines that did not move.
 */
export function mergePair(
  source: CartEntity,
  target: CartEntity,
  policy: QuantityOverflowPolicy,
  now: Date,
): PairResult {
  const targetItems = target.items.map((item) => ({ ...item }));
  const remaining: CartItem[] = [];
  const dropped: CartItem[] = [];

  for (const line of source.items) {
    const match = targetItems.find((item) => isSameLine(item, line));
    if (!match) {
      targetItems.push({ ...line, cartId: target.id, updatedAt: now });
      continue;
    }
    remaining.push(line);
    const quantity = match.quantity + line.quantity;
    if (quantity <= MAX_ITEM_QUANTITY) {
      match.quantity = quantity;
      match.updatedAt = now;
    } else if (policy === "reject") {
      return {
        ok: false,
        reason: "QUANTITY_CAP_EXCEEDED",
        message: `Line ${line.productId} would hold ${quantity} units`,
      };
    } else {
      dropped.push(line);
    }
  }

  return {
    ok: true,
    target: rebuildAggregates(touch({ ...target, items: targetItems }, now)),
    source: rebuildAggregates({ ...source, items: remaining, updatedAt: now }),
    dropped,
  };
}

export function createMergeEngine({
  store,
  repository,
  broadcaster,
  coupons,
  logger,
  config,
  now = () => new Date(),
  newId = () => crypto.randomUUID(),
}: Dependencies): MergeEngine {
  const derive = createDerivedAmounts({ coupons, logger });

  function checkMerge(source: CartEntity, target: CartEntity): MergeVerdict {
    const at = now();
    if (!isMergeable(source, at) || !isMergeable(target, at)) {
      return {
        ok: false,
        reason: "STATUS_NOT_MERGEABLE",
        message: `Carts must be ACTIVE or SAVED and unexpired (source ${source.status}, target ${target.status})`,
      };
    }
    const itemCount = source.itemCount + target.itemCount;
    if (itemCount > config.maxItemCount) {
      return {
        ok: false,
        reason: "ITEM_LIMIT_EXCEEDED",
        message: `Combined item count ${itemCount} exceeds ${config.maxItemCount}`,
      };
    }
    const total = toCents(source.totalAmount) + toCents(target.totalAmount);
    if (total > toCents(config.maxTotalAmount)) {
      return {
        ok: false,
        reason: "VALUE_LIMIT_EXCEEDED",
        message: `Combined value exceeds ${config.maxTotalAmount}`,
      };
    }
    return { ok: true };
  }

  /**
   * Applies one pair inside `tx`, saving the target before the source so
   * moved item rows already belong to the target when the source is written.
   */
  async function commitPair(
    tx: CartRepositoryPort,
    source: CartEntity,
    target: CartEntity,
  ) {
    const verdict = checkMerge(source, target);
    if (!verdict.ok) return verdict;
    const at = now();
    const result = mergePair(source, target, config.quantityOverflow, at);
    if (!result.ok) return result;

    const savedTarget = await tx.saveCart(await derive(result.target));
    const savedSource = await tx.saveCart(
      transitionTo(result.source, "MERGED", at, {
        mergedToCartId: savedTarget.id,
      }),
    );
    for (const item of result.dropped) {
      logger.warn(
        {
          sourceCartId: source.id,
          targetCartId: target.id,
          productId: item.productId,
          quantity: item.quantity,
        },
        "cart.merge.line-dropped",
      );
    }
    return {
      ok: true as const,
      target: savedTarget,
      source: savedSource,
      dropped: result.dropped,
    };
  }

  async function requireFresh(tx: CartRepositoryPort, cartId: string) {
    const cart = await tx.findById(cartId);
    if (!cart) throw new CartNotFoundError(`Cart not found: ${cartId}`);
    return cart;
  }

  async function mergeGuestCartToUser(
    sessionId: string,
    userId: string,
  ): Promise<GuestMergeOutcome> {
    const sessionOwner: OwnerKey = { kind: "session", sessionId };
    const userOwner: OwnerKey = { kind: "user", userId };
    const guest = await store.get(sessionOwner, { bypassCache: true });
    const existing = await store.get(userOwner, { bypassCache: true });
    logger.info(
      { sessionId, userId, guestCartId: guest?.id, userCartId: existing?.id },
      "cart.merge.guest",
    );

    if (!guest) {
      if (existing) {
        return { cart: existing, action: "unchanged", droppedItems: [] };
      }
      const created = await store.save(
        newCart({
          id: newId(),
          owner: userOwner,
          currency: config.currency,
          now: now(),
          ttl: config.ttl,
        }),
      );
      return { cart: created, action: "created", droppedItems: [] };
    }

    if (!existing) {
      const promoted = await repository.transaction(async (tx) => {
        const fresh = await requireFresh(tx, guest.id);
        const at = now();
        // Another request may have merged, deleted or promoted the guest
        // cart, or given the user a cart, since the reads above.
        const unchanged =
          fresh.version === guest.version &&
          fresh.status === "ACTIVE" &&
          !isExpired(fresh, at) &&
          isOwnedBy(fresh, sessionOwner);
        if (!unchanged || (await tx.findActiveByOwner(userOwner))) {
          throw new ConcurrentCartModificationError(guest.id, guest.version);
        }
        return tx.saveCart(
          touch(
            {
              ...fresh,
              userId,
              sessionId: null,
              cartType: "USER",
              expiresAt: expiresAtFor("USER", at, config.ttl),
            },
            at,
          ),
        );
      });
      broadcaster.cartChanged(promoted, [sessionOwner]);
      logger.info({ cartId: promoted.id, userId }, "cart.merge.promoted");
      return { cart: promoted, action: "promoted", droppedItems: [] };
    }

    const outcome = await repository.transaction(async (tx) => {
      const source = await requireFresh(tx, guest.id);
      const target = await requireFresh(tx, existing.id);
      const result = await commitPair(tx, source, target);
      if (!result.ok) {
        throw new MergeRejectedError(result.reason, result.message);
      }
      return result;
    });
    broadcaster.cartChanged(outcome.target);
    broadcaster.cartChanged(outcome.source, [sessionOwner]);
    logger.info(
      {
        sourceCartId: outcome.source.id,
        targetCartId: outcome.target.id,
        dropped: outcome.dropped.length,
      },
      "cart.merge.merged",
    );
    return {
      cart: outcome.target,
      action: "merged",
      droppedItems: outcome.dropped,
    };
  }

  async function requireOwned(cartId: string, userId: string) {
    const cart = await store.getById(cartId, { bypassCache: true });
    if (!cart) throw new CartNotFoundError(`Cart not found: ${cartId}`);
    if (cart.userId !== userId) throw new CartOwnershipError(cartId, userId);
    return cart;
  }

  async function mergeUserCarts(
    userId: string,
    sourceIds: string[],
    targetId: string,
  ): Promise<UserMergeOutcome> {
    await requireOwned(targetId, userId);
    const uniqueSources = [...new Set(sourceIds)].filter(
      (id) => id !== targetId,
    );
    for (const sourceId of uniqueSources) {
      await requireOwned(sourceId, userId);
    }

    const outcome = await repository.transaction(async (tx) => {
      let target = await requireFresh(tx, targetId);
      const merged: CartEntity[] = [];
      const rejected: UserMergeOutcome["rejected"] = [];
      const droppedItems: CartItem[] = [];

      for (const sourceId of uniqueSources) {
        const source = await requireFresh(tx, sourceId);
        const result = await commitPair(tx, source, target);
        if (!result.ok) {
          logger.warn(
            { sourceCartId: sourceId, targetCartId: targetId, ...result },
            "cart.merge.pair-rejected",
          );
          rejected.push({ cartId: sourceId, reason: result.reason });
          continue;
        }
        target = result.target;
        merged.push(result.source);
        droppedItems.push(...result.dropped);
      }
      return { target, merged, rejected, droppedItems };
    });

    broadcaster.cartChanged(outcome.target);
    for (const source of outcome.merged) broadcaster.cartChanged(source);
    logger.info(
      {
        userId,
        targetCartId: targetId,
        merged: outcome.merged.length,
        rejected: outcome.rejected.length,
      },
      "cart.merge.user-carts",
    );
    return {
      target: outcome.target,
      merged: outcome.merged.map((cart) => cart.id),
      rejected: outcome.rejected,
      droppedItems: outcome.droppedItems,
    };
  }

  return {
    checkMerge,
    canMerge: (source, target) => checkMerge(source, target).ok,
    mergeGuestCartToUser,
    mergeUserCarts,
  };
}
