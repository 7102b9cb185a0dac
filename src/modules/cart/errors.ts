/**
 * Each module has one errors.ts file. All errors in the module are exported from here.
 */

export class CartNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CartNotFoundError";
  }
}

export class CartInvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CartInvalidInputError";
  }
}

export class CartOwnershipError extends Error {
  constructor(cartId: string, userId: string) {
    super(`Cart ${cartId} does not belong to user ${userId}`);
    this.name = "CartOwnershipError";
  }
}

export class InvalidCartTransitionError extends Error {
  constructor(cartId: string, from: string, to: string) {
    super(`Cart ${cartId} cannot move from ${from} to ${to}`);
    this.name = "InvalidCartTransitionError";
  }
}

export type MergeRejectionReason =
  | "STATUS_NOT_MERGEABLE"
  | "ITEM_LIMIT_EXCEEDED"
  | "VALUE_LIMIT_EXCEEDED"
  | "QUANTITY_CAP_EXCEEDED";

/**
 * A merge precondition does not hold. Retrying will not help.
 */
export class MergeRejectedError extends Error {
  constructor(
    readonly reason: MergeRejectionReason,
    message: string,
  ) {
    super(message);
    this.name = "MergeRejectedError";
  }
}

/**
 * Another writer committed a newer version of the cart first.
 */
export class ConcurrentCartModificationError extends Error {
  readonly retryable = true;

  constructor(cartId: string, expectedVersion: number) {
    super(`Cart ${cartId} changed since version ${expectedVersion}`);
    this.name = "ConcurrentCartModificationError";
  }
}

export class PricingInputUnavailableError extends Error {
  readonly retryable = true;

  constructor(
    readonly input: "tax" | "shipping",
    cause: unknown,
  ) {
    super(`Pricing input unavailable: ${input}`, { cause });
    this.name = "PricingInputUnavailableError";
  }
}
