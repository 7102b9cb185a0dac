/**
 * Outbound Port - Stock reservations held by cart lines
 */

export type InventoryRequest = {
  productId: string;
  variantId: string | null;
  quantity: number;
};

export interface InventoryPort {
  reserve(request: InventoryRequest): Promise<void>;
  release(request: InventoryRequest): Promise<void>;
}
