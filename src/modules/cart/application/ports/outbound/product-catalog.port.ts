/**
 * Outbound Port - Product snapshots from the catalog
 */

import { z } from "zod";

export const ProductSnapshotSchema = z.object({
  productId: z.string(),
  name: z.string(),
  price: z.number().nonnegative(),
  stockQuantity: z.number().int().nonnegative(),
  category: z.string().nullable(),
  available: z.boolean(),
});

export type ProductSnapshot = z.infer<typeof ProductSnapshotSchema>;

export interface ProductCatalogPort {
  getProduct(productId: string): Promise<ProductSnapshot | null>;
}
