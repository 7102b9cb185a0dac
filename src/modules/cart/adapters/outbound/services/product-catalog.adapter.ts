/**
 * Product Catalog Adapter - Product snapshots over HTTP
 */

import {
  ProductSnapshotSchema,
  type ProductCatalogPort,
} from "../../../application/ports/outbound/product-catalog.port.js";
import type { HttpJsonClient } from "./http-json.client.js";

export function createProductCatalogAdapter(
  client: HttpJsonClient,
): ProductCatalogPort {
  return {
    getProduct(productId) {
      return client.get(
        `/products/${encodeURIComponent(productId)}`,
        ProductSnapshotSchema,
      );
    },
  };
}
