/**
 * Inventory Service Adapter - Stock reservations over HTTP
 */

import { z } from "zod";
import type { InventoryPort } from "../../../application/ports/outbound/inventory.port.js";
import type { HttpJsonClient } from "./http-json.client.js";

const AckSchema = z.object({ ok: z.boolean() });

export function createInventoryServiceAdapter(
  client: HttpJsonClient,
): InventoryPort {
  return {
    async reserve(request) {
      await client.post("/reservations", request, AckSchema);
    },
    async release(request) {
      await client.post("/reservations/release", request, AckSchema);
    },
  };
}
