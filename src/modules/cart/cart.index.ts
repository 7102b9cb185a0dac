/**
 * Cart Module Public API
 * Exports the module's public interface following hexagonal architecture
 */
export {
  assembleCartModule,
  createCartHttpAdapter,
  createCartModule,
  type CartCollaborators,
  type CartModule,
  type CartModuleConfig,
  type CartPort,
} from "./cart.module.js";
