export * from "./config/index.js";
export * from "./contributor/index.js";
export * from "./gate/index.js";
export * from "./logging/index.js";
export * from "./platform/index.js";
export * from "./reconcile/index.js";
export * from "./signature/index.js";
export { startServer } from "./server/index.js";
export type { ServerHandle, ServerOptions } from "./server/index.js";
export {
  dispatchEvent,
  handleWebhook,
  signPayload,
  verifySignature,
} from "./server/webhook.js";
export type { WebhookOptions } from "./server/webhook.js";
