export {
  CommunicationBus,
  type CommunicationBusOptions,
  createCommunicationBus,
} from "./communicationBus";
export { IdempotencyGuard } from "./idempotency";
export { InboundStream, type InboundMessage } from "./inboundStream";
export * from "./protocol";
export * from "./types";
