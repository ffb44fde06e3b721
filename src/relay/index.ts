export { RelayModule } from "./relay.module.js";
export {
  type RelayContext,
  type RelayReply,
  RelayService,
  type UpstreamHealth,
  type UpstreamHealthStatus,
} from "./relay.service.js";
export { type RateRequest, RateRequestSchema, type ResponsesRequest, ResponsesRequestSchema } from "./relay.schema.js";
export { classifyErrorField, type ErrorFieldState, frameEvent, StreamObserver, streamingErrorEvent } from "./stream-observer.js";
