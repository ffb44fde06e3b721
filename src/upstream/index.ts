export { normalizeErrorBody, UpstreamClient } from "./upstream.client.js";
export { UpstreamModule } from "./upstream.module.js";
export {
  UPSTREAM_API,
  type UpstreamApi,
  type UpstreamCallOptions,
  type UpstreamReply,
} from "./upstream.types.js";
