import type { JsonObject } from "../data/index.js";

export const UPSTREAM_API = Symbol("UPSTREAM_API");

export interface UpstreamReply {
  status: number;
  /** Raw body text. Non-2xx bodies are normalized to an `{"error": ...}` document. */
  body: string;
}

export interface UpstreamCallOptions {
  signal?: AbortSignal;
}

/**
 * The upstream Responses API. One attempt per call, no retries.
 */
export interface UpstreamApi {
  createResponse(apiKey: string, payload: JsonObject, options?: UpstreamCallOptions): Promise<UpstreamReply>;
  /**
   * Yields each `data:` line of the event stream as it arrives. A non-2xx reply
   * yields a single normalized JSON error document instead.
   */
  streamResponse(apiKey: string, payload: JsonObject, options?: UpstreamCallOptions): AsyncIterable<string>;
  retrieveResponse(apiKey: string, responseId: string): Promise<UpstreamReply>;
}
