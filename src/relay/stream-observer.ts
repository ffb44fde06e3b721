import { isPlainObject, parseJsonObject } from "../common/canonical-json.js";
import type { JsonObject } from "../data/index.js";

/**
 * Upstream documents may carry `"error": null` on success, so the field has
 * three states and only `present` means failure.
 */
export type ErrorFieldState = "absent" | "null" | "present";

export function classifyErrorField(document: JsonObject): ErrorFieldState {
  if (!Object.hasOwn(document, "error")) return "absent";
  return document["error"] === null || document["error"] === undefined ? "null" : "present";
}

const TERMINAL_ERROR_EVENTS = new Set(["error", "response.failed"]);

/**
 * Watches relayed stream lines for the bookkeeping the ledger needs: the
 * final response object, its usage block and id, and any error event.
 */
export class StreamObserver {
  response: JsonObject | null = null;
  responseId: string | null = null;
  usage: unknown = null;
  error: JsonObject | null = null;
  malformedEvents = 0;

  observe(line: string): void {
    if (line.startsWith("{")) {
      this.observeDocument(line);
    } else if (line.startsWith("data:")) {
      this.observeEvent(line.slice("data:".length).trim());
    }
  }

  get failed(): boolean {
    return this.error !== null;
  }

  // Raw JSON documents only appear when upstream answered with an error status
  private observeDocument(text: string): void {
    const document = parseJsonObject(text);
    if (document && classifyErrorField(document) === "present") {
      this.error = document;
    }
  }

  private observeEvent(data: string): void {
    if (data === "" || data === "[DONE]") return;
    const event = parseJsonObject(data);
    if (!event) {
      this.malformedEvents++;
      return;
    }

    const type = event["type"];
    if (type === "response.completed" || type === "response.failed") {
      this.captureResponse(event["response"]);
    }
    if (typeof type === "string" && TERMINAL_ERROR_EVENTS.has(type)) {
      this.error = event;
    } else if (classifyErrorField(event) === "present") {
      this.error = event;
    }
  }

  private captureResponse(response: unknown): void {
    if (!isPlainObject(response)) return;
    this.response = response;
    this.usage = response["usage"] ?? null;
    const id = response["id"];
    if (typeof id === "string" && id.length > 0) {
      this.responseId = id;
    }
  }
}

/** SSE framing for a relayed line; bare JSON documents get a `data:` prefix. */
export function frameEvent(line: string): string {
  return line.startsWith("data:") ? `${line}\n\n` : `data: ${line}\n\n`;
}

export function streamingErrorEvent(message: string, requestId: string): string {
  return frameEvent(
    JSON.stringify({
      error: {
        type: "streaming_error",
        message,
        code: "STREAM_ERROR",
        request_id: requestId,
      },
    }),
  );
}
