import { Injectable, Logger } from "@nestjs/common";
import { parseJsonObject } from "../common/canonical-json.js";
import { ConfigService } from "../config/config.service.js";
import type { JsonObject } from "../data/index.js";
import { TransportError } from "../errors/index.js";
import type { UpstreamApi, UpstreamCallOptions, UpstreamReply } from "./upstream.types.js";

/**
 * Turns a non-2xx body into an error document. JSON bodies that already carry
 * an error pass through unchanged; anything else is wrapped as a proxy_error.
 */
export function normalizeErrorBody(status: number, text: string): string {
  const parsed = parseJsonObject(text);
  if (parsed && parsed["error"] !== undefined && parsed["error"] !== null) {
    return text.trim();
  }
  return JSON.stringify({
    error: {
      type: "proxy_error",
      message: text,
      code: `HTTP_${status}`,
    },
  });
}

/**
 * Abort controller that fires after `timeoutMs` of inactivity, or when the
 * caller's signal aborts. `touch()` restarts the idle window.
 */
class IdleDeadline {
  readonly controller = new AbortController();
  timedOut = false;
  private timer: NodeJS.Timeout | undefined;

  constructor(
    private readonly timeoutMs: number,
    private readonly parent?: AbortSignal,
  ) {
    if (parent?.aborted) {
      this.controller.abort(parent.reason);
    } else {
      parent?.addEventListener("abort", this.onParentAbort, { once: true });
    }
    this.touch();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelledByCaller(): boolean {
    return this.parent?.aborted ?? false;
  }

  touch(): void {
    clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timedOut = true;
      this.controller.abort(new Error("Upstream request timed out"));
    }, this.timeoutMs);
  }

  clear(): void {
    clearTimeout(this.timer);
    this.parent?.removeEventListener("abort", this.onParentAbort);
  }

  private readonly onParentAbort = (): void => {
    this.controller.abort(this.parent?.reason);
  };
}

@Injectable()
export class UpstreamClient implements UpstreamApi {
  private readonly logger = new Logger(UpstreamClient.name);

  constructor(private readonly configService: ConfigService) {}

  async createResponse(
    apiKey: string,
    payload: JsonObject,
    options: UpstreamCallOptions = {},
  ): Promise<UpstreamReply> {
    const body = JSON.stringify({ ...payload, stream: false });
    return this.request("POST", "/responses", apiKey, body, options.signal);
  }

  async *streamResponse(
    apiKey: string,
    payload: JsonObject,
    options: UpstreamCallOptions = {},
  ): AsyncGenerator<string> {
    const deadline = new IdleDeadline(this.configService.get("upstreamTimeout"), options.signal);
    try {
      const response = await this.send(
        "POST",
        "/responses",
        apiKey,
        JSON.stringify({ ...payload, stream: true }),
        deadline,
      );

      if (!response.ok) {
        const text = await this.readText(response, deadline);
        yield normalizeErrorBody(response.status, text);
        return;
      }
      if (!response.body) {
        throw new TransportError("connect", "Upstream returned an empty event stream");
      }

      for await (const line of this.readLines(response.body, deadline)) {
        if (line.startsWith("data:")) {
          yield line;
        }
      }
    } finally {
      deadline.clear();
    }
  }

  async retrieveResponse(apiKey: string, responseId: string): Promise<UpstreamReply> {
    return this.request("GET", `/responses/${encodeURIComponent(responseId)}`, apiKey);
  }

  private async request(
    method: "GET" | "POST",
    path: string,
    apiKey: string,
    body?: string,
    signal?: AbortSignal,
  ): Promise<UpstreamReply> {
    const deadline = new IdleDeadline(this.configService.get("upstreamTimeout"), signal);
    try {
      const response = await this.send(method, path, apiKey, body, deadline);
      const text = await this.readText(response, deadline);
      return {
        status: response.status,
        body: response.ok ? text : normalizeErrorBody(response.status, text),
      };
    } finally {
      deadline.clear();
    }
  }

  private async send(
    method: "GET" | "POST",
    path: string,
    apiKey: string,
    body: string | undefined,
    deadline: IdleDeadline,
  ): Promise<Response> {
    const headers: Record<string, string> = { Authorization: `Bearer ${apiKey}` };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }
    try {
      return await fetch(`${this.configService.get("upstreamBaseUrl")}${path}`, {
        method,
        headers,
        body,
        signal: deadline.signal,
      });
    } catch (error) {
      throw this.translateFailure(error, deadline);
    }
  }

  private async readText(response: Response, deadline: IdleDeadline): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      throw this.translateFailure(error, deadline);
    }
  }

  private async *readLines(
    body: NonNullable<Response["body"]>,
    deadline: IdleDeadline,
  ): AsyncGenerator<string> {
    const reader = body.getReader();
    const decoder = new TextDecoder();
    let buffer = "";
    try {
      while (true) {
        const chunk = await reader.read().catch((error: unknown) => {
          throw this.translateFailure(error, deadline);
        });
        if (chunk.done) break;
        deadline.touch();
        buffer += decoder.decode(chunk.value, { stream: true });
        let newline = buffer.indexOf("\n");
        while (newline !== -1) {
          yield buffer.slice(0, newline).replace(/\r$/, "");
          buffer = buffer.slice(newline + 1);
          newline = buffer.indexOf("\n");
        }
      }
      buffer += decoder.decode();
      if (buffer.length > 0) {
        yield buffer.replace(/\r$/, "");
      }
    } finally {
      // Releases the socket when the consumer stops early
      await reader.cancel().catch((error: unknown) => {
        this.logger.debug(`Reader cancel failed: ${String(error)}`);
      });
    }
  }

  private translateFailure(error: unknown, deadline: IdleDeadline): unknown {
    if (error instanceof TransportError) return error;
    if (deadline.timedOut) {
      this.logger.error("Upstream request timed out");
      return new TransportError("timeout", "Upstream API request timed out");
    }
    if (deadline.cancelledByCaller) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`Upstream request error: ${message}`);
    return new TransportError("connect", `Error connecting to upstream API: ${message}`);
  }
}
