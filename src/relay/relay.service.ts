import { Inject, Injectable, Logger } from "@nestjs/common";
import type { TenantContext } from "../auth/index.js";
import { isPlainObject, parseJsonObject } from "../common/canonical-json.js";
import { ConversationService } from "../conversation/index.js";
import { CredentialResolver } from "../credentials/index.js";
import type { Credential, JsonObject, Principal, RequestRecord, Session } from "../data/index.js";
import { MalformedUpstreamResponseError, RequestNotFoundError } from "../errors/index.js";
import { parseUsage, RequestLedger } from "../ledger/index.js";
import { PersonasService } from "../personas/index.js";
import { UPSTREAM_API, type UpstreamApi } from "../upstream/index.js";
import type { ResponsesRequest } from "./relay.schema.js";
import {
  classifyErrorField,
  frameEvent,
  StreamObserver,
  streamingErrorEvent,
} from "./stream-observer.js";

export interface RelayContext {
  request: RequestRecord;
  session: Session;
  principal: Principal;
  credential: Credential;
  /** Decrypted upstream secret */
  secret: string;
  /** Body sent upstream: persona applied, persona_id and nulls removed */
  payload: JsonObject;
  model: string;
  stream: boolean;
}

export interface RelayReply {
  status: number;
  body: string;
}

export type UpstreamHealthStatus = "healthy" | "degraded" | "unhealthy";

export interface UpstreamHealth {
  status: UpstreamHealthStatus;
  message: string;
  timestamp: string;
}

const HEALTH_CHECK_REQUEST = { model: "gpt-4o-mini", input: "Hello", max_output_tokens: 16, temperature: 0 };

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function upstreamPayload(body: ResponsesRequest): JsonObject {
  const payload: JsonObject = {};
  for (const [key, value] of Object.entries(body)) {
    if (key === "persona_id" || value === null || value === undefined) continue;
    payload[key] = value;
  }
  return payload;
}

/**
 * Relays Responses API calls and keeps the request ledger in step with what
 * upstream reported. Ledger write failures are logged and never change what
 * the caller receives.
 */
@Injectable()
export class RelayService {
  private readonly logger = new Logger(RelayService.name);

  constructor(
    @Inject(UPSTREAM_API) private readonly upstream: UpstreamApi,
    private readonly conversation: ConversationService,
    private readonly credentials: CredentialResolver,
    private readonly personas: PersonasService,
    private readonly ledger: RequestLedger,
  ) {}

  async prepare(
    tenant: TenantContext,
    externalUserId: string,
    sessionToken: string | undefined,
    body: ResponsesRequest,
  ): Promise<RelayContext> {
    const principal = await this.conversation.getOrCreatePrincipal(tenant.id, externalUserId);
    const { credential, secret } = await this.credentials.resolveForRequest(
      tenant.id,
      principal.id,
      tenant.credential,
    );
    const { session } = await this.conversation.getOrCreateSession(
      tenant.id,
      externalUserId,
      sessionToken,
    );

    let effective = body;
    let personaId: string | null = null;
    if (body.persona_id) {
      const persona = await this.personas.resolveForRequest(tenant.id, body.persona_id, externalUserId);
      effective = { ...body, instructions: persona.content };
      personaId = persona.id;
      this.logger.log(`Using persona ${persona.name} for request`);
    }

    const request = await this.ledger.open({
      organizationId: tenant.id,
      sessionId: session.id,
      principalId: principal.id,
      credentialId: credential.id,
      personaId,
      model: effective.model,
      requestPayload: { ...effective },
    });

    return {
      request,
      session,
      principal,
      credential,
      secret,
      payload: upstreamPayload(effective),
      model: effective.model,
      stream: effective.stream === true,
    };
  }

  /**
   * One upstream call, whole body returned unmodified. A 2xx body carrying an
   * error is answered with 400; upstream error statuses pass through.
   */
  async relayBuffered(context: RelayContext, signal?: AbortSignal): Promise<RelayReply> {
    const { requestId } = context.request;

    let reply: RelayReply;
    try {
      reply = await this.upstream.createResponse(context.secret, context.payload, { signal });
    } catch (error) {
      const status = signal?.aborted ? "cancelled" : "failed";
      await this.bookkeeping(requestId, () =>
        this.ledger.finalize(requestId, status, { errorMessage: errorText(error) }),
      );
      throw error;
    }

    const document = parseJsonObject(reply.body);
    if (!document) {
      const message = "upstream body is not a JSON object";
      await this.bookkeeping(requestId, () =>
        this.ledger.finalize(requestId, "failed", { errorMessage: message }),
      );
      throw new MalformedUpstreamResponseError(message);
    }

    if (classifyErrorField(document) === "present" || !isSuccess(reply.status)) {
      await this.bookkeeping(requestId, () =>
        this.ledger.finalize(requestId, "failed", {
          errorMessage: JSON.stringify(document["error"] ?? document),
        }),
      );
      return { status: isSuccess(reply.status) ? 400 : reply.status, body: reply.body };
    }

    const responseId = document["id"];
    if (typeof responseId === "string" && responseId.length > 0) {
      await this.bookkeeping(requestId, () => this.ledger.setResponseId(requestId, responseId));
    }
    const usage = document["usage"] === undefined ? null : parseUsage(document["usage"]);
    if (usage) {
      await this.bookkeeping(requestId, () =>
        this.ledger.recordUsage(context.request, usage, context.model),
      );
    }
    await this.bookkeeping(requestId, () =>
      this.ledger.finalize(requestId, "completed", { responsePayload: document }),
    );
    return reply;
  }

  /**
   * Relays the upstream event stream frame by frame. The sequence always ends
   * with upstream's own final event or a synthesized streaming_error event,
   * except when the caller went away.
   */
  async *stream(context: RelayContext, signal?: AbortSignal): AsyncGenerator<string> {
    const { requestId } = context.request;
    const observer = new StreamObserver();
    let settled = false;

    try {
      for await (const line of this.upstream.streamResponse(context.secret, context.payload, { signal })) {
        observer.observe(line);
        yield frameEvent(line);
      }
      settled = true;
      if (observer.malformedEvents > 0) {
        this.logger.warn(`${observer.malformedEvents} unparseable events in request ${requestId}`);
      }
      await this.settle(context, observer);
    } catch (error) {
      settled = true;
      if (signal?.aborted) {
        this.logger.log(`Caller disconnected from request ${requestId}`);
        await this.cancel(context, observer);
        return;
      }
      const message = errorText(error);
      this.logger.error(`Streaming error for request ${requestId}: ${message}`);
      await this.persistResponseId(requestId, observer);
      await this.bookkeeping(requestId, () =>
        this.ledger.finalize(requestId, "failed", { errorMessage: message }),
      );
      yield streamingErrorEvent(message, requestId);
    } finally {
      // Reached without settling when the consumer stops iterating early
      if (!settled) {
        await this.cancel(context, observer);
      }
    }
  }

  /**
   * Fetches a stored upstream response. Known request ids and response ids
   * use the key the request was made with; other ids go through the
   * organization-wide default key.
   */
  async retrieve(tenant: TenantContext, reference: string): Promise<RelayReply> {
    const request = await this.ledger.findByReference(reference);
    if (!request) {
      const { secret } = await this.credentials.resolveDefault(tenant.id);
      return this.upstream.retrieveResponse(secret, reference);
    }
    const owned = await this.ledger.getOwned(tenant.id, reference);
    if (!owned.responseId) {
      throw new RequestNotFoundError(reference);
    }
    const { secret } = await this.credentials.resolveById(tenant.id, owned.credentialId);
    return this.upstream.retrieveResponse(secret, owned.responseId);
  }

  async checkUpstreamHealth(tenant: TenantContext): Promise<UpstreamHealth> {
    const timestamp = new Date().toISOString();
    let secret: string;
    try {
      ({ secret } = await this.credentials.resolveDefault(tenant.id));
    } catch (error) {
      return { status: "degraded", message: errorText(error), timestamp };
    }

    try {
      const reply = await this.upstream.createResponse(secret, HEALTH_CHECK_REQUEST);
      const document = parseJsonObject(reply.body);
      if (!document) {
        return { status: "degraded", message: "Invalid JSON response from upstream API", timestamp };
      }
      if (classifyErrorField(document) === "present") {
        const error = document["error"];
        const detail = isPlainObject(error) ? error["message"] : error;
        return {
          status: "degraded",
          message: `Upstream API error: ${typeof detail === "string" ? detail : "Unknown error"}`,
          timestamp,
        };
      }
      return { status: "healthy", message: "Upstream API is responding correctly", timestamp };
    } catch (error) {
      this.logger.error(`Upstream health check failed: ${errorText(error)}`);
      return { status: "unhealthy", message: errorText(error), timestamp };
    }
  }

  private async settle(context: RelayContext, observer: StreamObserver): Promise<void> {
    const { requestId } = context.request;
    await this.persistResponseId(requestId, observer);

    if (observer.error) {
      const error = observer.error;
      await this.bookkeeping(requestId, () =>
        this.ledger.finalize(requestId, "failed", {
          errorMessage: JSON.stringify(error),
          responsePayload: observer.response ?? undefined,
        }),
      );
      return;
    }

    const usage = observer.usage === null ? null : parseUsage(observer.usage);
    if (usage) {
      await this.bookkeeping(requestId, () =>
        this.ledger.recordUsage(context.request, usage, context.model),
      );
    }
    await this.bookkeeping(requestId, () =>
      this.ledger.finalize(requestId, "completed", { responsePayload: observer.response }),
    );
  }

  private async cancel(context: RelayContext, observer: StreamObserver): Promise<void> {
    const { requestId } = context.request;
    await this.persistResponseId(requestId, observer);
    await this.bookkeeping(requestId, () =>
      this.ledger.finalize(requestId, "cancelled", {
        errorMessage: "Client disconnected before the stream completed",
      }),
    );
  }

  private async persistResponseId(requestId: string, observer: StreamObserver): Promise<void> {
    const responseId = observer.responseId;
    if (responseId) {
      await this.bookkeeping(requestId, () => this.ledger.setResponseId(requestId, responseId));
    }
  }

  private async bookkeeping(requestId: string, write: () => Promise<unknown>): Promise<void> {
    try {
      await write();
    } catch (error) {
      this.logger.error(`Ledger update failed for request ${requestId}: ${errorText(error)}`);
    }
  }
}
