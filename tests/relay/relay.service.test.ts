import { beforeEach, describe, expect, it } from "vitest";
import type { TenantContext } from "../../src/auth/index.js";
import { ConversationService } from "../../src/conversation/conversation.service.js";
import { CredentialResolver } from "../../src/credentials/credential-resolver.service.js";
import { CredentialsService } from "../../src/credentials/credentials.service.js";
import { createMemoryRepositories, type JsonObject, type Repositories } from "../../src/data/index.js";
import { RequestLedger } from "../../src/ledger/request-ledger.service.js";
import { PersonasService } from "../../src/personas/personas.service.js";
import { CostEstimator } from "../../src/pricing/cost-estimator.service.js";
import { RelayService } from "../../src/relay/relay.service.js";
import { streamingErrorEvent } from "../../src/relay/stream-observer.js";
import type { UpstreamApi, UpstreamCallOptions, UpstreamReply } from "../../src/upstream/upstream.types.js";
import { TransportError } from "../../src/errors/index.js";
import { CredentialVault } from "../../src/vault/credential-vault.service.js";
import { createTestConfig } from "../helpers.js";

const ORG = "org-1";

class FakeUpstream implements UpstreamApi {
  reply: UpstreamReply = { status: 200, body: "{}" };
  lines: string[] = [];
  failAfterLines: Error | null = null;
  failWith: Error | null = null;
  readonly calls: Array<{ apiKey: string; payload?: JsonObject; responseId?: string }> = [];

  async createResponse(apiKey: string, payload: JsonObject): Promise<UpstreamReply> {
    this.calls.push({ apiKey, payload });
    if (this.failWith) {
      throw this.failWith;
    }
    return this.reply;
  }

  async *streamResponse(
    apiKey: string,
    payload: JsonObject,
    options?: UpstreamCallOptions,
  ): AsyncIterable<string> {
    this.calls.push({ apiKey, payload });
    for (const line of this.lines) {
      yield line;
      if (options?.signal?.aborted) {
        throw new Error("This operation was aborted");
      }
    }
    if (this.failAfterLines) {
      throw this.failAfterLines;
    }
  }

  async retrieveResponse(apiKey: string, responseId: string): Promise<UpstreamReply> {
    this.calls.push({ apiKey, responseId });
    return { status: 200, body: JSON.stringify({ id: responseId }) };
  }
}

async function collect(frames: AsyncIterable<string>): Promise<string[]> {
  const collected: string[] = [];
  for await (const frame of frames) {
    collected.push(frame);
  }
  return collected;
}

describe("RelayService", () => {
  let repositories: Repositories;
  let upstream: FakeUpstream;
  let credentials: CredentialsService;
  let personas: PersonasService;
  let relay: RelayService;
  const tenant: TenantContext = { id: ORG, name: "Acme", credential: null };

  beforeEach(async () => {
    repositories = createMemoryRepositories();
    upstream = new FakeUpstream();
    const vault = new CredentialVault(createTestConfig());
    const conversation = new ConversationService(repositories.principals, repositories.sessions);
    credentials = new CredentialsService(repositories.credentials, vault, conversation);
    personas = new PersonasService(repositories.personas, conversation);
    const ledger = new RequestLedger(repositories.requests, repositories.usage, new CostEstimator());
    relay = new RelayService(
      upstream,
      conversation,
      new CredentialResolver(repositories.credentials, vault),
      personas,
      ledger,
    );
    await credentials.create(ORG, { openai_api_key: "sk-test-default", name: "org-default" });
  });

  async function storedRequest(requestId: string) {
    const request = await repositories.requests.findByRequestId(requestId);
    if (!request) throw new Error(`request ${requestId} was not recorded`);
    return request;
  }

  describe("prepare", () => {
    it("should open a pending request and drop null fields from the payload", async () => {
      const context = await relay.prepare(tenant, "alice", undefined, {
        model: "gpt-4o",
        input: "Hello",
        stream: null,
        instructions: null,
      });

      expect(context.payload).toEqual({ model: "gpt-4o", input: "Hello" });
      expect(context.stream).toBe(false);
      expect(context.secret).toBe("sk-test-default");
      expect(context.session.token).toMatch(/^sess_/);
      expect((await storedRequest(context.request.requestId)).status).toBe("pending");
    });

    it("should replace instructions with the persona content", async () => {
      const persona = await personas.create(ORG, { name: "Pirate", content: "Answer like a pirate." });

      const context = await relay.prepare(tenant, "alice", undefined, {
        model: "gpt-4o",
        input: "Hello",
        instructions: "Be formal.",
        persona_id: persona.id,
      });

      expect(context.payload).toEqual({
        model: "gpt-4o",
        input: "Hello",
        instructions: "Answer like a pirate.",
      });
      expect(context.request.personaId).toBe(persona.id);
    });

    it("should keep the session of a known session token", async () => {
      const first = await relay.prepare(tenant, "alice", undefined, { model: "gpt-4o", input: "Hi" });
      const second = await relay.prepare(tenant, "alice", first.session.token, {
        model: "gpt-4o",
        input: "Again",
      });

      expect(second.session.id).toBe(first.session.id);
      expect(second.request.requestId).not.toBe(first.request.requestId);
    });
  });

  describe("relayBuffered", () => {
    it("should complete a request whose error field is null", async () => {
      const body = JSON.stringify({
        id: "resp_1",
        error: null,
        output: [],
        usage: { input_tokens: 10, output_tokens: 5 },
      });
      upstream.reply = { status: 200, body };
      const context = await relay.prepare(tenant, "alice", undefined, { model: "gpt-4o", input: "Hello" });

      const reply = await relay.relayBuffered(context);

      expect(reply).toEqual({ status: 200, body });
      const stored = await storedRequest(context.request.requestId);
      expect(stored.status).toBe("completed");
      expect(stored.responseId).toBe("resp_1");
      expect((await repositories.usage.findByRequestId(stored.id))?.totalTokens).toBe(15);
    });

    it("should answer 400 when a 2xx body carries an error", async () => {
      const body = JSON.stringify({ id: "resp_2", error: { message: "bad input" } });
      upstream.reply = { status: 200, body };
      const context = await relay.prepare(tenant, "alice", undefined, { model: "gpt-4o", input: "Hello" });

      const reply = await relay.relayBuffered(context);

      expect(reply.status).toBe(400);
      expect(reply.body).toBe(body);
      const stored = await storedRequest(context.request.requestId);
      expect(stored.status).toBe("failed");
      expect(stored.errorMessage).toBe('{"message":"bad input"}');
    });

    it("should pass upstream error statuses through", async () => {
      upstream.reply = { status: 429, body: JSON.stringify({ error: { message: "slow down" } }) };
      const context = await relay.prepare(tenant, "alice", undefined, { model: "gpt-4o", input: "Hello" });

      const reply = await relay.relayBuffered(context);

      expect(reply.status).toBe(429);
      expect((await storedRequest(context.request.requestId)).status).toBe("failed");
    });

    it("should fail the request and rethrow when the upstream cannot be reached", async () => {
      upstream.failWith = new TransportError("connect", "Failed to connect to upstream API: ECONNREFUSED");
      const context = await relay.prepare(tenant, "alice", undefined, { model: "gpt-4o", input: "Hello" });

      await expect(relay.relayBuffered(context)).rejects.toBeInstanceOf(TransportError);

      const stored = await storedRequest(context.request.requestId);
      expect(stored.status).toBe("failed");
      expect(stored.errorMessage).toBe("Failed to connect to upstream API: ECONNREFUSED");
    });

    it("should cancel the request when the caller aborts the upstream call", async () => {
      const controller = new AbortController();
      controller.abort();
      upstream.failWith = new Error("This operation was aborted");
      const context = await relay.prepare(tenant, "alice", undefined, { model: "gpt-4o", input: "Hello" });

      await expect(relay.relayBuffered(context, controller.signal)).rejects.toThrow("This operation was aborted");

      expect((await storedRequest(context.request.requestId)).status).toBe("cancelled");
    });
  });

  describe("stream", () => {
    const created = 'data: {"type":"response.created","response":{"id":"resp_s"}}';
    const completed =
      'data: {"type":"response.completed","response":{"id":"resp_s","usage":{"input_tokens":4,"output_tokens":6}}}';

    it("should relay every event and complete the request", async () => {
      upstream.lines = [created, completed];
      const context = await relay.prepare(tenant, "alice", undefined, {
        model: "gpt-4o",
        input: "Hello",
        stream: true,
      });

      const frames = await collect(relay.stream(context));

      expect(frames).toEqual([`${created}\n\n`, `${completed}\n\n`]);
      const stored = await storedRequest(context.request.requestId);
      expect(stored.status).toBe("completed");
      expect(stored.responseId).toBe("resp_s");
      expect((await repositories.usage.findByRequestId(stored.id))?.totalTokens).toBe(10);
    });

    it("should forward an upstream error event and fail the request", async () => {
      const errorLine = 'data: {"type":"error","message":"boom"}';
      upstream.lines = [created, errorLine];
      const context = await relay.prepare(tenant, "alice", undefined, {
        model: "gpt-4o",
        input: "Hello",
        stream: true,
      });

      const frames = await collect(relay.stream(context));

      expect(frames).toEqual([`${created}\n\n`, `${errorLine}\n\n`]);
      const stored = await storedRequest(context.request.requestId);
      expect(stored.status).toBe("failed");
      expect(stored.errorMessage).toBe('{"type":"error","message":"boom"}');
    });

    it("should end with a streaming_error event when the upstream connection breaks", async () => {
      upstream.lines = [created];
      upstream.failAfterLines = new Error("socket hang up");
      const context = await relay.prepare(tenant, "alice", undefined, {
        model: "gpt-4o",
        input: "Hello",
        stream: true,
      });
      const { requestId } = context.request;

      const frames = await collect(relay.stream(context));

      expect(frames).toEqual([`${created}\n\n`, streamingErrorEvent("socket hang up", requestId)]);
      const stored = await storedRequest(requestId);
      expect(stored.status).toBe("failed");
      expect(stored.errorMessage).toBe("socket hang up");
    });

    it("should keep the response id when the connection breaks after completion", async () => {
      upstream.lines = [completed];
      upstream.failAfterLines = new Error("connection reset");
      const context = await relay.prepare(tenant, "alice", undefined, {
        model: "gpt-4o",
        input: "Hello",
        stream: true,
      });
      const { requestId } = context.request;

      const frames = await collect(relay.stream(context));

      expect(frames).toEqual([`${completed}\n\n`, streamingErrorEvent("connection reset", requestId)]);
      const stored = await storedRequest(requestId);
      expect(stored.status).toBe("failed");
      expect(stored.responseId).toBe("resp_s");
      expect(stored.errorMessage).toBe("connection reset");
    });

    it("should complete without a usage row when response.completed carries no usage", async () => {
      const bare = 'data: {"type":"response.completed","response":{"id":"resp_n","status":"completed"}}';
      upstream.lines = [bare];
      const context = await relay.prepare(tenant, "alice", undefined, {
        model: "gpt-4o",
        input: "Hello",
        stream: true,
      });

      const frames = await collect(relay.stream(context));

      expect(frames).toEqual([`${bare}\n\n`]);
      const stored = await storedRequest(context.request.requestId);
      expect(stored.status).toBe("completed");
      expect(stored.responseId).toBe("resp_n");
      expect(await repositories.usage.findByRequestId(stored.id)).toBeNull();
    });

    it("should cancel the request when the caller aborts mid-stream", async () => {
      upstream.lines = [created, completed];
      const controller = new AbortController();
      const context = await relay.prepare(tenant, "alice", undefined, {
        model: "gpt-4o",
        input: "Hello",
        stream: true,
      });

      const frames: string[] = [];
      for await (const frame of relay.stream(context, controller.signal)) {
        frames.push(frame);
        controller.abort();
      }

      expect(frames).toEqual([`${created}\n\n`]);
      const stored = await storedRequest(context.request.requestId);
      expect(stored.status).toBe("cancelled");
      expect(stored.errorMessage).toBe("Client disconnected before the stream completed");
    });

    it("should cancel the request when the consumer stops early", async () => {
      upstream.lines = [created, completed];
      const context = await relay.prepare(tenant, "alice", undefined, {
        model: "gpt-4o",
        input: "Hello",
        stream: true,
      });

      for await (const frame of relay.stream(context)) {
        expect(frame).toBe(`${created}\n\n`);
        break;
      }

      const stored = await storedRequest(context.request.requestId);
      expect(stored.status).toBe("cancelled");
      expect(stored.errorMessage).toBe("Client disconnected before the stream completed");
    });
  });

  describe("retrieve", () => {
    it("should fetch a recorded response with the key it was made with", async () => {
      await credentials.create(ORG, { openai_api_key: "sk-test-alice", name: "alice-key", user_id: "alice" });
      upstream.reply = { status: 200, body: JSON.stringify({ id: "resp_9", error: null }) };
      const context = await relay.prepare(tenant, "alice", undefined, { model: "gpt-4o", input: "Hello" });
      await relay.relayBuffered(context);

      const reply = await relay.retrieve(tenant, context.request.requestId);

      expect(reply.body).toBe('{"id":"resp_9"}');
      expect(upstream.calls.at(-1)).toEqual({ apiKey: "sk-test-alice", responseId: "resp_9" });
    });

    it("should use the default key for unknown ids", async () => {
      await relay.retrieve(tenant, "resp_elsewhere");

      expect(upstream.calls.at(-1)).toEqual({ apiKey: "sk-test-default", responseId: "resp_elsewhere" });
    });
  });

  describe("checkUpstreamHealth", () => {
    it("should report healthy when the test request succeeds", async () => {
      upstream.reply = { status: 200, body: JSON.stringify({ id: "resp_health", error: null }) };

      const health = await relay.checkUpstreamHealth(tenant);

      expect(health.status).toBe("healthy");
    });

    it("should report degraded with the upstream error message", async () => {
      upstream.reply = { status: 401, body: JSON.stringify({ error: { message: "bad key" } }) };

      const health = await relay.checkUpstreamHealth(tenant);

      expect(health).toMatchObject({ status: "degraded", message: "Upstream API error: bad key" });
    });
  });
});
