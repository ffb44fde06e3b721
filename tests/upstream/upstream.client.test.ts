import { delay, http, HttpResponse } from "msw";
import { afterAll, afterEach, beforeAll, describe, expect, it } from "vitest";
import { TransportError } from "../../src/errors/index.js";
import { normalizeErrorBody, UpstreamClient } from "../../src/upstream/upstream.client.js";
import { createTestConfig } from "../helpers.js";
import { server, textStream, UPSTREAM } from "../mocks/server.js";

async function collect(lines: AsyncIterable<string>): Promise<string[]> {
  const result: string[] = [];
  for await (const line of lines) {
    result.push(line);
  }
  return result;
}

describe("UpstreamClient", () => {
  beforeAll(() => server.listen({ onUnhandledRequest: "error" }));
  afterEach(() => server.resetHandlers());
  afterAll(() => server.close());

  const client = new UpstreamClient(createTestConfig());

  describe("createResponse", () => {
    it("should send a bearer-authenticated non-streamed request", async () => {
      let authorization: string | null = null;
      let sent: unknown = null;
      server.use(
        http.post(`${UPSTREAM}/responses`, async ({ request }) => {
          authorization = request.headers.get("authorization");
          sent = await request.json();
          return HttpResponse.json({ id: "resp_1", output: [] });
        }),
      );

      const reply = await client.createResponse("sk-test-upstream", { model: "gpt-4o", input: "Hi" });

      expect(authorization).toBe("Bearer sk-test-upstream");
      expect(sent).toEqual({ model: "gpt-4o", input: "Hi", stream: false });
      expect(reply.status).toBe(200);
      expect(JSON.parse(reply.body)).toEqual({ id: "resp_1", output: [] });
    });

    it("should keep upstream JSON error bodies", async () => {
      server.use(
        http.post(`${UPSTREAM}/responses`, () =>
          HttpResponse.json({ error: { message: "Invalid model", type: "invalid_request_error" } }, { status: 400 }),
        ),
      );

      const reply = await client.createResponse("sk-test-upstream", { model: "nope", input: "Hi" });

      expect(reply.status).toBe(400);
      expect(JSON.parse(reply.body)).toEqual({
        error: { message: "Invalid model", type: "invalid_request_error" },
      });
    });

    it("should wrap non-JSON error bodies", async () => {
      server.use(
        http.post(`${UPSTREAM}/responses`, () => new HttpResponse("Bad Gateway", { status: 502 })),
      );

      const reply = await client.createResponse("sk-test-upstream", { model: "gpt-4o", input: "Hi" });

      expect(reply.status).toBe(502);
      expect(JSON.parse(reply.body)).toEqual({
        error: { type: "proxy_error", message: "Bad Gateway", code: "HTTP_502" },
      });
    });

    it("should raise a connect TransportError when the connection fails", async () => {
      server.use(http.post(`${UPSTREAM}/responses`, () => HttpResponse.error()));

      const error = await client
        .createResponse("sk-test-upstream", { model: "gpt-4o", input: "Hi" })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error instanceof TransportError && error.getStatus()).toBe(502);
    });

    it("should raise a timeout TransportError when upstream stalls", async () => {
      const slowClient = new UpstreamClient(createTestConfig({ UPSTREAM_TIMEOUT: "1s" }));
      server.use(
        http.post(`${UPSTREAM}/responses`, async () => {
          await delay("infinite");
          return HttpResponse.json({});
        }),
      );

      const error = await slowClient
        .createResponse("sk-test-upstream", { model: "gpt-4o", input: "Hi" })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error instanceof TransportError && error.getStatus()).toBe(504);
    });
  });

  describe("streamResponse", () => {
    it("should yield data lines and reassemble lines split across chunks", async () => {
      let sent: unknown = null;
      server.use(
        http.post(`${UPSTREAM}/responses`, async ({ request }) => {
          sent = await request.json();
          return new HttpResponse(
            textStream([
              "event: response.created\n",
              'data: {"type":"response.cre',
              'ated"}\n\n',
              'data: {"type":"response.completed"}\r\n\r\n',
            ]),
            { headers: { "Content-Type": "text/event-stream" } },
          );
        }),
      );

      const lines = await collect(
        client.streamResponse("sk-test-upstream", { model: "gpt-4o", input: "Hi" }),
      );

      expect(sent).toEqual({ model: "gpt-4o", input: "Hi", stream: true });
      expect(lines).toEqual(['data: {"type":"response.created"}', 'data: {"type":"response.completed"}']);
    });

    it("should yield a single error document for a failed status", async () => {
      server.use(
        http.post(`${UPSTREAM}/responses`, () =>
          HttpResponse.json({ error: { message: "Rate limit", type: "requests" } }, { status: 429 }),
        ),
      );

      const lines = await collect(
        client.streamResponse("sk-test-upstream", { model: "gpt-4o", input: "Hi" }),
      );

      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0] ?? "")).toEqual({ error: { message: "Rate limit", type: "requests" } });
    });
  });

  describe("retrieveResponse", () => {
    it("should fetch a stored response by id", async () => {
      server.use(
        http.get(`${UPSTREAM}/responses/:id`, ({ params }) =>
          HttpResponse.json({ id: params["id"], status: "completed" }),
        ),
      );

      const reply = await client.retrieveResponse("sk-test-upstream", "resp_42");

      expect(reply.status).toBe(200);
      expect(JSON.parse(reply.body)).toEqual({ id: "resp_42", status: "completed" });
    });
  });
});

describe("normalizeErrorBody", () => {
  it("should pass through documents carrying an error", () => {
    expect(normalizeErrorBody(400, ' {"error":{"message":"x"}} ')).toBe('{"error":{"message":"x"}}');
  });

  it("should wrap JSON without an error field", () => {
    expect(JSON.parse(normalizeErrorBody(500, '{"detail":"oops"}'))).toEqual({
      error: { type: "proxy_error", message: '{"detail":"oops"}', code: "HTTP_500" },
    });
  });
});
