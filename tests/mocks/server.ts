import { setupServer } from "msw/node";

export const UPSTREAM = "http://upstream.test/v1";

// Handlers are registered per test with server.use()
export const server = setupServer();

/** A ReadableStream that emits the given chunks as UTF-8 and closes. */
export function textStream(chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
}
