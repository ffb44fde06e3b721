import { type EventEmitter, once } from "node:events";

/** The part of a writable HTTP response the relay writes frames to. */
export interface FrameSink extends EventEmitter {
  write(chunk: string): boolean;
}

/**
 * Writes each frame and waits for `drain` whenever the sink's buffer is full,
 * so a slow caller also slows reads from upstream. Aborting the signal ends
 * the wait with an AbortError.
 */
export async function writeFrames(
  frames: AsyncIterable<string>,
  sink: FrameSink,
  signal: AbortSignal,
): Promise<void> {
  for await (const frame of frames) {
    if (signal.aborted) break;
    if (!sink.write(frame)) {
      await once(sink, "drain", { signal });
    }
  }
}
