import type { Duplex } from "node:stream";
import { createFrameReader, writeFrame } from "./frame-codec.js";

/**
 * Exclusive handle to the instrument socket. Writes run one at a time in
 * call order (write-then-release) and reads are single-consumer, so the two
 * worker loops never interleave partial frames.
 */
export interface LinkChannel {
  readonly send: (payload: string) => Promise<void>;
  readonly receive: () => Promise<string | null>;
  readonly close: () => void;
}

export function createLinkChannel(socket: Duplex): LinkChannel {
  const reader = createFrameReader(socket);
  let writeChain: Promise<void> = Promise.resolve();
  let closed = false;

  return {
    send(payload: string): Promise<void> {
      const next = writeChain.then(() => writeFrame(socket, payload));
      writeChain = next.then(
        () => undefined,
        () => undefined,
      );
      return next;
    },

    receive(): Promise<string | null> {
      return reader.readFrame();
    },

    close(): void {
      if (closed) return;
      closed = true;
      // Pending reads fail with ConnectionClosed once the socket emits "close"
      socket.destroy();
    },
  };
}
