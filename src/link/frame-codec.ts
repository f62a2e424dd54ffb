import type { Readable, Writable } from "node:stream";
import { LinkError, describeError } from "./errors.js";

const HEADER_BYTES = 4;

/** Largest payload a signed 32-bit length header can announce */
export const MAX_FRAME_LENGTH = 0x7fffffff;

export interface FrameReader {
  /**
   * Resolves with the next payload, `""` for a zero-length frame, or `null`
   * when the remote sent a negative length (end of communication).
   */
  readonly readFrame: () => Promise<string | null>;
}

export function encodeFrameHeader(length: number): Buffer {
  if (!Number.isInteger(length) || length < 0 || length > MAX_FRAME_LENGTH) {
    throw new LinkError(
      "PayloadTooLarge",
      `Payload of ${length} bytes does not fit a 4-byte length header`,
    );
  }

  const header = Buffer.alloc(HEADER_BYTES);
  header.writeInt32BE(length, 0);
  return header;
}

export function encodeFrame(payload: string): Buffer {
  const body = Buffer.from(payload, "utf-8");
  return Buffer.concat([encodeFrameHeader(body.length), body]);
}

/** Writes one frame and resolves once the stream has flushed it */
export function writeFrame(stream: Writable, payload: string): Promise<void> {
  const frame = encodeFrame(payload);

  return new Promise((resolve, reject) => {
    stream.write(frame, (err) => {
      if (err) {
        reject(new LinkError("SocketError", `Frame write failed: ${err.message}`, { cause: err }));
        return;
      }
      resolve();
    });
  });
}

export function createFrameReader(stream: Readable): FrameReader {
  const decoder = new TextDecoder("utf-8", { fatal: true });
  let buffered: Buffer = Buffer.alloc(0);
  let ended = false;
  let failure: Error | null = null;
  let wake: (() => void) | null = null;
  let readChain: Promise<unknown> = Promise.resolve();

  function notify(): void {
    const pending = wake;
    wake = null;
    pending?.();
  }

  function onData(chunk: Buffer | string): void {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk;
    buffered = buffered.length === 0 ? bytes : Buffer.concat([buffered, bytes]);
    notify();
  }

  function onEnd(): void {
    ended = true;
    notify();
  }

  function onError(err: Error): void {
    failure = err;
    notify();
  }

  stream.on("data", onData);
  stream.on("end", onEnd);
  stream.on("close", onEnd);
  stream.on("error", onError);

  async function waitForBytes(count: number): Promise<void> {
    while (buffered.length < count) {
      if (failure !== null) {
        throw new LinkError("SocketError", `Socket error: ${describeError(failure)}`, {
          cause: failure,
        });
      }
      if (ended) {
        throw new LinkError(
          "ConnectionClosed",
          `Connection closed with ${buffered.length} of ${count} bytes received`,
        );
      }
      await new Promise<void>((resolve) => {
        wake = resolve;
      });
    }
  }

  function take(count: number): Buffer {
    const chunk = buffered.subarray(0, count);
    buffered = buffered.subarray(count);
    return chunk;
  }

  async function readOne(): Promise<string | null> {
    await waitForBytes(HEADER_BYTES);
    const length = take(HEADER_BYTES).readInt32BE(0);

    if (length < 0) {
      return null;
    }
    if (length === 0) {
      return "";
    }

    await waitForBytes(length);
    const payload = take(length);

    try {
      return decoder.decode(payload);
    } catch (err: unknown) {
      throw new LinkError("InvalidPayload", `Frame of ${length} bytes is not valid UTF-8`, {
        cause: err,
      });
    }
  }

  return {
    readFrame(): Promise<string | null> {
      // Reads queue behind each other so a frame is never split between callers
      const next = readChain.then(readOne);
      readChain = next.then(
        () => undefined,
        () => undefined,
      );
      return next;
    },
  };
}
