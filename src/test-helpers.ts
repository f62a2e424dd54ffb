import { Duplex } from "node:stream";
import { vi } from "vitest";
import type { ClientConfig } from "./config/client-config.js";
import type { LinkLogger } from "./link/link-worker.js";
import type { LinkAccess } from "./server.js";
import type { Color, LinkSnapshot } from "./types/protocol.js";
import { BLACK, createColor } from "./color/color.js";
import { encodeFrame, encodeFrameHeader } from "./link/frame-codec.js";

/**
 * Two connected in-memory duplex streams: bytes written to one side are
 * readable on the other. Stands in for a TCP socket and its remote peer.
 */
export function createDuplexPair(): [Duplex, Duplex] {
  let left: Duplex | null = null;
  let right: Duplex | null = null;

  function makeSide(peer: () => Duplex | null): Duplex {
    return new Duplex({
      read() {},
      write(chunk: Buffer, _encoding, callback) {
        const other = peer();
        if (other === null || other.destroyed) {
          callback(new Error("peer closed"));
          return;
        }
        other.push(chunk);
        callback();
      },
      final(callback) {
        peer()?.push(null);
        callback();
      },
    });
  }

  left = makeSide(() => right);
  right = makeSide(() => left);
  return [left, right];
}

/** Collects frames the client wrote, as decoded payloads */
export function collectFrames(stream: Duplex): string[] {
  const frames: string[] = [];
  let buffered = Buffer.alloc(0);

  stream.on("data", (chunk: Buffer) => {
    buffered = Buffer.concat([buffered, chunk]);
    while (buffered.length >= 4) {
      const length = buffered.readInt32BE(0);
      const size = Math.max(length, 0);
      if (buffered.length < 4 + size) break;
      frames.push(buffered.subarray(4, 4 + size).toString("utf-8"));
      buffered = buffered.subarray(4 + size);
    }
  });

  return frames;
}

/** Writes a frame from the remote side of a duplex pair */
export function sendFrame(remote: Duplex, payload: string): void {
  remote.write(encodeFrame(payload));
}

export function sendDisconnectSignal(remote: Duplex): void {
  const header = Buffer.alloc(4);
  header.writeInt32BE(-1, 0);
  remote.write(header);
}

export function sendEmptyFrame(remote: Duplex): void {
  remote.write(encodeFrameHeader(0));
}

export function createSilentLogger(): LinkLogger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function createTestConfig(overrides: Partial<ClientConfig> = {}): ClientConfig {
  return {
    remote: { host: "127.0.0.1", port: 20002 },
    connectTimeoutMs: 5_000,
    sendIntervalMs: 1_000,
    retryDelayMs: 50,
    requestDepthBits: 8,
    shapeColorPriority: "first",
    xmlLogPath: null,
    port: 0,
    host: "127.0.0.1",
    portRangeSize: 10,
    logLevel: "silent",
    ...overrides,
  };
}

export function createStubLink(
  overrides: Partial<LinkSnapshot> = {},
): LinkAccess & { requested: Color[] } {
  const requested: Color[] = [];
  let snapshot: LinkSnapshot = {
    connected: true,
    shapes: [],
    measuredColor: BLACK,
    requestedColor: BLACK,
    lastMeasurement: null,
    lastError: null,
    fault: null,
    ...overrides,
  };

  return {
    remote: "127.0.0.1:20002",
    requested,
    read: () => snapshot,
    setRequestedColor: (color) => {
      const checked = createColor(color.red, color.green, color.blue, color.depthBits);
      requested.push(checked);
      snapshot = { ...snapshot, requestedColor: checked };
    },
  };
}
