import type { BitDepth, ShapeColorPriority } from "../types/protocol.js";
import { isBitDepth } from "../color/color.js";
import { parseRemoteAddress, type RemoteAddress } from "../link/connection.js";

export interface ClientConfig {
  readonly remote: RemoteAddress;
  readonly connectTimeoutMs: number;
  readonly sendIntervalMs: number;
  readonly retryDelayMs: number;
  readonly requestDepthBits: BitDepth;
  readonly shapeColorPriority: ShapeColorPriority;
  readonly xmlLogPath: string | null;
  readonly port: number;
  readonly host: string;
  readonly portRangeSize: number;
  readonly logLevel: string;
}

const SHAPE_COLOR_PRIORITIES: readonly ShapeColorPriority[] = ["first", "smallest-area"];
const DEFAULT_XML_LOG_PATH = "colourspace_commands.log";

function readIntInRange(name: string, fallback: number, min: number, max: number): number {
  const raw = process.env[name];
  const value = parseInt(raw ?? String(fallback), 10);

  if (!Number.isFinite(value) || value < min || value > max) {
    throw new Error(
      `Invalid ${name}: "${raw}". Must be a number between ${min} and ${max}.`,
    );
  }

  return value;
}

function readShapeColorPriority(): ShapeColorPriority {
  const raw = process.env["SHAPE_COLOR"] ?? "first";
  const priority = SHAPE_COLOR_PRIORITIES.find((p) => p === raw);

  if (priority === undefined) {
    throw new Error(
      `Invalid SHAPE_COLOR: "${raw}". Must be one of: ${SHAPE_COLOR_PRIORITIES.join(", ")}`,
    );
  }

  return priority;
}

function readRequestDepth(): BitDepth {
  const raw = process.env["REQUEST_BITS"] ?? "8";
  const value = parseInt(raw, 10);

  if (!isBitDepth(value)) {
    throw new Error(`Invalid REQUEST_BITS: "${raw}". Must be one of: 8, 10, 12, 16`);
  }

  return value;
}

export function loadConfig(): ClientConfig {
  const remote = parseRemoteAddress(process.env["CSLINK_REMOTE"] ?? "127.0.0.1");

  return {
    remote,
    connectTimeoutMs: readIntInRange("CONNECT_TIMEOUT_MS", 5_000, 100, 60_000),
    sendIntervalMs: readIntInRange("SEND_INTERVAL_MS", 1_000, 10, 60_000),
    retryDelayMs: readIntInRange("RETRY_DELAY_MS", 50, 1, 10_000),
    requestDepthBits: readRequestDepth(),
    shapeColorPriority: readShapeColorPriority(),
    xmlLogPath:
      process.env["XML_LOG_ENABLED"] === "true"
        ? process.env["XML_LOG_PATH"] ?? DEFAULT_XML_LOG_PATH
        : null,
    port: readIntInRange("PORT", 8090, 1, 65535),
    host: process.env["HOST"] ?? "127.0.0.1",
    portRangeSize: readIntInRange("PORT_RANGE_SIZE", 10, 1, 100),
    logLevel: process.env["LOG_LEVEL"] ?? "info",
  };
}
