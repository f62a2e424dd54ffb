import { lookup } from "node:dns/promises";
import { connect, isIP, type Socket } from "node:net";
import { LinkError, describeError } from "./errors.js";

export const DEFAULT_REMOTE_PORT = 20002;

export interface RemoteAddress {
  readonly host: string;
  readonly port: number;
}

export interface Endpoint {
  readonly address: string;
  readonly family: number;
  readonly port: number;
}

export interface ConnectOptions {
  readonly timeoutMs: number;
  readonly resolve?: (host: string) => Promise<readonly { address: string; family: number }[]>;
  readonly dial?: (endpoint: Endpoint, timeoutMs: number) => Promise<Socket>;
}

function parsePort(raw: string, text: string): number {
  const port = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;

  if (!Number.isFinite(port) || port < 1 || port > 65535) {
    throw new LinkError(
      "InvalidAddress",
      `Invalid remote address: "${text}". Port must be a number between 1 and 65535.`,
    );
  }

  return port;
}

/**
 * Parses `host`, `host:port`, `[v6]` or `[v6]:port`. A bare IPv6 literal
 * is taken as a host without a port.
 */
export function parseRemoteAddress(text: string): RemoteAddress {
  const trimmed = text.trim();

  const bracketed = /^\[([^\]]+)\](?::(.*))?$/.exec(trimmed);
  if (bracketed) {
    const [, host = "", port] = bracketed;
    return {
      host,
      port: port === undefined ? DEFAULT_REMOTE_PORT : parsePort(port, text),
    };
  }

  if (trimmed === "") {
    throw new LinkError("InvalidAddress", "Invalid remote address: host is empty");
  }

  if (isIP(trimmed) === 6) {
    return { host: trimmed, port: DEFAULT_REMOTE_PORT };
  }

  const separator = trimmed.lastIndexOf(":");
  if (separator === -1) {
    return { host: trimmed, port: DEFAULT_REMOTE_PORT };
  }

  const host = trimmed.slice(0, separator);
  if (host === "") {
    throw new LinkError("InvalidAddress", `Invalid remote address: "${text}". Host is empty.`);
  }

  return { host, port: parsePort(trimmed.slice(separator + 1), text) };
}

export function formatRemoteAddress(address: RemoteAddress): string {
  return isIP(address.host) === 6
    ? `[${address.host}]:${address.port}`
    : `${address.host}:${address.port}`;
}

async function resolveHost(host: string): Promise<readonly { address: string; family: number }[]> {
  return lookup(host, { all: true });
}

/** Opens a TCP connection to one endpoint, giving up after `timeoutMs` */
export function dialEndpoint(endpoint: Endpoint, timeoutMs: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = connect({
      host: endpoint.address,
      port: endpoint.port,
      family: endpoint.family,
    });

    const timer = setTimeout(() => {
      cleanup();
      socket.destroy();
      reject(
        new LinkError(
          "ConnectTimeout",
          `Connecting to ${endpoint.address}:${endpoint.port} timed out after ${timeoutMs}ms`,
        ),
      );
    }, timeoutMs);

    function onConnect(): void {
      cleanup();
      socket.setNoDelay(true);
      resolve(socket);
    }

    function onError(err: Error): void {
      cleanup();
      socket.destroy();
      reject(
        new LinkError(
          "SocketError",
          `Connecting to ${endpoint.address}:${endpoint.port} failed: ${err.message}`,
          { cause: err },
        ),
      );
    }

    function cleanup(): void {
      clearTimeout(timer);
      socket.off("connect", onConnect);
      socket.off("error", onError);
    }

    socket.once("connect", onConnect);
    socket.once("error", onError);
  });
}

/**
 * Resolves `address` and tries each endpoint in turn. Returns the first
 * connected socket; when every attempt fails, rejects with the last error.
 */
export async function connectToRemote(
  address: RemoteAddress,
  options: ConnectOptions,
): Promise<Socket> {
  const resolve = options.resolve ?? resolveHost;
  const dial = options.dial ?? dialEndpoint;

  let candidates: readonly { address: string; family: number }[];
  try {
    candidates = await resolve(address.host);
  } catch (err: unknown) {
    throw new LinkError(
      "NoReachableEndpoint",
      `Could not resolve ${address.host}: ${describeError(err)}`,
      { cause: err },
    );
  }

  if (candidates.length === 0) {
    throw new LinkError(
      "NoReachableEndpoint",
      `${formatRemoteAddress(address)} resolved to no endpoints`,
    );
  }

  let lastError: unknown = null;

  for (const candidate of candidates) {
    try {
      return await dial({ ...candidate, port: address.port }, options.timeoutMs);
    } catch (err: unknown) {
      lastError = err;
    }
  }

  throw lastError;
}
