import type { LinkFaultCode } from "../types/protocol.js";

export type LinkErrorCode =
  | LinkFaultCode
  | "PayloadTooLarge"
  | "ConnectionClosed"
  | "SocketError"
  | "ConnectTimeout"
  | "NoReachableEndpoint"
  | "InvalidAddress"
  | "InvalidColor";

const PROTOCOL_VIOLATIONS: ReadonlySet<LinkErrorCode> = new Set<LinkErrorCode>([
  "DuplicateCommand",
  "IncompleteShape",
  "MalformedXml",
  "InvalidPayload",
]);

export class LinkError extends Error {
  readonly code: LinkErrorCode;

  constructor(code: LinkErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LinkError";
    this.code = code;
  }
}

export function isLinkError(err: unknown, code?: LinkErrorCode): err is LinkError {
  return err instanceof LinkError && (code === undefined || err.code === code);
}

/** Narrows to errors that mean the remote broke the protocol contract */
export function isProtocolViolation(
  err: unknown,
): err is LinkError & { readonly code: LinkFaultCode } {
  return err instanceof LinkError && PROTOCOL_VIOLATIONS.has(err.code);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
