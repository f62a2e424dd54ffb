import type { FastifyInstance } from "fastify";
import type { HealthResponse } from "../types/protocol.js";
import type { LinkAccess } from "../server.js";

interface HealthDeps {
  readonly link: LinkAccess;
  readonly startTime: number;
}

export function registerHealthRoute(
  app: FastifyInstance,
  deps: HealthDeps,
): void {
  app.get("/health", async (): Promise<HealthResponse> => {
    const snapshot = deps.link.read();
    const isDegraded = !snapshot.connected || snapshot.fault !== null;

    return {
      status: isDegraded ? "degraded" : "ok",
      remote: deps.link.remote,
      connected: snapshot.connected,
      uptime: Math.round((Date.now() - deps.startTime) / 1000),
      lastError: snapshot.lastError,
      fault: snapshot.fault?.code ?? null,
    };
  });
}
