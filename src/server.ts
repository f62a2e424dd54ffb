import Fastify, { type FastifyInstance } from "fastify";
import type { ClientConfig } from "./config/client-config.js";
import type { LinkHandle } from "./link/link-worker.js";
import { registerHealthRoute } from "./routes/health.js";
import { registerStateRoutes } from "./routes/state.js";

/** The part of the link worker the HTTP surface needs */
export type LinkAccess = Pick<LinkHandle, "remote" | "read" | "setRequestedColor">;

interface BuildServerDeps {
  readonly config: ClientConfig;
  readonly link: LinkAccess;
  readonly startTime: number;
}

export async function buildServer(
  deps: BuildServerDeps,
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: deps.config.logLevel,
    },
  });

  registerHealthRoute(app, {
    link: deps.link,
    startTime: deps.startTime,
  });

  registerStateRoutes(app, {
    link: deps.link,
  });

  return app;
}
