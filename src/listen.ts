import type { LinkLogger } from "./link/link-worker.js";

export interface Listener {
  readonly listen: (opts: { port: number; host: string }) => Promise<string>;
}

export interface PortRange {
  readonly host: string;
  readonly port: number;
  readonly portRangeSize: number;
}

function isAddressInUse(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EADDRINUSE";
}

/**
 * Binds the status API to the first free port from `range.port` on.
 * Landing anywhere but the configured port is logged, since clients polling
 * `/state` have to be pointed at the new one.
 */
export async function listenInPortRange(
  app: Listener,
  range: PortRange,
  logger?: Pick<LinkLogger, "warn">,
): Promise<number> {
  const lastPort = range.port + range.portRangeSize - 1;

  for (let port = range.port; port <= lastPort; port++) {
    try {
      await app.listen({ port, host: range.host });
    } catch (err: unknown) {
      if (!isAddressInUse(err)) {
        throw err;
      }
      continue;
    }

    if (port !== range.port) {
      logger?.warn(`Status API port ${range.port} is in use; listening on ${port} instead`);
    }
    return port;
  }

  throw new Error(`Status API ports ${range.port}-${lastPort} on ${range.host} are all in use`);
}
