import type { FastifyInstance } from "fastify";
import type { RequestColorPayload, StateResponse } from "../types/protocol.js";
import type { LinkAccess } from "../server.js";
import { DEFAULT_DEPTH, SUPPORTED_DEPTHS, MAX_CHANNEL_VALUE, to8Bit } from "../color/color.js";
import { isLinkError } from "../link/errors.js";

interface StateRouteDeps {
  readonly link: LinkAccess;
}

const requestColorSchema = {
  body: {
    type: "object" as const,
    required: ["red", "green", "blue"],
    properties: {
      red: { type: "integer" as const, minimum: 0, maximum: MAX_CHANNEL_VALUE },
      green: { type: "integer" as const, minimum: 0, maximum: MAX_CHANNEL_VALUE },
      blue: { type: "integer" as const, minimum: 0, maximum: MAX_CHANNEL_VALUE },
      bits: { type: "integer" as const, enum: [...SUPPORTED_DEPTHS] },
    },
  },
};

export function registerStateRoutes(
  app: FastifyInstance,
  deps: StateRouteDeps,
): void {
  function currentState(): StateResponse {
    const snapshot = deps.link.read();
    return { ...snapshot, measuredColor8: to8Bit(snapshot.measuredColor) };
  }

  app.get("/state", async (): Promise<StateResponse> => {
    return currentState();
  });

  app.put<{ Body: RequestColorPayload }>(
    "/request-color",
    { schema: requestColorSchema },
    async (request, reply) => {
      const { red, green, blue, bits = DEFAULT_DEPTH } = request.body;

      try {
        deps.link.setRequestedColor({ red, green, blue, depthBits: bits });
      } catch (err: unknown) {
        if (isLinkError(err, "InvalidColor")) {
          request.log.warn({ red, green, blue, bits }, "request-color: rejected");
          return reply.status(400).send({ success: false, error: err.message });
        }
        throw err;
      }

      request.log.info(
        { red, green, blue, bits },
        `request-color: ${red}/${green}/${blue} at ${bits} bits`,
      );

      return currentState();
    },
  );
}
