import { describe, it, expect, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildServer } from "../server.js";
import { createStubLink, createTestConfig } from "../test-helpers.js";

describe("GET /health", () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app.close();
  });

  it("returns status ok with correct shape", async () => {
    app = await buildServer({
      config: createTestConfig(),
      link: createStubLink(),
      startTime: Date.now() - 5_000,
    });

    const res = await app.inject({ method: "GET", url: "/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      status: "ok",
      remote: "127.0.0.1:20002",
      connected: true,
      uptime: 5,
      lastError: null,
      fault: null,
    });
  });

  it("reports degraded while the link is down", async () => {
    app = await buildServer({
      config: createTestConfig(),
      link: createStubLink({
        connected: false,
        lastError: "remote signalled end of communication",
      }),
      startTime: Date.now(),
    });

    const body = (await app.inject({ method: "GET", url: "/health" })).json();

    expect(body.status).toBe("degraded");
    expect(body.connected).toBe(false);
    expect(body.lastError).toBe("remote signalled end of communication");
  });

  it("reports the fault code after a protocol violation", async () => {
    app = await buildServer({
      config: createTestConfig(),
      link: createStubLink({
        connected: false,
        fault: { code: "DuplicateCommand", message: "twice", at: 0 },
        lastError: "twice",
      }),
      startTime: Date.now(),
    });

    const body = (await app.inject({ method: "GET", url: "/health" })).json();

    expect(body.status).toBe("degraded");
    expect(body.fault).toBe("DuplicateCommand");
  });
});
