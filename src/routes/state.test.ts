import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildServer } from "../server.js";
import { createStubLink, createTestConfig } from "../test-helpers.js";

describe("state routes", () => {
  let app: FastifyInstance;
  let link: ReturnType<typeof createStubLink>;

  beforeEach(async () => {
    link = createStubLink({
      measuredColor: { red: 512, green: 0, blue: 1023, depthBits: 10 },
    });
    app = await buildServer({ config: createTestConfig(), link, startTime: Date.now() });
  });

  afterEach(async () => {
    await app.close();
  });

  describe("GET /state", () => {
    it("returns the snapshot with an 8-bit measured color", async () => {
      const res = await app.inject({ method: "GET", url: "/state" });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.connected).toBe(true);
      expect(body.measuredColor).toEqual({ red: 512, green: 0, blue: 1023, depthBits: 10 });
      expect(body.measuredColor8).toEqual({ red: 128, green: 0, blue: 255, depthBits: 8 });
      expect(body.shapes).toEqual([]);
      expect(body.fault).toBeNull();
    });
  });

  describe("PUT /request-color", () => {
    it("sets an 8-bit color by default", async () => {
      const res = await app.inject({
        method: "PUT",
        url: "/request-color",
        payload: { red: 10, green: 20, blue: 30 },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().requestedColor).toEqual({ red: 10, green: 20, blue: 30, depthBits: 8 });
      expect(link.requested).toEqual([{ red: 10, green: 20, blue: 30, depthBits: 8 }]);
    });

    it("accepts a color at another depth", async () => {
      const res = await app.inject({
        method: "PUT",
        url: "/request-color",
        payload: { red: 1023, green: 0, blue: 512, bits: 10 },
      });

      expect(res.statusCode).toBe(200);
      expect(link.requested).toEqual([{ red: 1023, green: 0, blue: 512, depthBits: 10 }]);
    });

    it("returns 400 for a channel above the depth's max", async () => {
      const res = await app.inject({
        method: "PUT",
        url: "/request-color",
        payload: { red: 256, green: 0, blue: 0 },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        success: false,
        error: "Invalid red channel: 256. Must be an integer between 0 and 255 at 8 bits.",
      });
      expect(link.requested).toEqual([]);
    });

    it("returns 400 for an unsupported depth", async () => {
      const res = await app.inject({
        method: "PUT",
        url: "/request-color",
        payload: { red: 1, green: 2, blue: 3, bits: 9 },
      });

      expect(res.statusCode).toBe(400);
      expect(link.requested).toEqual([]);
    });

    it("returns 400 when a channel is missing", async () => {
      const res = await app.inject({
        method: "PUT",
        url: "/request-color",
        payload: { red: 1, green: 2 },
      });

      expect(res.statusCode).toBe(400);
    });
  });
});
