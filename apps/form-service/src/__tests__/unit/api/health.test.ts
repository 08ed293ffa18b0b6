import { describe, it, expect, afterEach } from "vitest";
import Fastify, { type FastifyInstance } from "fastify";
import { collectHealth, registerApi } from "../../../api.js";
import { formMutationsTotal } from "../../../metrics.js";

const healthy = { healthCheck: async () => true };
const unhealthy = { healthCheck: async () => false };
const throwing = {
  healthCheck: async (): Promise<boolean> => {
    throw new Error("socket hang up");
  },
};

describe("collectHealth", () => {
  it("should be ok when every check passes", async () => {
    expect(await collectHealth({ broker: healthy, cache: healthy })).toEqual({
      status: "ok",
      checks: { broker: true, cache: true },
    });
  });

  it("should count a throwing check as failed", async () => {
    expect(await collectHealth({ broker: healthy, database: throwing })).toEqual({
      status: "unhealthy",
      checks: { broker: true, database: false },
    });
  });
});

describe("HTTP surface", () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app.close();
  });

  it("should answer 200 when healthy", async () => {
    app = Fastify({ logger: false });
    await registerApi(app, { broker: healthy, publisher: healthy });

    const response = await app.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: "ok" });
  });

  it("should answer 503 with the failing checks", async () => {
    app = Fastify({ logger: false });
    await registerApi(app, { broker: unhealthy, publisher: healthy });

    const response = await app.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toEqual({ status: "unhealthy", checks: { broker: false, publisher: true } });
  });

  it("should expose mutation metrics in Prometheus format", async () => {
    formMutationsTotal.inc({ operation: "createForm", outcome: "ok" });
    app = Fastify({ logger: false });
    await registerApi(app, {});

    const response = await app.inject({ method: "GET", url: "/metrics" });

    expect(response.statusCode).toBe(200);
    expect(response.headers["content-type"]).toContain("text/plain");
    expect(response.body).toContain('form_mutations_total{operation="createForm",outcome="ok"} 1');
  });
});
