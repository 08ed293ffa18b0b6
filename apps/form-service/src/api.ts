import type { FastifyInstance } from "fastify";
import { errorMessage } from "./domain/errors.js";
import { log } from "./logger.js";
import { register } from "./metrics.js";
import type { HealthCheckable } from "./services/types.js";

export type HealthChecks = Record<string, HealthCheckable>;

export interface HealthReport {
  status: "ok" | "unhealthy";
  checks: Record<string, boolean>;
}

/**
 * Run every health check concurrently; a check that throws counts as failed.
 */
export async function collectHealth(checks: HealthChecks): Promise<HealthReport> {
  const entries = await Promise.all(
    Object.entries(checks).map(async ([name, check]): Promise<[string, boolean]> => {
      try {
        return [name, await check.healthCheck()];
      } catch (error) {
        log.api.warn({ check: name, error: errorMessage(error) }, "health check threw");
        return [name, false];
      }
    })
  );

  const results = Object.fromEntries(entries);
  const healthy = entries.every(([, ok]) => ok);
  return { status: healthy ? "ok" : "unhealthy", checks: results };
}

export async function registerApi(app: FastifyInstance, checks: HealthChecks): Promise<void> {
  // Health check endpoint for k8s probes
  app.get("/health", async (_request, reply) => {
    const report = await collectHealth(checks);
    if (report.status === "ok") {
      return reply.send({ status: "ok", timestamp: new Date().toISOString() });
    }

    log.api.warn({ checks: report.checks }, "health check failed");
    return reply.status(503).send(report);
  });

  app.get("/metrics", async (_request, reply) => {
    try {
      const output = await register.metrics();
      reply.header("Content-Type", register.contentType);
      return reply.send(output);
    } catch (error) {
      log.api.error({ error: errorMessage(error) }, "failed to collect metrics");
      return reply.status(500).send({ error: "Failed to collect metrics" });
    }
  });
}
