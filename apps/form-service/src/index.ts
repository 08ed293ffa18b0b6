import Fastify from "fastify";
import { createDb } from "@formhub/db";
import { config } from "./config.js";
import { log, logFailure } from "./logger.js";
import { collectDefaultMetrics } from "./metrics.js";
import { registerApi } from "./api.js";
import { ConsumptionEngine } from "./broker/consumption-engine.js";
import { Dispatcher, requestTypesFromConfig } from "./broker/dispatcher.js";
import { DeliveryQueue } from "./domain/buffer/buffer.js";
import type { Envelope } from "./domain/envelope.js";
import { errorMessage } from "./domain/errors.js";
import { NatsBrokerTransport, natsSettingsFromConfig } from "./nats/client.js";
import { NatsNotificationPublisher } from "./nats/publisher.js";
import { CacheService } from "./services/cache-service.js";
import { DrizzleFormRepository } from "./services/form-repository.js";
import { FormOrchestrator } from "./services/form-orchestrator.js";

const app = Fastify({
  logger: false, // We use our own structured logger
});

// Global error handler - prevent stack trace leakage in production
app.setErrorHandler((error, request, reply) => {
  log.api.error(
    { error: error.message, url: request.url, method: request.method, requestId: request.id },
    "unhandled error"
  );

  const statusCode = error.statusCode ?? 500;
  return reply.status(statusCode).send({
    error: statusCode === 500 && config.NODE_ENV === "production" ? "Internal server error" : error.message,
    requestId: request.id,
  });
});

collectDefaultMetrics();

const { db, sql } = createDb(config.DATABASE_URL, { max: config.DATABASE_POOL_MAX });
const repository = new DrizzleFormRepository(db);
const cache = new CacheService(config.REDIS_URL);
const natsSettings = natsSettingsFromConfig(config);
const publisher = new NatsNotificationPublisher(natsSettings, config.OUTPUT_EXCHANGE);

const orchestrator = new FormOrchestrator(repository, cache, publisher, {
  retryAttempts: config.PROPAGATION_RETRY_ATTEMPTS,
  retryDelayMs: config.PROPAGATION_RETRY_DELAY_MS,
});

const deliveries = new DeliveryQueue<Envelope>(config.DELIVERY_QUEUE_CAPACITY);
const engine = new ConsumptionEngine(new NatsBrokerTransport(natsSettings), deliveries, {
  queue: config.REQUEST_QUEUE,
  routingKey: config.REQUEST_ROUTING_KEY,
  reconnectDelayMs: config.RECONNECT_DELAY_MS,
  healthProbeIntervalMs: config.HEALTH_PROBE_INTERVAL_MS,
});
const dispatcher = new Dispatcher(orchestrator, requestTypesFromConfig(config));

const consuming = new AbortController();
let engineRun: Promise<void> = Promise.resolve();
let dispatcherRun: Promise<void> = Promise.resolve();

// Startup
try {
  const dbHealthy = await repository.healthCheck();
  if (!dbHealthy) {
    throw new Error("PostgreSQL health check failed");
  }
  log.system.info({ service: "postgres" }, "connected");

  const cacheHealthy = await cache.healthCheck();
  if (!cacheHealthy) {
    // Propagation retries cover a cache that comes up later
    log.system.warn({ service: "redis" }, "cache not reachable at startup");
  }

  await publisher.connect();
  log.system.info({ service: "nats", exchange: config.OUTPUT_EXCHANGE }, "publisher connected");

  await engine.registerExchange(config.REQUEST_EXCHANGE);
  engineRun = engine.run(consuming.signal).catch((error) => {
    logFailure("broker", "consumption engine crashed", error, { queue: config.REQUEST_QUEUE });
    process.exit(1);
  });
  dispatcherRun = dispatcher.run(deliveries, consuming.signal).catch((error) => {
    logFailure("dispatch", "dispatcher crashed", error, {});
    process.exit(1);
  });

  await registerApi(app, {
    broker: engine,
    publisher,
    cache,
    database: repository,
  });

  await app.listen({ port: config.PORT, host: "0.0.0.0" });

  log.system.info(
    {
      port: config.PORT,
      env: config.NODE_ENV,
      requestExchange: config.REQUEST_EXCHANGE,
      outputExchange: config.OUTPUT_EXCHANGE,
      queue: config.REQUEST_QUEUE,
      natsCluster: config.NATS_CLUSTER,
    },
    "form service started"
  );
} catch (err) {
  log.system.error({ error: errorMessage(err) }, "startup failed");
  process.exit(1);
}

// Graceful shutdown with timeout protection
const SHUTDOWN_TIMEOUT_MS = 30000; // 30 seconds max for graceful shutdown

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, name: string): Promise<T | void> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<void>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${name} timed out after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } catch (error) {
    log.system.warn({ error: errorMessage(error), component: name }, "shutdown timeout");
  } finally {
    clearTimeout(timer);
  }
}

async function shutdown(): Promise<void> {
  log.system.info({}, "shutting down (30s timeout)");
  const shutdownStart = Date.now();

  // Phase 1: Stop accepting new work
  log.system.debug({}, "Phase 1: Stop HTTP server");
  await withTimeout(app.close(), 2000, "Fastify");

  // Phase 2: Stop consuming; in-flight mutations finish their retries
  log.system.debug({}, "Phase 2: Stop consumer and dispatcher");
  consuming.abort();
  deliveries.close();
  await withTimeout(engineRun, 5000, "ConsumptionEngine");
  await withTimeout(dispatcherRun, 15000, "Dispatcher");

  // Phase 3: Close all connections
  log.system.debug({}, "Phase 3: Close connections");
  await withTimeout(publisher.close(), 2000, "NATS");
  await withTimeout(cache.close(), 2000, "Redis");
  await withTimeout(sql.end({ timeout: 2 }), 3000, "PostgreSQL");

  log.system.info({ durationMs: Date.now() - shutdownStart, stats: engine.getStats() }, "shutdown complete");
  process.exit(0);
}

// Force exit if graceful shutdown takes too long
let shutdownInProgress = false;
async function initiateShutdown(): Promise<void> {
  if (shutdownInProgress) {
    log.system.warn({}, "shutdown already in progress, forcing exit");
    process.exit(1);
  }
  shutdownInProgress = true;

  const forceExitTimer = setTimeout(() => {
    log.system.error({}, "shutdown timeout exceeded, forcing exit");
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forceExitTimer.unref();

  await shutdown();
}

process.on("SIGTERM", () => {
  void initiateShutdown();
});
process.on("SIGINT", () => {
  void initiateShutdown();
});
