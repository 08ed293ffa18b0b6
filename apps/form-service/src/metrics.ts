import promClient from "prom-client";

export const register = promClient.register;

/**
 * Enable Prometheus default process metrics (CPU, memory, event loop).
 * Called once from the process entrypoint.
 */
export function collectDefaultMetrics(): void {
  promClient.collectDefaultMetrics({
    prefix: "form_service_",
    gcDurationBuckets: [0.001, 0.01, 0.1, 1, 2, 5],
  });
}

// ============================================
// Mutation Metrics
// ============================================

/**
 * Counter: Orchestrated mutations by outcome
 * Labels: operation (createForm, deleteQuestion, ...), outcome (ok or an error code)
 */
export const formMutationsTotal = new promClient.Counter({
  name: "form_mutations_total",
  help: "Total number of form mutations by operation and outcome",
  labelNames: ["operation", "outcome"],
});

/**
 * Histogram: End-to-end mutation duration (persist + propagate)
 */
export const formMutationDuration = new promClient.Histogram({
  name: "form_mutation_duration_seconds",
  help: "Duration of form mutations including propagation",
  labelNames: ["operation"],
  buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 5, 15, 30],
});

// ============================================
// Broker Metrics
// ============================================

export const envelopesReceivedTotal = new promClient.Counter({
  name: "broker_envelopes_received_total",
  help: "Envelopes decoded and handed to the delivery queue",
});

/**
 * Counter: Envelopes dropped because the delivery queue was full
 */
export const envelopesDroppedTotal = new promClient.Counter({
  name: "broker_envelopes_dropped_total",
  help: "Envelopes dropped because the delivery queue was saturated",
});

export const decodeFailuresTotal = new promClient.Counter({
  name: "broker_decode_failures_total",
  help: "Raw broker messages that could not be decoded into an envelope",
});

export const brokerReconnectsTotal = new promClient.Counter({
  name: "broker_reconnects_total",
  help: "Successful broker reconnections",
});
