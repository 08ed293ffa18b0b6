import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ConsumptionEngine, type ConsumptionEngineOptions } from "../../../broker/consumption-engine.js";
import { DeliveryQueue } from "../../../domain/buffer/buffer.js";
import type { Envelope } from "../../../domain/envelope.js";
import { FakeBrokerTransport, envelopeBytes } from "../../../../test/helpers.js";

const QUEUE = "form-service";
const ROUTING_KEY = "request.*";

const TOPOLOGY = [
  "connect",
  "declareExchange:requests-a",
  "declareExchange:requests-b",
  `declareQueue:${QUEUE}`,
  `bind:${QUEUE}:requests-a:${ROUTING_KEY}`,
  `bind:${QUEUE}:requests-b:${ROUTING_KEY}`,
  `consume:${QUEUE}`,
];

describe("ConsumptionEngine", () => {
  let transport: FakeBrokerTransport;
  let controller: AbortController;
  let running: Promise<void> | null;

  function createEngine(
    deliveries: DeliveryQueue<Envelope>,
    options: Partial<ConsumptionEngineOptions> = {}
  ): ConsumptionEngine {
    return new ConsumptionEngine(transport, deliveries, {
      queue: QUEUE,
      routingKey: ROUTING_KEY,
      reconnectDelayMs: 0,
      healthProbeIntervalMs: 60_000,
      ...options,
    });
  }

  async function startWithTwoExchanges(engine: ConsumptionEngine): Promise<void> {
    await engine.registerExchange("requests-a");
    await engine.registerExchange("requests-b");
    running = engine.run(controller.signal);
    await vi.waitFor(() => expect(engine.getState()).toBe("consuming"));
  }

  beforeEach(() => {
    transport = new FakeBrokerTransport();
    controller = new AbortController();
    running = null;
  });

  afterEach(async () => {
    controller.abort();
    await running;
  });

  it("should start disconnected", () => {
    const engine = createEngine(new DeliveryQueue(10));

    expect(engine.getState()).toBe("disconnected");
    expect(engine.isHealthy()).toBe(false);
  });

  it("should declare exchanges, the queue and bindings before consuming", async () => {
    const engine = createEngine(new DeliveryQueue(10));

    await startWithTwoExchanges(engine);

    expect(transport.calls).toEqual(TOPOLOGY);
    expect(engine.isHealthy()).toBe(true);
  });

  it("should redeclare the topology after the connection closes, before delivering again", async () => {
    const deliveries = new DeliveryQueue<Envelope>(10);
    const engine = createEngine(deliveries);
    await startWithTwoExchanges(engine);

    transport.connections[0].drop();
    await vi.waitFor(() => expect(transport.connections[1]?.consuming).toBe(true));

    const afterReconnect = transport.calls.slice(transport.calls.lastIndexOf("connect"));
    expect(afterReconnect).toEqual(TOPOLOGY);
    expect(deliveries.size()).toBe(0);

    transport.connections[1].deliver(envelopeBytes("creation", { id: "f1", author: "A" }));
    const envelope = await deliveries.take();

    expect(envelope?.type).toBe("creation");
    expect(engine.getStats().reconnects).toBe(1);
  });

  it("should notice a silently closed connection through the health probe", async () => {
    const engine = createEngine(new DeliveryQueue(10), { healthProbeIntervalMs: 20 });
    await startWithTwoExchanges(engine);

    transport.connections[0].dropSilently();

    await vi.waitFor(() => expect(transport.connections[1]?.consuming).toBe(true));
    expect(engine.getState()).toBe("consuming");
    expect(engine.getStats().reconnects).toBe(1);
  });

  it("should keep retrying until the broker accepts the connection", async () => {
    transport.failuresLeft = 2;
    const engine = createEngine(new DeliveryQueue(10));

    await startWithTwoExchanges(engine);

    expect(transport.connectCount()).toBe(3);
    expect(engine.getStats().reconnects).toBe(0);
  });

  it("should share one in-flight reconnection between callers", async () => {
    let release: () => void = () => undefined;
    transport.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const engine = createEngine(new DeliveryQueue(10));

    const first = engine.connect(controller.signal);
    const second = engine.connect(controller.signal);
    expect(transport.connectCount()).toBe(1);

    release();
    const [a, b] = await Promise.all([first, second]);

    expect(a).not.toBeNull();
    expect(a).toBe(b);
    expect(engine.getState()).toBe("topology-ready");
    await a?.close();
  });

  it("should bind an exchange registered while consuming right away", async () => {
    const engine = createEngine(new DeliveryQueue(10));
    await startWithTwoExchanges(engine);

    await engine.registerExchange("requests-c");

    expect(transport.calls.slice(-2)).toEqual([
      "declareExchange:requests-c",
      `bind:${QUEUE}:requests-c:${ROUTING_KEY}`,
    ]);
  });

  it("should drop and count envelopes that fail to decode", async () => {
    const deliveries = new DeliveryQueue<Envelope>(10);
    const engine = createEngine(deliveries);
    await startWithTwoExchanges(engine);
    const connection = transport.connections[0];

    connection.deliver(Buffer.from("not an envelope"));
    connection.deliver(envelopeBytes("form-deletion", { form_id: "f1" }));

    const envelope = await deliveries.take();
    expect(envelope?.type).toBe("form-deletion");
    expect(engine.getStats()).toMatchObject({ delivered: 1, decodeFailures: 1, dropped: 0 });
    expect(connection.acked).toBe(2);
  });

  it("should drop the newest envelope when the delivery queue is full", async () => {
    const deliveries = new DeliveryQueue<Envelope>(1);
    const engine = createEngine(deliveries);
    await startWithTwoExchanges(engine);
    const connection = transport.connections[0];

    connection.deliver(envelopeBytes("form-deletion", { form_id: "kept" }));
    connection.deliver(envelopeBytes("form-deletion", { form_id: "dropped" }));

    await vi.waitFor(() => expect(engine.getStats().dropped).toBe(1));
    expect(engine.getStats().delivered).toBe(1);
    expect(deliveries.size()).toBe(1);

    const kept = await deliveries.take();
    expect(Buffer.from(kept?.payload ?? new Uint8Array()).toString("utf-8")).toBe('{"form_id":"kept"}');
  });

  it("should not start consuming when cancelled while connecting", async () => {
    let release: () => void = () => undefined;
    transport.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const engine = createEngine(new DeliveryQueue(10));
    await engine.registerExchange("requests-a");
    running = engine.run(controller.signal);
    await vi.waitFor(() => expect(transport.connectCount()).toBe(1));

    controller.abort();
    release();
    await running;

    expect(engine.getState()).toBe("disconnected");
    expect(transport.connections[0].isClosed()).toBe(true);
    expect(transport.connections[0].consuming).toBe(false);
    expect(transport.calls).not.toContain(`consume:${QUEUE}`);
  });

  it("should stop waiting for the next attempt when cancelled", async () => {
    transport.failuresLeft = 1;
    const engine = createEngine(new DeliveryQueue(10), { reconnectDelayMs: 60_000 });
    running = engine.run(controller.signal);
    await vi.waitFor(() => expect(engine.getState()).toBe("disconnected"));

    controller.abort();
    await running;

    expect(transport.connectCount()).toBe(1);
    expect(transport.connections).toHaveLength(0);
    expect(engine.getStats().reconnects).toBe(0);
  });

  it("should stop and close the connection when cancelled", async () => {
    const engine = createEngine(new DeliveryQueue(10));
    await startWithTwoExchanges(engine);

    controller.abort();
    await running;

    expect(engine.getState()).toBe("disconnected");
    expect(transport.connections[0].isClosed()).toBe(true);
    expect(transport.connectCount()).toBe(1);
  });
});
