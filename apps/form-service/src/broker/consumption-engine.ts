import { decodeEnvelope, type Envelope } from "../domain/envelope.js";
import type { BoundedBuffer } from "../domain/buffer/buffer.js";
import { errorMessage } from "../domain/errors.js";
import { log } from "../logger.js";
import {
  brokerReconnectsTotal,
  decodeFailuresTotal,
  envelopesDroppedTotal,
  envelopesReceivedTotal,
} from "../metrics.js";
import type { BrokerConnection, BrokerTransport, MessageStream, RawMessage } from "./types.js";

export type EngineState = "disconnected" | "connecting" | "topology-ready" | "consuming";

export interface ConsumptionEngineOptions {
  /** Durable queue bound to every registered exchange */
  queue: string;
  routingKey: string;
  /** Fixed wait after a failed connect/declare/bind sequence */
  reconnectDelayMs: number;
  /** Interval of the connection-closed probe while consuming */
  healthProbeIntervalMs: number;
}

export interface EngineStats {
  delivered: number;
  dropped: number;
  decodeFailures: number;
  reconnects: number;
}

/**
 * Exchange names that must survive reconnection. Adding a name and iterating
 * the set for redeclaration are serialized through one promise chain.
 */
class ExchangeRegistry {
  private readonly names = new Set<string>();
  private tail: Promise<void> = Promise.resolve();

  add(name: string, onAdded: () => Promise<void>): Promise<void> {
    return this.withLock(async () => {
      const isNew = !this.names.has(name);
      this.names.add(name);
      if (isNew) {
        await onAdded();
      }
    });
  }

  withSnapshot<T>(fn: (names: readonly string[]) => Promise<T>): Promise<T> {
    return this.withLock(() => fn([...this.names]));
  }

  private withLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Long-lived broker subscription.
 *
 *   disconnected → connecting → topology-ready → consuming → disconnected
 *
 * Connection loss is detected before each consume cycle and by a periodic
 * probe. Reconnection repeats connect → declare exchanges → declare queue →
 * bind until it succeeds or the run signal is aborted; only one reconnection
 * is in flight at a time. Decoded envelopes go to a bounded delivery buffer
 * that drops the newest envelope when full.
 */
export class ConsumptionEngine {
  private state: EngineState = "disconnected";
  private connection: BrokerConnection | null = null;
  private activeStream: MessageStream | null = null;
  private reconnecting: Promise<BrokerConnection | null> | null = null;
  private hasConnected = false;
  private readonly exchanges = new ExchangeRegistry();
  private readonly stats: EngineStats = { delivered: 0, dropped: 0, decodeFailures: 0, reconnects: 0 };

  constructor(
    private readonly transport: BrokerTransport,
    private readonly deliveries: BoundedBuffer<Envelope>,
    private readonly options: ConsumptionEngineOptions
  ) {}

  getState(): EngineState {
    return this.state;
  }

  getStats(): EngineStats {
    return { ...this.stats };
  }

  isHealthy(): boolean {
    return this.state === "consuming" && this.connection !== null && !this.connection.isClosed();
  }

  async healthCheck(): Promise<boolean> {
    return this.isHealthy();
  }

  /**
   * Register an exchange to consume from. It is declared and bound right away
   * when a connection is up, and on every reconnection after that.
   */
  async registerExchange(name: string): Promise<void> {
    await this.exchanges.add(name, async () => {
      const connection = this.connection;
      if (connection === null || connection.isClosed()) return;

      await connection.declareExchange(name);
      await connection.bind(this.options.queue, name, this.options.routingKey);
      log.broker.info({ exchange: name, queue: this.options.queue }, "exchange bound");
    });
  }

  /**
   * Consume until `signal` is aborted. Cancellation is observed between
   * messages; the connection is closed on exit.
   */
  async run(signal: AbortSignal): Promise<void> {
    const probe = setInterval(() => this.probe(), this.options.healthProbeIntervalMs);
    probe.unref();

    try {
      while (!signal.aborted) {
        const connection = await this.connect(signal);
        if (connection === null) break;

        const ended = await this.consumeCycle(connection, signal);
        if (signal.aborted) break;

        this.markDisconnected(connection);
        if (ended === "stream-ended") {
          log.broker.warn({ queue: this.options.queue }, "consumer stream ended, reconnecting");
          await sleep(this.options.reconnectDelayMs, signal);
        }
      }
    } finally {
      clearInterval(probe);
      await this.shutdown();
    }
  }

  /**
   * Return the live connection, or establish one. Concurrent callers share
   * the same in-flight reconnection, which observes the signal of the caller
   * that started it; the engine assumes one owner signal, the one given to
   * `run`. Resolves null when that signal is aborted first.
   */
  connect(signal: AbortSignal): Promise<BrokerConnection | null> {
    const current = this.connection;
    if (current !== null && !current.isClosed()) {
      return Promise.resolve(current);
    }

    if (this.reconnecting === null) {
      this.reconnecting = this.reconnect(signal).finally(() => {
        this.reconnecting = null;
      });
    }
    return this.reconnecting;
  }

  // ===========================================================================
  // State transitions
  // ===========================================================================

  private async reconnect(signal: AbortSignal): Promise<BrokerConnection | null> {
    let attempt = 0;

    while (!signal.aborted) {
      attempt++;
      this.transition("connecting");

      try {
        const connection = await this.transport.connect();
        await this.establishTopology(connection);

        if (signal.aborted) {
          this.connection = null;
          this.transition("disconnected");
          await this.closeQuietly(connection);
          return null;
        }

        if (this.hasConnected) {
          this.stats.reconnects++;
          brokerReconnectsTotal.inc();
          log.broker.info({ attempt }, "reconnected to broker");
        } else {
          log.broker.info({ attempt }, "connected to broker");
        }
        this.hasConnected = true;
        return connection;
      } catch (error) {
        this.transition("disconnected");
        log.broker.error(
          { attempt, retryInMs: this.options.reconnectDelayMs, error: errorMessage(error) },
          "broker connection failed, retrying"
        );
        await sleep(this.options.reconnectDelayMs, signal);
      }
    }

    return null;
  }

  /**
   * Declare every registered exchange, the queue and its bindings while
   * holding the registry, so no exchange registered meanwhile is missed.
   */
  private async establishTopology(connection: BrokerConnection): Promise<void> {
    const { queue, routingKey } = this.options;

    try {
      await this.exchanges.withSnapshot(async (names) => {
        for (const name of names) {
          await connection.declareExchange(name);
        }
        await connection.declareQueue(queue);
        for (const name of names) {
          await connection.bind(queue, name, routingKey);
        }

        this.connection = connection;
        this.transition("topology-ready");
        log.broker.info({ queue, exchanges: names }, "topology declared");
      });
    } catch (error) {
      await this.closeQuietly(connection);
      throw error;
    }
  }

  private async consumeCycle(
    connection: BrokerConnection,
    signal: AbortSignal
  ): Promise<"connection-lost" | "stream-ended" | "aborted"> {
    if (signal.aborted) return "aborted";
    if (connection.isClosed()) {
      log.broker.warn({}, "broker connection is closed, reconnecting");
      return "connection-lost";
    }

    const stream = connection.consume(this.options.queue);
    this.activeStream = stream;
    this.transition("consuming");
    log.broker.info({ queue: this.options.queue }, "consuming");

    const onAbort = () => stream.stop();
    signal.addEventListener("abort", onAbort, { once: true });

    try {
      for await (const message of stream) {
        this.handleMessage(message);
        if (signal.aborted) break;
      }
    } catch (error) {
      log.broker.error({ queue: this.options.queue, error: errorMessage(error) }, "consumer stream failed");
    } finally {
      signal.removeEventListener("abort", onAbort);
      this.activeStream = null;
    }

    if (signal.aborted) return "aborted";
    return connection.isClosed() ? "connection-lost" : "stream-ended";
  }

  private handleMessage(message: RawMessage): void {
    message.ack();

    let envelope: Envelope;
    try {
      envelope = decodeEnvelope(message.body);
    } catch (error) {
      this.stats.decodeFailures++;
      decodeFailuresTotal.inc();
      log.broker.error(
        { error: errorMessage(error), body: Buffer.from(message.body).toString("utf-8").slice(0, 256) },
        "failed to decode envelope, dropping"
      );
      return;
    }

    if (!this.deliveries.offer(envelope)) {
      this.stats.dropped++;
      envelopesDroppedTotal.inc();
      log.broker.warn({ envelopeId: envelope.id, type: envelope.type }, "delivery queue full, dropping envelope");
      return;
    }

    this.stats.delivered++;
    envelopesReceivedTotal.inc();
    log.broker.debug({ envelopeId: envelope.id, type: envelope.type }, "received envelope");
  }

  private probe(): void {
    const connection = this.connection;
    if (this.state === "consuming" && connection !== null && connection.isClosed()) {
      log.broker.warn({}, "health probe found broker connection closed");
      this.markDisconnected(connection);
    }
  }

  private markDisconnected(connection: BrokerConnection): void {
    if (this.connection === connection) {
      this.connection = null;
    }
    this.activeStream?.stop();
    this.transition("disconnected");
    if (!connection.isClosed()) {
      void this.closeQuietly(connection);
    }
  }

  private async shutdown(): Promise<void> {
    this.activeStream?.stop();
    const connection = this.connection;
    this.connection = null;
    this.transition("disconnected");
    if (connection !== null) {
      await this.closeQuietly(connection);
    }
  }

  private async closeQuietly(connection: BrokerConnection): Promise<void> {
    try {
      await connection.close();
    } catch (error) {
      log.broker.warn({ error: errorMessage(error) }, "failed to close broker connection");
    }
  }

  private transition(next: EngineState): void {
    if (this.state === next) return;
    log.broker.debug({ from: this.state, to: next }, "state transition");
    this.state = next;
  }
}
