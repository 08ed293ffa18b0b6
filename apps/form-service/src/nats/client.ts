import {
  connect,
  AckPolicy,
  DeliverPolicy,
  DiscardPolicy,
  ReplayPolicy,
  RetentionPolicy,
  StorageType,
  type ConnectionOptions,
  type ConsumerMessages,
  type JetStreamClient,
  type JetStreamManager,
  type NatsConnection,
  type TlsOptions,
} from "nats";
import { readFileSync } from "node:fs";
import type { Config } from "@formhub/config";
import type { BrokerConnection, BrokerTransport, MessageStream, RawMessage } from "../broker/types.js";
import { errorMessage } from "../domain/errors.js";
import { log } from "../logger.js";

export interface NatsSettings {
  servers: string[];
  /** Client name prefix; a role suffix is appended per connection */
  name: string;
  replicas: number;
  /** Reconnects the client attempts on its own before the connection closes */
  maxReconnectAttempts: number;
  tls?: TlsOptions;
}

export function natsSettingsFromConfig(config: Config): NatsSettings {
  const settings: NatsSettings = {
    servers: config.NATS_CLUSTER.split(",").map((server) => server.trim()),
    name: config.SERVICE_ID,
    replicas: config.NATS_REPLICAS,
    maxReconnectAttempts: config.NATS_MAX_RECONNECT_ATTEMPTS,
  };

  if (config.NATS_TLS_ENABLED) {
    const tls: TlsOptions = {};

    if (config.NATS_TLS_CA_FILE) {
      tls.ca = readFileSync(config.NATS_TLS_CA_FILE, "utf-8");
      log.system.debug({ caFile: config.NATS_TLS_CA_FILE }, "loaded NATS CA certificate");
    }

    // Client certificate for mutual TLS
    if (config.NATS_TLS_CERT_FILE && config.NATS_TLS_KEY_FILE) {
      tls.cert = readFileSync(config.NATS_TLS_CERT_FILE, "utf-8");
      tls.key = readFileSync(config.NATS_TLS_KEY_FILE, "utf-8");
      log.system.debug({}, "loaded NATS client certificate");
    }

    settings.tls = tls;
  }

  return settings;
}

export function buildConnectionOptions(settings: NatsSettings, role: string): ConnectionOptions {
  const options: ConnectionOptions = {
    servers: settings.servers,
    name: `${settings.name}-${role}`,
    reconnect: true,
    maxReconnectAttempts: settings.maxReconnectAttempts,
    reconnectTimeWait: 1000,
    reconnectJitter: 1000,
    reconnectJitterTLS: 2000,
    pingInterval: 30000,
    maxPingOut: 3,
  };
  if (settings.tls) {
    options.tls = settings.tls;
  }
  return options;
}

/**
 * Open a NATS connection and log its status changes until it closes.
 */
export async function openNatsConnection(settings: NatsSettings, role: string): Promise<NatsConnection> {
  log.broker.info({ servers: settings.servers, role, tls: settings.tls !== undefined }, "connecting to NATS");
  const nc = await connect(buildConnectionOptions(settings, role));

  const watchStatus = async () => {
    for await (const status of nc.status()) {
      log.broker.info({ role, status: status.type, data: status.data }, "NATS status update");
    }
  };
  watchStatus().catch((error) => {
    log.broker.warn({ role, error: errorMessage(error) }, "NATS status watcher stopped");
  });

  nc.closed()
    .then((error) => {
      if (error) {
        log.broker.error({ role, error: errorMessage(error) }, "NATS connection closed with error");
      } else {
        log.broker.info({ role }, "NATS connection closed");
      }
    })
    .catch((error) => {
      log.broker.warn({ role, error: errorMessage(error) }, "NATS close watcher failed");
    });

  return nc;
}

// =============================================================================
// Topology: exchange → stream, queue binding → durable consumer
// =============================================================================

/**
 * Ensure stream `name` exists with subjects `name.>`. A concurrent creator is
 * tolerated.
 */
export async function ensureStream(jsm: JetStreamManager, name: string, replicas: number): Promise<void> {
  try {
    await jsm.streams.info(name);
    log.broker.debug({ stream: name }, "stream already exists");
    return;
  } catch {
    log.broker.info({ stream: name }, "creating stream");
  }

  try {
    await jsm.streams.add({
      name,
      subjects: [`${name}.>`],
      retention: RetentionPolicy.Limits,
      storage: StorageType.File,
      num_replicas: replicas,
      discard: DiscardPolicy.Old,
      max_age: 24 * 60 * 60 * 1e9, // 24 hours in nanoseconds
      duplicate_window: 2 * 60 * 1e9, // 2 minutes deduplication window
    });
    log.broker.info({ stream: name }, "stream created");
  } catch (error) {
    if (errorMessage(error).includes("stream name already in use")) {
      log.broker.info({ stream: name }, "stream was created by another instance");
      return;
    }
    throw error;
  }
}

/**
 * Ensure durable consumer `name` on `stream` filtering `filterSubject`.
 */
export async function ensureConsumer(
  jsm: JetStreamManager,
  stream: string,
  name: string,
  filterSubject: string
): Promise<void> {
  try {
    await jsm.consumers.info(stream, name);
    log.broker.debug({ stream, consumer: name }, "consumer already exists");
    return;
  } catch {
    log.broker.info({ stream, consumer: name, filterSubject }, "creating consumer");
  }

  try {
    await jsm.consumers.add(stream, {
      name,
      durable_name: name,
      filter_subject: filterSubject,
      ack_policy: AckPolicy.Explicit,
      ack_wait: 30 * 1e9, // 30 seconds
      max_ack_pending: 200,
      deliver_policy: DeliverPolicy.All,
      replay_policy: ReplayPolicy.Instant,
    });
    log.broker.info({ stream, consumer: name }, "consumer created");
  } catch (error) {
    if (errorMessage(error).includes("consumer name already in use")) {
      log.broker.info({ stream, consumer: name }, "consumer was created by another instance");
      return;
    }
    throw error;
  }
}

// =============================================================================
// Consume stream
// =============================================================================

/**
 * Merges the JetStream consumers named after one queue across every stream it
 * is bound to. Streams bound later join through attach(). Ends when all of
 * them end, on failure, or on stop().
 */
export class JetStreamMessageStream implements MessageStream {
  private readonly pending: RawMessage[] = [];
  private readonly subscriptions: ConsumerMessages[] = [];
  private readonly attached = new Set<string>();
  private open = 0;
  private wake: (() => void) | null = null;
  private stopped = false;
  private failure: unknown = null;

  constructor(
    private readonly js: JetStreamClient,
    private readonly queue: string,
    streams: readonly string[],
    private readonly maxMessages = 100
  ) {
    if (streams.length === 0) {
      this.stop();
      return;
    }
    for (const stream of streams) {
      this.attach(stream);
    }
  }

  /** Start reading the queue's consumer on one more stream */
  attach(stream: string): void {
    if (this.stopped || this.attached.has(stream)) return;
    this.attached.add(stream);
    this.open++;
    void this.subscribe(stream).then(
      () => this.release(),
      (error: unknown) => this.fail(error)
    );
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    for (const subscription of this.subscriptions) {
      subscription.stop();
    }
    this.notify();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<RawMessage> {
    for (;;) {
      const next = this.pending.shift();
      if (next !== undefined) {
        yield next;
        continue;
      }
      if (this.failure !== null) throw this.failure;
      if (this.stopped) return;
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  private async subscribe(stream: string): Promise<void> {
    const consumer = await this.js.consumers.get(stream, this.queue);
    const messages = await consumer.consume({ max_messages: this.maxMessages });
    if (this.stopped) {
      messages.stop();
      return;
    }
    this.subscriptions.push(messages);
    await this.pump(messages);
  }

  private release(): void {
    this.open--;
    if (this.open === 0) this.stop();
  }

  private async pump(messages: ConsumerMessages): Promise<void> {
    for await (const msg of messages) {
      this.pending.push({ body: msg.data, ack: () => msg.ack() });
      this.notify();
    }
  }

  private fail(error: unknown): void {
    this.failure = error;
    this.stop();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

// =============================================================================
// Broker connection and transport
// =============================================================================

export class NatsBrokerConnection implements BrokerConnection {
  /** queue → streams it is bound to */
  private readonly bindings = new Map<string, Set<string>>();
  /** queue → its open consume stream */
  private readonly live = new Map<string, JetStreamMessageStream>();
  private readonly js: JetStreamClient;

  constructor(
    private readonly nc: NatsConnection,
    private readonly jsm: JetStreamManager,
    private readonly replicas: number
  ) {
    this.js = nc.jetstream();
  }

  isClosed(): boolean {
    return this.nc.isClosed();
  }

  async declareExchange(name: string): Promise<void> {
    await ensureStream(this.jsm, name, this.replicas);
  }

  async declareQueue(name: string): Promise<void> {
    // JetStream consumers live on streams; the queue exists once it is bound
    if (!this.bindings.has(name)) {
      this.bindings.set(name, new Set());
    }
  }

  async bind(queue: string, exchange: string, routingKey: string): Promise<void> {
    await ensureConsumer(this.jsm, exchange, queue, `${exchange}.${routingKey}`);
    const streams = this.bindings.get(queue) ?? new Set<string>();
    streams.add(exchange);
    this.bindings.set(queue, streams);
    this.live.get(queue)?.attach(exchange);
  }

  consume(queue: string): MessageStream {
    const streams = [...(this.bindings.get(queue) ?? [])];
    const stream = new JetStreamMessageStream(this.js, queue, streams);
    this.live.set(queue, stream);
    return stream;
  }

  async close(): Promise<void> {
    if (this.nc.isClosed()) return;
    await this.nc.drain();
  }
}

export class NatsBrokerTransport implements BrokerTransport {
  constructor(private readonly settings: NatsSettings) {}

  async connect(): Promise<BrokerConnection> {
    const nc = await openNatsConnection(this.settings, "consumer");
    try {
      const jsm = await nc.jetstreamManager();
      return new NatsBrokerConnection(nc, jsm, this.settings.replicas);
    } catch (error) {
      await nc.close();
      throw error;
    }
  }
}
