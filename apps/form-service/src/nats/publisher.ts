import { headers as natsHeaders, type JetStreamClient, type NatsConnection } from "nats";
import { createEnvelope, encodeEnvelope } from "../domain/envelope.js";
import { errorMessage } from "../domain/errors.js";
import type { FormEventName } from "../domain/form.js";
import { createTimer, getTraceId, log } from "../logger.js";
import type { HealthCheckable, NotificationGateway } from "../services/types.js";
import { ensureStream, openNatsConnection, type NatsSettings } from "./client.js";

interface PublisherSession {
  nc: NatsConnection;
  js: JetStreamClient;
}

/**
 * Publishes form events to the output exchange (stream) as envelopes on
 * subject `<exchange>.<eventName>`. A closed connection is reopened on the
 * next publish; retries belong to the caller.
 */
export class NatsNotificationPublisher implements NotificationGateway, HealthCheckable {
  private session: PublisherSession | null = null;
  private opening: Promise<PublisherSession> | null = null;
  private isClosing = false;

  constructor(
    private readonly settings: NatsSettings,
    private readonly exchange: string
  ) {}

  /** Open the connection and declare the output stream */
  async connect(): Promise<void> {
    await this.getSession();
  }

  async publish(payload: unknown, eventName: FormEventName): Promise<void> {
    const timer = createTimer();
    const { js } = await this.getSession();

    const envelope = createEnvelope(eventName, Buffer.from(JSON.stringify(payload), "utf-8"));
    const subject = `${this.exchange}.${eventName}`;

    const hdrs = natsHeaders();
    const traceId = getTraceId();
    if (traceId) {
      hdrs.set("X-Trace-Id", traceId);
    }

    const ack = await js.publish(subject, encodeEnvelope(envelope), {
      msgID: envelope.id,
      headers: hdrs,
    });

    log.broker.debug(
      { subject, envelopeId: envelope.id, seq: ack.seq, duplicate: ack.duplicate, durationMs: Math.round(timer()) },
      "event published"
    );
  }

  async healthCheck(): Promise<boolean> {
    const session = this.session;
    if (session === null || session.nc.isClosed()) return false;

    try {
      await session.nc.flush();
      return true;
    } catch (error) {
      log.broker.error({ error: errorMessage(error) }, "publisher health check failed");
      return false;
    }
  }

  async close(): Promise<void> {
    this.isClosing = true;
    const session = this.session;
    this.session = null;
    if (session !== null && !session.nc.isClosed()) {
      await session.nc.drain();
      log.broker.info({}, "publisher connection closed");
    }
  }

  private getSession(): Promise<PublisherSession> {
    if (this.isClosing) {
      return Promise.reject(new Error("publisher is closed"));
    }

    const current = this.session;
    if (current !== null && !current.nc.isClosed()) {
      return Promise.resolve(current);
    }

    if (this.opening === null) {
      this.opening = this.open().finally(() => {
        this.opening = null;
      });
    }
    return this.opening;
  }

  private async open(): Promise<PublisherSession> {
    const nc = await openNatsConnection(this.settings, "publisher");
    try {
      const jsm = await nc.jetstreamManager();
      await ensureStream(jsm, this.exchange, this.settings.replicas);
    } catch (error) {
      await nc.close();
      throw error;
    }

    const session: PublisherSession = { nc, js: nc.jetstream() };
    this.session = session;
    log.broker.info({ exchange: this.exchange }, "publisher ready");
    return session;
  }
}
