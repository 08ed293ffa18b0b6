/**
 * In-process stand-ins for persistence, cache, publisher and broker transport.
 */

import type { BrokerConnection, BrokerTransport, MessageStream, RawMessage } from "../src/broker/types.js";
import { createEnvelope, encodeEnvelope, type Envelope } from "../src/domain/envelope.js";
import { FormNotFoundError } from "../src/domain/errors.js";
import type { Form, FormEventName, FormUpdate, NewQuestion } from "../src/domain/form.js";
import { toFormColumns } from "../src/services/form-repository.js";
import type { CacheGateway, FormRepository, NotificationGateway } from "../src/services/types.js";

function cloneForm(form: Form): Form {
  return {
    ...form,
    createdAt: new Date(form.createdAt.getTime()),
    questions: form.questions.map((question) => ({ ...question })),
  };
}

// =============================================================================
// Persistence
// =============================================================================

type RepositoryMethod = keyof FormRepository;

export class InMemoryFormRepository implements FormRepository {
  readonly forms = new Map<string, Form>();
  readonly calls: RepositoryMethod[] = [];
  /** Errors thrown by the next call of each method */
  readonly failures = new Map<RepositoryMethod, unknown>();
  private nextQuestionId = 1;

  failNext(method: RepositoryMethod, error: unknown = new Error(`${method} failed`)): void {
    this.failures.set(method, error);
  }

  seed(form: Form): void {
    this.forms.set(form.id, cloneForm(form));
  }

  async createForm(form: Form): Promise<void> {
    this.enter("createForm");
    if (this.forms.has(form.id)) {
      throw new Error(`duplicate key: form ${form.id}`);
    }
    this.forms.set(form.id, cloneForm(form));
  }

  async createQuestion(question: NewQuestion): Promise<void> {
    this.enter("createQuestion");
    const form = this.forms.get(question.formId);
    if (!form) {
      throw new Error(`foreign key violation: form ${question.formId}`);
    }
    if (form.questions.some((existing) => existing.orderNumber === question.orderNumber)) {
      throw new Error(`duplicate key: order number ${question.orderNumber}`);
    }
    form.questions.push({
      id: question.id ?? this.assignQuestionId(),
      formId: question.formId,
      content: question.content,
      orderNumber: question.orderNumber,
    });
  }

  async get(formId: string): Promise<Form> {
    this.enter("get");
    const form = this.forms.get(formId);
    if (!form) {
      throw new FormNotFoundError(formId);
    }
    return cloneForm(form);
  }

  async update(formId: string, update: FormUpdate): Promise<void> {
    this.enter("update");
    const columns = toFormColumns(update);
    const form = this.forms.get(formId);
    if (!form) {
      throw new FormNotFoundError(formId);
    }
    Object.assign(form, columns);
  }

  async deleteForm(formId: string): Promise<void> {
    this.enter("deleteForm");
    this.forms.delete(formId);
  }

  async deleteQuestion(formId: string, orderNumber: number): Promise<void> {
    this.enter("deleteQuestion");
    const form = this.forms.get(formId);
    if (form) {
      form.questions = form.questions.filter((question) => question.orderNumber !== orderNumber);
    }
  }

  private enter(method: RepositoryMethod): void {
    this.calls.push(method);
    if (this.failures.has(method)) {
      const error = this.failures.get(method);
      this.failures.delete(method);
      throw error;
    }
  }

  private assignQuestionId(): string {
    return `question-${this.nextQuestionId++}`;
  }
}

// =============================================================================
// Cache and publisher
// =============================================================================

export class FakeCache implements CacheGateway {
  readonly entries = new Map<string, string>();
  writeAttempts = 0;
  deleteAttempts = 0;
  /** Number of upcoming write/delete calls that fail */
  failuresLeft = 0;

  async write(key: string, value: string): Promise<void> {
    this.writeAttempts++;
    this.maybeFail();
    this.entries.set(key, value);
  }

  async read(key: string): Promise<string | null> {
    return this.entries.get(key) ?? null;
  }

  async delete(key: string): Promise<void> {
    this.deleteAttempts++;
    this.maybeFail();
    this.entries.delete(key);
  }

  private maybeFail(): void {
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error("cache unavailable");
    }
  }
}

export interface PublishedEvent {
  payload: unknown;
  eventName: FormEventName;
}

export class FakePublisher implements NotificationGateway {
  readonly published: PublishedEvent[] = [];
  attempts = 0;
  /** Number of upcoming publish calls that fail */
  failuresLeft = 0;

  async publish(payload: unknown, eventName: FormEventName): Promise<void> {
    this.attempts++;
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error("broker unavailable");
    }
    this.published.push({ payload, eventName });
  }
}

// =============================================================================
// Broker
// =============================================================================

export class FakeMessageStream implements MessageStream {
  private readonly pending: RawMessage[] = [];
  private wake: (() => void) | null = null;
  private ended = false;

  push(message: RawMessage): void {
    this.pending.push(message);
    this.notify();
  }

  stop(): void {
    this.ended = true;
    this.notify();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<RawMessage> {
    for (;;) {
      const next = this.pending.shift();
      if (next !== undefined) {
        yield next;
        continue;
      }
      if (this.ended) return;
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

export class FakeConnection implements BrokerConnection {
  readonly streams: FakeMessageStream[] = [];
  acked = 0;
  private closed = false;

  constructor(private readonly calls: string[]) {}

  isClosed(): boolean {
    return this.closed;
  }

  async declareExchange(name: string): Promise<void> {
    this.calls.push(`declareExchange:${name}`);
  }

  async declareQueue(name: string): Promise<void> {
    this.calls.push(`declareQueue:${name}`);
  }

  async bind(queue: string, exchange: string, routingKey: string): Promise<void> {
    this.calls.push(`bind:${queue}:${exchange}:${routingKey}`);
  }

  consume(queue: string): MessageStream {
    this.calls.push(`consume:${queue}`);
    const stream = new FakeMessageStream();
    this.streams.push(stream);
    return stream;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.endStreams();
  }

  /** Deliver raw bytes on the most recent consume stream */
  deliver(body: Uint8Array): void {
    const stream = this.streams[this.streams.length - 1];
    if (!stream) {
      throw new Error("no consumer on this connection");
    }
    stream.push({
      body,
      ack: () => {
        this.acked++;
      },
    });
  }

  /** Lose the connection and end its consume streams */
  drop(): void {
    this.closed = true;
    this.endStreams();
  }

  /** Lose the connection without ending its streams */
  dropSilently(): void {
    this.closed = true;
  }

  get consuming(): boolean {
    return this.streams.length > 0;
  }

  private endStreams(): void {
    for (const stream of this.streams) stream.stop();
  }
}

export class FakeBrokerTransport implements BrokerTransport {
  readonly calls: string[] = [];
  readonly connections: FakeConnection[] = [];
  /** Number of upcoming connect calls that fail */
  failuresLeft = 0;
  /** When set, connect waits for it before resolving */
  gate: Promise<void> | null = null;

  async connect(): Promise<BrokerConnection> {
    this.calls.push("connect");
    if (this.gate) {
      await this.gate;
    }
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error("connection refused");
    }
    const connection = new FakeConnection(this.calls);
    this.connections.push(connection);
    return connection;
  }

  connectCount(): number {
    return this.calls.filter((call) => call === "connect").length;
  }
}

// =============================================================================
// Fixtures
// =============================================================================

export function makeForm(overrides: Partial<Form> = {}): Form {
  const id = overrides.id ?? "form-1";
  return {
    id,
    title: "Team survey",
    description: "Quarterly check-in",
    author: "author-1",
    closed: false,
    createdAt: new Date("2024-03-01T10:00:00.000Z"),
    questions: [
      { id: "question-a", formId: id, content: "How are you?", orderNumber: 0 },
      { id: "question-b", formId: id, content: "Anything else?", orderNumber: 1 },
    ],
    ...overrides,
  };
}

export function envelopeBytes(type: string, payload: unknown): Uint8Array {
  return encodeEnvelope(createEnvelope(type, Buffer.from(JSON.stringify(payload), "utf-8")));
}

export function jsonEnvelope(type: string, payload: unknown): Envelope {
  return createEnvelope(type, Buffer.from(JSON.stringify(payload), "utf-8"));
}
