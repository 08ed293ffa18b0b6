/**
 * Broker primitives the consumption engine depends on. Topology follows the
 * exchange / queue / binding model; the NATS adapter maps it onto JetStream.
 */

export interface RawMessage {
  readonly body: Uint8Array;
  ack(): void;
}

/**
 * Stream of inbound messages. Iteration ends when the underlying channel
 * closes or `stop()` is called.
 */
export interface MessageStream extends AsyncIterable<RawMessage> {
  stop(): void;
}

export interface BrokerConnection {
  isClosed(): boolean;
  /** Declare a durable direct exchange; safe to repeat */
  declareExchange(name: string): Promise<void>;
  /** Declare a durable queue; safe to repeat */
  declareQueue(name: string): Promise<void>;
  bind(queue: string, exchange: string, routingKey: string): Promise<void>;
  consume(queue: string): MessageStream;
  close(): Promise<void>;
}

export interface BrokerTransport {
  connect(): Promise<BrokerConnection>;
}
