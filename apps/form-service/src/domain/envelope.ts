import { randomUUID } from "node:crypto";
import { z } from "zod";
import { EnvelopeDecodeError } from "./errors.js";

/**
 * Message-bus unit. The identifier is generated per envelope, not per domain event.
 */
export interface Envelope {
  readonly id: string;
  readonly payload: Uint8Array;
  readonly type: string;
  readonly timestamp: Date;
}

/**
 * Wire shape: `{ id, payload, type, timestamp }` with the payload bytes in
 * base64 and the timestamp in ISO-8601.
 */
const envelopeWireSchema = z.object({
  id: z.string().min(1, "id is empty"),
  payload: z
    .string()
    .min(1, "payload is empty")
    .regex(/^[A-Za-z0-9+/]*={0,2}$/, "payload is not base64"),
  type: z.string().min(1, "type is empty"),
  timestamp: z.string().datetime({ offset: true }),
});

export function createEnvelope(type: string, payload: Uint8Array, now: Date = new Date()): Envelope {
  return Object.freeze({
    id: randomUUID(),
    payload: Uint8Array.from(payload),
    type,
    timestamp: new Date(now.getTime()),
  });
}

/**
 * Returns the list of validity violations; empty when the envelope is valid.
 */
export function validateEnvelope(envelope: Envelope): string[] {
  const issues: string[] = [];
  if (envelope.id === "") issues.push("id is empty");
  if (envelope.payload.length === 0) issues.push("payload is empty");
  if (envelope.type === "") issues.push("type is empty");
  return issues;
}

export function encodeEnvelope(envelope: Envelope): Uint8Array {
  const wire = {
    id: envelope.id,
    payload: Buffer.from(envelope.payload).toString("base64"),
    type: envelope.type,
    timestamp: envelope.timestamp.toISOString(),
  };
  return Buffer.from(JSON.stringify(wire), "utf-8");
}

/**
 * Decode raw broker bytes into a valid Envelope.
 * @throws EnvelopeDecodeError on malformed JSON, wrong shape or an invalid envelope
 */
export function decodeEnvelope(raw: Uint8Array): Envelope {
  let json: unknown;
  try {
    json = JSON.parse(Buffer.from(raw).toString("utf-8"));
  } catch (error) {
    throw new EnvelopeDecodeError("envelope is not valid JSON", { cause: error });
  }

  const parsed = envelopeWireSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new EnvelopeDecodeError(`invalid envelope: ${issues}`);
  }

  const payload = Buffer.from(parsed.data.payload, "base64");
  if (payload.length === 0) {
    throw new EnvelopeDecodeError("invalid envelope: payload is empty");
  }

  return Object.freeze({
    id: parsed.data.id,
    payload: new Uint8Array(payload),
    type: parsed.data.type,
    timestamp: new Date(parsed.data.timestamp),
  });
}

/**
 * Parse an envelope payload as JSON and validate it with `schema`.
 */
export function decodePayload<T extends z.ZodTypeAny>(envelope: Envelope, schema: T): z.infer<T> {
  let json: unknown;
  try {
    json = JSON.parse(Buffer.from(envelope.payload).toString("utf-8"));
  } catch (error) {
    throw new EnvelopeDecodeError(`payload of ${envelope.type} envelope is not valid JSON`, { cause: error });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "payload"}: ${issue.message}`)
      .join("; ");
    throw new EnvelopeDecodeError(`invalid ${envelope.type} payload: ${issues}`);
  }
  return parsed.data;
}
