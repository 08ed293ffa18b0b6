import { z } from "zod";
import type { Config } from "@formhub/config";
import type { BoundedBuffer } from "../domain/buffer/buffer.js";
import { decodePayload, type Envelope } from "../domain/envelope.js";
import { EnvelopeDecodeError, MutationError, errorMessage } from "../domain/errors.js";
import { formWireSchema, type FormUpdate } from "../domain/form.js";
import { log, withTraceAsync } from "../logger.js";
import type { FormOrchestrator } from "../services/form-orchestrator.js";

/** Envelope `type` value per inbound request kind */
export interface RequestTypes {
  create: string;
  createQuestion: string;
  update: string;
  fieldUpdate: string;
  statusUpdate: string;
  descriptionUpdate: string;
  deleteForm: string;
  deleteQuestion: string;
}

export function requestTypesFromConfig(config: Config): RequestTypes {
  return {
    create: config.REQUEST_TYPE_CREATE,
    createQuestion: config.REQUEST_TYPE_CREATE_QUESTION,
    update: config.REQUEST_TYPE_UPDATE,
    fieldUpdate: config.REQUEST_TYPE_FIELD_UPDATE,
    statusUpdate: config.REQUEST_TYPE_STATUS_UPDATE,
    descriptionUpdate: config.REQUEST_TYPE_DESCRIPTION_UPDATE,
    deleteForm: config.REQUEST_TYPE_DELETE_FORM,
    deleteQuestion: config.REQUEST_TYPE_DELETE_QUESTION,
  };
}

export type FormMutations = Pick<
  FormOrchestrator,
  | "createForm"
  | "createQuestion"
  | "updateStatus"
  | "updateFields"
  | "updateDescription"
  | "deleteForm"
  | "deleteQuestion"
>;

export type DispatchOutcome = "handled" | "ignored" | "invalid" | "failed";

// =============================================================================
// Payload schemas
// =============================================================================

const formId = z.string().min(1);
const orderNumber = z.number().int().nonnegative();

const questionCreationSchema = z.object({
  form_id: formId,
  id: z.string().min(1).optional(),
  content: z.string(),
  order_number: orderNumber,
});

const fieldsUpdateSchema = z.object({
  form_id: formId,
  fields: z.record(z.unknown()),
});

const fieldUpdateSchema = z.discriminatedUnion("field", [
  z.object({ form_id: formId, field: z.literal("title"), value: z.string() }),
  z.object({ form_id: formId, field: z.literal("description"), value: z.string() }),
  z.object({ form_id: formId, field: z.literal("author"), value: z.string() }),
  z.object({ form_id: formId, field: z.literal("closed"), value: z.boolean() }),
]);

const statusUpdateSchema = z.object({ form_id: formId, closed: z.boolean() });
const descriptionUpdateSchema = z.object({ form_id: formId, description: z.string() });
const formDeletionSchema = z.object({ form_id: formId });
const questionDeletionSchema = z.object({ form_id: formId, order_number: orderNumber });

function toTypedUpdate(payload: z.infer<typeof fieldUpdateSchema>): FormUpdate {
  switch (payload.field) {
    case "title":
      return { kind: "title", value: payload.value };
    case "description":
      return { kind: "description", value: payload.value };
    case "author":
      return { kind: "author", value: payload.value };
    case "closed":
      return { kind: "closed", value: payload.value };
  }
}

type Handler = (envelope: Envelope) => Promise<void>;

/**
 * Routes decoded envelopes to orchestrator calls by envelope type.
 * Every failure is logged and absorbed here.
 */
export class Dispatcher {
  private readonly handlers: Map<string, Handler>;

  constructor(
    private readonly mutations: FormMutations,
    types: RequestTypes
  ) {
    this.handlers = new Map<string, Handler>([
      [
        types.create,
        (envelope) => this.mutations.createForm(decodePayload(envelope, formWireSchema)),
      ],
      [
        types.createQuestion,
        async (envelope) => {
          const payload = decodePayload(envelope, questionCreationSchema);
          await this.mutations.createQuestion({
            id: payload.id,
            formId: payload.form_id,
            content: payload.content,
            orderNumber: payload.order_number,
          });
        },
      ],
      [
        types.update,
        async (envelope) => {
          const payload = decodePayload(envelope, fieldsUpdateSchema);
          await this.mutations.updateFields(payload.form_id, { kind: "fields", values: payload.fields });
        },
      ],
      [
        types.fieldUpdate,
        async (envelope) => {
          const payload = decodePayload(envelope, fieldUpdateSchema);
          await this.mutations.updateFields(payload.form_id, toTypedUpdate(payload));
        },
      ],
      [
        types.statusUpdate,
        async (envelope) => {
          const payload = decodePayload(envelope, statusUpdateSchema);
          await this.mutations.updateStatus(payload.form_id, payload.closed);
        },
      ],
      [
        types.descriptionUpdate,
        async (envelope) => {
          const payload = decodePayload(envelope, descriptionUpdateSchema);
          await this.mutations.updateDescription(payload.form_id, payload.description);
        },
      ],
      [
        types.deleteForm,
        async (envelope) => {
          const payload = decodePayload(envelope, formDeletionSchema);
          await this.mutations.deleteForm(payload.form_id);
        },
      ],
      [
        types.deleteQuestion,
        async (envelope) => {
          const payload = decodePayload(envelope, questionDeletionSchema);
          await this.mutations.deleteQuestion(payload.form_id, payload.order_number);
        },
      ],
    ]);
  }

  async dispatch(envelope: Envelope): Promise<DispatchOutcome> {
    const handler = this.handlers.get(envelope.type);
    if (!handler) {
      log.dispatch.warn({ envelopeId: envelope.id, type: envelope.type }, "unknown request type, ignoring");
      return "ignored";
    }

    try {
      await handler(envelope);
      log.dispatch.debug({ envelopeId: envelope.id, type: envelope.type }, "request handled");
      return "handled";
    } catch (error) {
      if (error instanceof EnvelopeDecodeError) {
        log.dispatch.error({ envelopeId: envelope.id, type: envelope.type, error: error.message }, "invalid request payload, dropping");
        return "invalid";
      }
      log.dispatch.error(
        {
          envelopeId: envelope.id,
          type: envelope.type,
          code: error instanceof MutationError ? error.code : "unexpected",
          committed: error instanceof MutationError ? error.committed : undefined,
          error: errorMessage(error),
        },
        "request failed"
      );
      return "failed";
    }
  }

  /**
   * Drain the delivery queue until it closes or `signal` is aborted.
   * Envelopes are handled one at a time, each in its own trace context.
   */
  async run(queue: BoundedBuffer<Envelope>, signal: AbortSignal): Promise<void> {
    log.dispatch.info({ types: [...this.handlers.keys()] }, "dispatcher started");

    for (;;) {
      const envelope = await queue.take(signal);
      if (envelope === undefined) break;
      await withTraceAsync(() => this.dispatch(envelope), envelope.id);
    }

    log.dispatch.info({}, "dispatcher stopped");
  }
}
