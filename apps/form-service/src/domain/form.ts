/**
 * Form domain model, typed updates and wire serialization.
 *
 * Persistence owns Forms; the orchestrator only holds transient copies for the
 * duration of one mutation.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";

export interface Question {
  id: string;
  formId: string;
  content: string;
  /** Unique within a form; defines presentation order */
  orderNumber: number;
}

export interface Form {
  id: string;
  title: string;
  description: string;
  author: string;
  closed: boolean;
  createdAt: Date;
  questions: Question[];
}

export interface NewQuestion {
  id?: string;
  formId: string;
  content: string;
  orderNumber: number;
}

/**
 * Closed set of form updates. `fields` carries an arbitrary column map that
 * persistence validates; the other variants are checked here.
 */
export type FormUpdate =
  | { kind: "title"; value: string }
  | { kind: "description"; value: string }
  | { kind: "author"; value: string }
  | { kind: "closed"; value: boolean }
  | { kind: "fields"; values: Record<string, unknown> };

// =============================================================================
// Events and cache keys
// =============================================================================

export const FormEvent = {
  Created: "form.created",
  Updated: "form.updated",
  Deleted: "form.deleted",
} as const;

export type FormEventName = (typeof FormEvent)[keyof typeof FormEvent];

export const FORM_CACHE_KEY_PREFIX = "form:";

export function formCacheKey(formId: string): string {
  return `${FORM_CACHE_KEY_PREFIX}${formId}`;
}

// =============================================================================
// Input validation
// =============================================================================

const orderNumberSchema = z.number().int().nonnegative();

export const newQuestionSchema = z.object({
  id: z.string().min(1).optional(),
  formId: z.string().min(1),
  content: z.string(),
  orderNumber: orderNumberSchema,
});

export const newFormSchema = z.object({
  id: z.string().min(1),
  title: z.string().default(""),
  description: z.string().default(""),
  author: z.string().min(1),
  closed: z.boolean().default(false),
  createdAt: z.date().optional(),
  questions: z
    .array(
      z.object({
        id: z.string().min(1).optional(),
        content: z.string(),
        orderNumber: orderNumberSchema,
      })
    )
    .default([]),
});

export type NewForm = z.input<typeof newFormSchema>;

export const formUpdateSchema: z.ZodType<FormUpdate> = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("title"), value: z.string() }),
  z.object({ kind: z.literal("description"), value: z.string() }),
  z.object({ kind: z.literal("author"), value: z.string().min(1) }),
  z.object({ kind: z.literal("closed"), value: z.boolean() }),
  z.object({ kind: z.literal("fields"), values: z.record(z.unknown()) }),
]);

export type ValidationResult<T> =
  | { success: true; value: T }
  | { success: false; issues: string[] };

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/**
 * Validate a creation request and normalize it into a complete Form.
 * Question identifiers left empty are assigned by persistence.
 */
export function toForm(input: unknown, now: Date = new Date()): ValidationResult<Form> {
  if (input === null || input === undefined) {
    return { success: false, issues: ["form is required"] };
  }
  const parsed = newFormSchema.safeParse(input);
  if (!parsed.success) {
    return { success: false, issues: issuesOf(parsed.error) };
  }

  const data = parsed.data;
  const orders = new Set<number>();
  for (const question of data.questions) {
    if (orders.has(question.orderNumber)) {
      return { success: false, issues: [`questions: duplicate order number ${question.orderNumber}`] };
    }
    orders.add(question.orderNumber);
  }

  return {
    success: true,
    value: {
      id: data.id,
      title: data.title,
      description: data.description,
      author: data.author,
      closed: data.closed,
      createdAt: data.createdAt ?? now,
      questions: data.questions.map((question) => ({
        id: question.id ?? randomUUID(),
        formId: data.id,
        content: question.content,
        orderNumber: question.orderNumber,
      })),
    },
  };
}

export function toNewQuestion(input: unknown): ValidationResult<NewQuestion> {
  if (input === null || input === undefined) {
    return { success: false, issues: ["question is required"] };
  }
  const parsed = newQuestionSchema.safeParse(input);
  return parsed.success
    ? { success: true, value: parsed.data }
    : { success: false, issues: issuesOf(parsed.error) };
}

export function validateFormUpdate(input: unknown): ValidationResult<FormUpdate> {
  if (input === null || input === undefined) {
    return { success: false, issues: ["update is required"] };
  }
  const parsed = formUpdateSchema.safeParse(input);
  return parsed.success
    ? { success: true, value: parsed.data }
    : { success: false, issues: issuesOf(parsed.error) };
}

// =============================================================================
// Wire format (cache value, notification payload, inbound creation payload)
// =============================================================================

export interface QuestionWire {
  id: string;
  form_id: string;
  content: string;
  order_number: number;
}

export interface FormWire {
  id: string;
  title: string;
  description: string;
  author: string;
  closed: boolean;
  created_at: string;
  questions: QuestionWire[];
}

export function toFormWire(form: Form): FormWire {
  return {
    id: form.id,
    title: form.title,
    description: form.description,
    author: form.author,
    closed: form.closed,
    created_at: form.createdAt.toISOString(),
    questions: [...form.questions]
      .sort((a, b) => a.orderNumber - b.orderNumber)
      .map((question) => ({
        id: question.id,
        form_id: question.formId,
        content: question.content,
        order_number: question.orderNumber,
      })),
  };
}

export function serializeForm(form: Form): string {
  return JSON.stringify(toFormWire(form));
}

/**
 * Inbound creation payload. Accepts the serialized Form shape with every field
 * but `id` and `author` optional.
 */
export const formWireSchema = z
  .object({
    id: z.string().min(1),
    title: z.string().optional(),
    description: z.string().optional(),
    author: z.string().min(1),
    closed: z.boolean().optional(),
    created_at: z.string().datetime({ offset: true }).optional(),
    questions: z
      .array(
        z.object({
          id: z.string().min(1).optional(),
          content: z.string(),
          order_number: orderNumberSchema,
        })
      )
      .optional(),
  })
  .transform((wire): NewForm => ({
    id: wire.id,
    title: wire.title,
    description: wire.description,
    author: wire.author,
    closed: wire.closed,
    createdAt: wire.created_at === undefined ? undefined : new Date(wire.created_at),
    questions: wire.questions?.map((question) => ({
      id: question.id,
      content: question.content,
      orderNumber: question.order_number,
    })),
  }));
