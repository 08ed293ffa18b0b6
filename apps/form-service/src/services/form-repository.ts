import { and, eq, sql } from "drizzle-orm";
import { z } from "zod";
import { forms, questions, type Database, type NewFormRow, type NewQuestionRow } from "@formhub/db";
import { FormNotFoundError, InvalidFormUpdateError, errorMessage } from "../domain/errors.js";
import type { Form, FormUpdate, NewQuestion } from "../domain/form.js";
import { createTimer, log } from "../logger.js";
import type { FormRepository, HealthCheckable } from "./types.js";

export type FormColumns = Partial<Pick<NewFormRow, "title" | "description" | "author" | "closed">>;

/**
 * Columns a `fields` update may touch. `id` and `createdAt` are immutable.
 */
const formColumnsSchema = z
  .object({
    title: z.string().max(255).optional(),
    description: z.string().optional(),
    author: z.string().min(1).max(255).optional(),
    closed: z.boolean().optional(),
  })
  .strict()
  .refine((columns) => Object.keys(columns).length > 0, { message: "no columns to update" });

/**
 * Translate a typed update into the column set to write.
 * @throws InvalidFormUpdateError for unknown, immutable or mistyped columns
 */
export function toFormColumns(update: FormUpdate): FormColumns {
  switch (update.kind) {
    case "title":
      return { title: update.value };
    case "description":
      return { description: update.value };
    case "author":
      return { author: update.value };
    case "closed":
      return { closed: update.value };
    case "fields": {
      const parsed = formColumnsSchema.safeParse(update.values);
      if (!parsed.success) {
        throw new InvalidFormUpdateError(
          parsed.error.issues.map((issue) =>
            issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
          )
        );
      }
      return parsed.data;
    }
  }
}

function toQuestionRow(question: NewQuestion): NewQuestionRow {
  const row: NewQuestionRow = {
    formId: question.formId,
    content: question.content,
    orderNumber: question.orderNumber,
  };
  // Empty ids are assigned by the database
  if (question.id) {
    row.id = question.id;
  }
  return row;
}

/**
 * PostgreSQL persistence for forms and their questions.
 */
export class DrizzleFormRepository implements FormRepository, HealthCheckable {
  constructor(private readonly db: Database) {}

  async createForm(form: Form): Promise<void> {
    const timer = createTimer();

    await this.db.transaction(async (tx) => {
      await tx.insert(forms).values({
        id: form.id,
        title: form.title,
        description: form.description,
        author: form.author,
        closed: form.closed,
        createdAt: form.createdAt,
      });

      if (form.questions.length > 0) {
        await tx.insert(questions).values(form.questions.map(toQuestionRow));
      }
    });

    log.db.debug({ formId: form.id, questions: form.questions.length, durationMs: Math.round(timer()) }, "form inserted");
  }

  async createQuestion(question: NewQuestion): Promise<void> {
    await this.db.insert(questions).values(toQuestionRow(question));
    log.db.debug({ formId: question.formId, orderNumber: question.orderNumber }, "question inserted");
  }

  async get(formId: string): Promise<Form> {
    const row = await this.db.query.forms.findFirst({
      where: eq(forms.id, formId),
      with: {
        questions: {
          orderBy: (question, { asc }) => [asc(question.orderNumber)],
        },
      },
    });

    if (!row) {
      throw new FormNotFoundError(formId);
    }

    return {
      id: row.id,
      title: row.title,
      description: row.description,
      author: row.author,
      closed: row.closed,
      createdAt: row.createdAt,
      questions: row.questions.map((question) => ({
        id: question.id,
        formId: question.formId,
        content: question.content,
        orderNumber: question.orderNumber,
      })),
    };
  }

  async update(formId: string, update: FormUpdate): Promise<void> {
    const columns = toFormColumns(update);

    const updated = await this.db
      .update(forms)
      .set(columns)
      .where(eq(forms.id, formId))
      .returning({ id: forms.id });

    if (updated.length === 0) {
      throw new FormNotFoundError(formId);
    }
    log.db.debug({ formId, columns: Object.keys(columns) }, "form updated");
  }

  /** Questions go with the form (cascade). Deleting a missing form is a no-op. */
  async deleteForm(formId: string): Promise<void> {
    const deleted = await this.db.delete(forms).where(eq(forms.id, formId)).returning({ id: forms.id });
    log.db.debug({ formId, deleted: deleted.length }, "form deleted");
  }

  async deleteQuestion(formId: string, orderNumber: number): Promise<void> {
    const deleted = await this.db
      .delete(questions)
      .where(and(eq(questions.formId, formId), eq(questions.orderNumber, orderNumber)))
      .returning({ id: questions.id });
    log.db.debug({ formId, orderNumber, deleted: deleted.length }, "question deleted");
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.db.execute(sql`select 1`);
      return true;
    } catch (error) {
      log.db.error({ error: errorMessage(error) }, "database health check failed");
      return false;
    }
  }
}
