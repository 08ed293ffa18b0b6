import {
  pgTable,
  uuid,
  varchar,
  text,
  timestamp,
  integer,
  boolean,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import { relations } from "drizzle-orm";

// Forms table
export const forms = pgTable("forms", {
  id: varchar("id", { length: 64 }).primaryKey(),
  title: varchar("title", { length: 255 }).default("").notNull(),
  description: text("description").default("").notNull(),
  author: varchar("author", { length: 255 }).notNull(),
  closed: boolean("closed").default(false).notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

// Questions table (lifecycle bound to the parent form)
export const questions = pgTable(
  "questions",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    formId: varchar("form_id", { length: 64 })
      .notNull()
      .references(() => forms.id, { onDelete: "cascade", onUpdate: "cascade" }),
    content: text("content").notNull(),
    orderNumber: integer("order_number").notNull(),
  },
  (table) => ({
    formIdIdx: index("questions_form_id_idx").on(table.formId),
    formOrderIdx: uniqueIndex("questions_form_order_idx").on(table.formId, table.orderNumber),
  })
);

// Relations
export const formsRelations = relations(forms, ({ many }) => ({
  questions: many(questions),
}));

export const questionsRelations = relations(questions, ({ one }) => ({
  form: one(forms, {
    fields: [questions.formId],
    references: [forms.id],
  }),
}));

// Type exports
export type FormRow = typeof forms.$inferSelect;
export type NewFormRow = typeof forms.$inferInsert;
export type QuestionRow = typeof questions.$inferSelect;
export type NewQuestionRow = typeof questions.$inferInsert;
