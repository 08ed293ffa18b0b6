import type { Form, FormEventName, FormUpdate, NewQuestion } from "../domain/form.js";

/**
 * Durable store for forms and questions. Each call is atomic pass/fail from
 * the caller's perspective.
 */
export interface FormRepository {
  createForm(form: Form): Promise<void>;
  createQuestion(question: NewQuestion): Promise<void>;
  /** @throws FormNotFoundError when no form has this id */
  get(formId: string): Promise<Form>;
  update(formId: string, update: FormUpdate): Promise<void>;
  deleteForm(formId: string): Promise<void>;
  deleteQuestion(formId: string, orderNumber: number): Promise<void>;
}

/**
 * Key-value cache without expiration.
 */
export interface CacheGateway {
  write(key: string, value: string): Promise<void>;
  read(key: string): Promise<string | null>;
  delete(key: string): Promise<void>;
}

/**
 * Publishes one domain event per call; retries belong to the caller.
 */
export interface NotificationGateway {
  publish(payload: unknown, eventName: FormEventName): Promise<void>;
}

export interface HealthCheckable {
  healthCheck(): Promise<boolean>;
}
