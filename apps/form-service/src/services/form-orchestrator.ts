import {
  FormEvent,
  formCacheKey,
  serializeForm,
  toForm,
  toFormWire,
  toNewQuestion,
  validateFormUpdate,
  type Form,
  type FormEventName,
  type FormUpdate,
  type NewForm,
  type NewQuestion,
} from "../domain/form.js";
import {
  MutationError,
  PersistenceError,
  PostWriteFetchError,
  PropagationError,
  ValidationError,
  errorMessage,
  type PropagationTask,
} from "../domain/errors.js";
import { executeWithRetry, TimeoutDelayProvider, type DelayProvider } from "../domain/utils/retry.js";
import { runTaskGroup } from "../domain/utils/task-group.js";
import { log, createTimer } from "../logger.js";
import { formMutationDuration, formMutationsTotal } from "../metrics.js";
import type { CacheGateway, FormRepository, NotificationGateway } from "./types.js";

export type FormOperation =
  | "createForm"
  | "createQuestion"
  | "updateStatus"
  | "updateFields"
  | "updateDescription"
  | "deleteForm"
  | "deleteQuestion";

export interface FormOrchestratorOptions {
  /** Attempts per propagation task (cache, notification) */
  retryAttempts: number;
  /** Fixed delay between two attempts of one propagation task */
  retryDelayMs: number;
  delayProvider?: DelayProvider;
  now?: () => Date;
}

const DEFAULT_OPTIONS: FormOrchestratorOptions = {
  retryAttempts: 3,
  retryDelayMs: 5000,
};

/**
 * Executes each form mutation as persist-then-propagate.
 *
 * 1. Critical phase: one persistence call, never retried here. A failure
 *    aborts before any cache or notification work.
 * 2. Re-read of the form for mutations that do not carry it whole.
 * 3. Cache refresh and notification run concurrently, each with a fixed-delay
 *    retry; both finish before the mutation returns.
 * 4. The first exhausted task (cache before notification) becomes the result.
 *    The persisted write is never undone.
 */
export class FormOrchestrator {
  private readonly options: FormOrchestratorOptions;
  private readonly delayProvider: DelayProvider;
  private readonly now: () => Date;

  constructor(
    private readonly repository: FormRepository,
    private readonly cache: CacheGateway,
    private readonly notifications: NotificationGateway,
    options: Partial<FormOrchestratorOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.delayProvider = options.delayProvider ?? new TimeoutDelayProvider();
    this.now = options.now ?? (() => new Date());
  }

  async createForm(input: NewForm | null | undefined): Promise<void> {
    const operation = "createForm";
    const result = toForm(input, this.now());

    await this.track(operation, result.success ? result.value.id : undefined, async () => {
      if (!result.success) {
        throw new ValidationError(operation, result.issues);
      }
      const form = result.value;

      await this.persist(operation, () => this.repository.createForm(form));
      await this.propagateForm(operation, form, FormEvent.Created);
    });
  }

  async createQuestion(input: NewQuestion | null | undefined): Promise<void> {
    const operation = "createQuestion";
    const result = toNewQuestion(input);

    await this.track(operation, result.success ? result.value.formId : undefined, async () => {
      if (!result.success) {
        throw new ValidationError(operation, result.issues);
      }
      const question = result.value;

      await this.persist(operation, () => this.repository.createQuestion(question));
      await this.refreshAndPropagate(operation, question.formId);
    });
  }

  async updateStatus(formId: string, closed: boolean): Promise<void> {
    await this.applyUpdate("updateStatus", formId, { kind: "closed", value: closed });
  }

  /**
   * Apply any typed update, including an arbitrary column map whose column
   * names are left to persistence to validate.
   */
  async updateFields(formId: string, update: FormUpdate | null | undefined): Promise<void> {
    await this.applyUpdate("updateFields", formId, update);
  }

  async updateDescription(formId: string, description: string): Promise<void> {
    await this.applyUpdate("updateDescription", formId, { kind: "description", value: description });
  }

  async deleteForm(formId: string): Promise<void> {
    const operation = "deleteForm";

    await this.track(operation, formId, async () => {
      this.requireFormId(operation, formId);

      await this.persist(operation, () => this.repository.deleteForm(formId));
      await this.propagate(
        operation,
        () => this.cache.delete(formCacheKey(formId)),
        () => this.notifications.publish({ form_id: formId }, FormEvent.Deleted)
      );
    });
  }

  /**
   * Removes one question; the form itself survives and is re-read, re-cached
   * and re-published like any other update.
   */
  async deleteQuestion(formId: string, orderNumber: number): Promise<void> {
    const operation = "deleteQuestion";

    await this.track(operation, formId, async () => {
      this.requireFormId(operation, formId);
      if (!Number.isInteger(orderNumber) || orderNumber < 0) {
        throw new ValidationError(operation, [`orderNumber: expected a non-negative integer, got ${orderNumber}`]);
      }

      await this.persist(operation, () => this.repository.deleteQuestion(formId, orderNumber));
      await this.refreshAndPropagate(operation, formId);
    });
  }

  // ===========================================================================
  // Protocol steps
  // ===========================================================================

  private async applyUpdate(
    operation: FormOperation,
    formId: string,
    update: FormUpdate | null | undefined
  ): Promise<void> {
    await this.track(operation, formId, async () => {
      this.requireFormId(operation, formId);
      const result = validateFormUpdate(update);
      if (!result.success) {
        throw new ValidationError(operation, result.issues);
      }
      const validated = result.value;

      await this.persist(operation, () => this.repository.update(formId, validated));
      await this.refreshAndPropagate(operation, formId);
    });
  }

  private requireFormId(operation: FormOperation, formId: string): void {
    if (typeof formId !== "string" || formId.length === 0) {
      throw new ValidationError(operation, ["formId: must be a non-empty string"]);
    }
  }

  private async persist(operation: FormOperation, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (error) {
      throw new PersistenceError(operation, error);
    }
  }

  private async refreshAndPropagate(operation: FormOperation, formId: string): Promise<void> {
    let form: Form;
    try {
      form = await this.repository.get(formId);
    } catch (error) {
      throw new PostWriteFetchError(operation, formId, error);
    }
    await this.propagateForm(operation, form, FormEvent.Updated);
  }

  private async propagateForm(operation: FormOperation, form: Form, eventName: FormEventName): Promise<void> {
    const serialized = serializeForm(form);
    await this.propagate(
      operation,
      () => this.cache.write(formCacheKey(form.id), serialized),
      () => this.notifications.publish(toFormWire(form), eventName)
    );
  }

  private async propagate(
    operation: FormOperation,
    cacheStep: () => Promise<void>,
    notifyStep: () => Promise<void>
  ): Promise<void> {
    // Declaration order is the failure priority: cache before notification
    const failure = await runTaskGroup<PropagationTask>([
      { key: "cache", run: () => this.withRetry(operation, "cache", cacheStep) },
      { key: "notification", run: () => this.withRetry(operation, "notification", notifyStep) },
    ]);

    if (failure) {
      throw failure.error;
    }
  }

  private async withRetry(
    operation: FormOperation,
    task: PropagationTask,
    step: () => Promise<void>
  ): Promise<void> {
    const result = await executeWithRetry(
      step,
      {
        attempts: this.options.retryAttempts,
        delayMs: this.options.retryDelayMs,
        onRetry: (attempt, error, delayMs) => {
          log.form.warn({ operation, task, attempt, retryInMs: delayMs, error: errorMessage(error) }, "propagation attempt failed");
        },
      },
      this.delayProvider
    );

    if (!result.success) {
      throw new PropagationError(operation, task, result.attempts, result.error);
    }
  }

  private async track(
    operation: FormOperation,
    formId: string | undefined,
    body: () => Promise<void>
  ): Promise<void> {
    const elapsed = createTimer();
    try {
      await body();
      formMutationsTotal.inc({ operation, outcome: "ok" });
      log.form.info({ operation, formId, durationMs: Math.round(elapsed()) }, "mutation applied");
    } catch (error) {
      const outcome = error instanceof MutationError ? error.code : "unexpected";
      formMutationsTotal.inc({ operation, outcome });
      log.form.error(
        { operation, formId, code: outcome, error: errorMessage(error), durationMs: Math.round(elapsed()) },
        "mutation failed"
      );
      throw error;
    } finally {
      formMutationDuration.observe({ operation }, elapsed() / 1000);
    }
  }
}
