/**
 * Structured concurrent task group.
 *
 * Every task starts immediately; the group settles only after all of them have
 * finished, and reports the first failure in declaration order so the outcome
 * does not depend on which task happened to finish first.
 */

export interface GroupTask<K extends string = string> {
  key: K;
  run: () => Promise<void>;
}

export interface TaskFailure<K extends string = string> {
  key: K;
  error: unknown;
}

export async function runTaskGroup<K extends string>(
  tasks: readonly GroupTask<K>[]
): Promise<TaskFailure<K> | undefined> {
  // Promise.resolve().then defers the call, so a task that throws synchronously
  // still becomes a rejected promise instead of aborting the group
  const settled = await Promise.allSettled(
    tasks.map((task) => Promise.resolve().then(task.run))
  );

  for (let i = 0; i < settled.length; i++) {
    const outcome = settled[i];
    if (outcome.status === "rejected") {
      return { key: tasks[i].key, error: outcome.reason };
    }
  }
  return undefined;
}
