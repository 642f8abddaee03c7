import { formatIssues, TaskSchema } from "../schemas.js";
import type { Task } from "./types.js";

export type TaskValidationResult =
  | { valid: true; tasks: Task[]; errors: [] }
  | { valid: false; tasks: Task[]; errors: string[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate a decoded plan block (`{ tasks: [...] }`). Every problem is
 * reported, prefixed with the 1-based task number, rather than stopping at
 * the first one.
 */
export function validateTasks(plan: unknown): TaskValidationResult {
  if (!isRecord(plan) || !("tasks" in plan)) {
    return { valid: false, tasks: [], errors: ["Invalid structure: missing 'tasks' key"] };
  }
  const raw = plan.tasks;
  if (!Array.isArray(raw)) {
    return { valid: false, tasks: [], errors: ["Invalid structure: 'tasks' must be a list"] };
  }
  if (raw.length === 0) {
    return { valid: false, tasks: [], errors: ["Task list is empty"] };
  }

  const tasks: Task[] = [];
  const errors: string[] = [];
  raw.forEach((item: unknown, i) => {
    const result = TaskSchema.safeParse(item);
    if (result.success) {
      tasks.push(result.data);
    } else {
      errors.push(...formatIssues(result.error.issues).map((e) => `Task ${i + 1}: ${e}`));
    }
  });

  if (errors.length > 0) return { valid: false, tasks, errors };
  return { valid: true, tasks, errors: [] };
}
