import { z } from "zod";

// --- task-query CLI arguments ---
export const TaskQueryArgsSchema = z.object({
  taskId: z.string().trim().min(1, "task id is required"),
  baseUrl: z.string().url("base url must be an absolute URL"),
});

export type TaskQueryArgs = z.infer<typeof TaskQueryArgsSchema>;

export type ParsedTaskQueryArgs =
  | { ok: true; args: TaskQueryArgs }
  | { ok: false; usage: string[] };

const EXAMPLE_TASK_ID = "3f36680c-7f37-4a5f-945e-d78981fafd36";

export function taskQueryUsage(command = "task-query"): string[] {
  return [
    `Usage: ${command} <task_id> [base_url]`,
    `Example: ${command} ${EXAMPLE_TASK_ID}`,
    `Example: ${command} ${EXAMPLE_TASK_ID} http://localhost:8080`,
  ];
}

/**
 * Parse `<task_id> [base_url]`. Anything unusable yields the usage text,
 * preceded by the validation problems when there are any.
 */
export function parseTaskQueryArgs(
  argv: string[],
  defaultBaseUrl: string,
): ParsedTaskQueryArgs {
  if (argv.length === 0) {
    return { ok: false, usage: taskQueryUsage() };
  }

  const parsed = TaskQueryArgsSchema.safeParse({
    taskId: argv[0],
    baseUrl: argv[1] ?? defaultBaseUrl,
  });
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `Error: ${issue.message}`);
    return { ok: false, usage: [...problems, ...taskQueryUsage()] };
  }
  return { ok: true, args: parsed.data };
}
