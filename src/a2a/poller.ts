import type { Sleep } from "../core/types";
import { errorMessage, sleep } from "../core/utils";
import { logger } from "../utils/logger";
import type { TaskQueryClient } from "./client";
import {
  isErrorReply,
  isTerminalState,
  type GetTaskResponse,
  type Task,
} from "./types";

export const DEFAULT_MAX_POLLS = 30;
export const DEFAULT_POLL_INTERVAL_MS = 2000;
export const DEFAULT_POLL_HISTORY_LENGTH = 5;

const NO_RESULT = "Response carried neither a result nor an error";

export interface PollOptions {
  maxPolls?: number;
  intervalMs?: number;
  historyLength?: number;
  sleep?: Sleep;
  onPoll?: (task: Task, attempt: number) => void;
}

export type PollOutcome = "terminal" | "exhausted" | "error";

export interface PollReport {
  outcome: PollOutcome;
  attempts: number;
  /** Latest snapshot received, if any poll succeeded. */
  task?: Task;
  error?: string;
}

/**
 * Poll `tasks/get` until the task reaches a terminal state, a query fails, or
 * the poll budget is spent. Never throws; the outcome says how it ended.
 */
export async function pollTaskStatus(
  client: TaskQueryClient,
  taskId: string,
  options: PollOptions = {},
): Promise<PollReport> {
  const {
    maxPolls = DEFAULT_MAX_POLLS,
    intervalMs = DEFAULT_POLL_INTERVAL_MS,
    historyLength = DEFAULT_POLL_HISTORY_LENGTH,
    sleep: wait = sleep,
    onPoll,
  } = options;

  let latest: Task | undefined;

  for (let attempt = 1; attempt <= maxPolls; attempt++) {
    let response: GetTaskResponse;
    try {
      response = await client.getTask({ id: taskId, historyLength });
    } catch (err) {
      logger.error("Error during polling:", errorMessage(err));
      return { outcome: "error", attempts: attempt, task: latest, error: errorMessage(err) };
    }

    if (isErrorReply(response)) {
      logger.error("Error querying task:", response.error.message);
      return {
        outcome: "error",
        attempts: attempt,
        task: latest,
        error: response.error.message,
      };
    }

    if (response.result == null) {
      logger.error("Error querying task:", NO_RESULT);
      return { outcome: "error", attempts: attempt, task: latest, error: NO_RESULT };
    }

    latest = response.result;
    onPoll?.(latest, attempt);

    if (isTerminalState(latest.status.state)) {
      return { outcome: "terminal", attempts: attempt, task: latest };
    }

    if (attempt < maxPolls) {
      await wait(intervalMs);
    }
  }

  logger.log(`Reached maximum polls (${maxPolls}) for task ${taskId}.`);
  return { outcome: "exhausted", attempts: Math.max(maxPolls, 0), task: latest };
}
