import { errorMessage } from "../core/utils";
import { logger } from "../utils/logger";
import type { TaskQueryClient } from "./client";
import { isErrorReply, type GetTaskResponse, type Task } from "./types";

export const DEFAULT_QUERY_HISTORY_LENGTH = 20;

/**
 * Fetch one task snapshot. Failures are logged and yield undefined.
 */
export async function queryTask(
  client: TaskQueryClient,
  taskId: string,
  historyLength: number = DEFAULT_QUERY_HISTORY_LENGTH,
): Promise<Task | undefined> {
  let response: GetTaskResponse;
  try {
    response = await client.getTask({ id: taskId, historyLength });
  } catch (err) {
    logger.error("Error querying task status:", errorMessage(err));
    return undefined;
  }

  if (isErrorReply(response)) {
    logger.error("Error querying task:", response.error.message);
    return undefined;
  }

  return response.result ?? undefined;
}
