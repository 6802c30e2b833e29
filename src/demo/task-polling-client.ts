/**
 * Sends one message, then polls the resulting task until it settles.
 *
 * Usage: node dist/demo/task-polling-client.js
 */
import { loadConfig } from "../config";
import { errorMessage } from "../core/utils";
import { logger } from "../utils/logger";
import { connectToAgent, sendMessageForTaskId } from "../a2a/client";
import { formatHistory, formatPollUpdate } from "../a2a/format";
import { pollTaskStatus } from "../a2a/poller";

export async function main(): Promise<void> {
  const config = loadConfig();
  const { client, card } = await connectToAgent(config.baseUrl);
  logger.log("Fetched agent card:", card);

  console.log("Sending message...");
  const taskId = await sendMessageForTaskId(client, config.prompt);
  if (!taskId) {
    logger.error("Failed to get task ID from message send");
    return;
  }
  console.log(`Task ID received: ${taskId}`);

  const { maxPolls, intervalMs, historyLength } = config.polling;
  console.log(`Polling task status for task ID: ${taskId}`);
  const report = await pollTaskStatus(client, taskId, {
    maxPolls,
    intervalMs,
    historyLength,
    onPoll: (task, attempt) => {
      for (const line of formatPollUpdate(task, attempt)) console.log(line);
    },
  });

  switch (report.outcome) {
    case "terminal": {
      const history = report.task?.history ?? [];
      console.log(`\nTask finished with status: ${report.task?.status.state}`);
      if (history.length > 0) {
        console.log(`\nFinal Task History (${history.length} messages):`);
        for (const line of formatHistory(history)) console.log(line);
      }
      break;
    }
    case "exhausted":
      console.log(`Reached maximum polls (${maxPolls}). Task may still be running.`);
      break;
    case "error":
      console.log(`Polling stopped after ${report.attempts} attempt(s): ${report.error}`);
      break;
  }
}

if (require.main === module) {
  main().catch((err) => {
    logger.error("Task polling client failed:", errorMessage(err));
    process.exitCode = 1;
  });
}
