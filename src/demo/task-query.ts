/**
 * Prints everything the agent knows about one task.
 *
 * Usage: node dist/demo/task-query.js <task_id> [base_url]
 */
import { loadConfig } from "../config";
import { errorMessage } from "../core/utils";
import { logger } from "../utils/logger";
import { connectToAgent } from "../a2a/client";
import { formatTaskReport } from "../a2a/format";
import { queryTask } from "../a2a/taskQuery";
import { parseTaskQueryArgs } from "../a2a/validation";

export async function main(argv: string[] = process.argv.slice(2)): Promise<boolean> {
  const config = loadConfig();
  const parsed = parseTaskQueryArgs(argv, config.baseUrl);
  if (!parsed.ok) {
    for (const line of parsed.usage) console.log(line);
    return false;
  }

  const { taskId, baseUrl } = parsed.args;
  console.log(`Querying task ID: ${taskId}`);
  console.log(`Server URL: ${baseUrl}`);

  try {
    const { client } = await connectToAgent(baseUrl);
    logger.log("Fetched agent card successfully");

    const task = await queryTask(client, taskId, config.queryHistoryLength);
    if (!task) {
      console.log("No result found in response");
      return false;
    }
    console.log("");
    for (const line of formatTaskReport(task)) console.log(line);
    return true;
  } catch (err) {
    logger.error("Failed to connect to A2A server:", errorMessage(err));
    console.log(`Error: ${errorMessage(err)}`);
    return false;
  }
}

if (require.main === module) {
  main().catch((err) => {
    logger.error("Task query failed:", errorMessage(err));
    process.exitCode = 1;
  });
}
