/**
 * Streams one message to an A2A agent and prints artifacts as they grow.
 *
 * Usage: node dist/demo/streaming-client.js
 * Target and prompt come from A2A_PROBE_BASE_URL and A2A_PROBE_PROMPT.
 */
import { loadConfig } from "../config";
import { errorMessage } from "../core/utils";
import { logger } from "../utils/logger";
import { aggregateStream } from "../a2a/aggregator";
import {
  buildUserMessage,
  connectToAgent,
  streamFrames,
  supportsStreaming,
} from "../a2a/client";
import { formatArtifactSummary } from "../a2a/format";

export async function main(): Promise<void> {
  const config = loadConfig();
  const { client, card } = await connectToAgent(config.baseUrl);
  logger.log("Fetched agent card:", card);

  if (!supportsStreaming(card)) {
    logger.error("Agent does not support streaming.");
    return;
  }

  console.log("Streaming response:");
  const summary = await aggregateStream(
    streamFrames(client, { message: buildUserMessage(config.prompt) }),
    {
      onArtifact: (artifactId, text) =>
        process.stdout.write(`\rArtifact '${artifactId}': ${text}`),
      onMessage: (text) => console.log(`Agent: ${text}`),
      onStatus: (_state, final) => {
        if (final) console.log("\nStream finished.");
      },
    },
  );

  if (summary.taskId) {
    console.log(`Task ID: ${summary.taskId}`);
  }
  console.log("\nFinal artifacts:");
  for (const line of formatArtifactSummary(summary.artifacts)) {
    console.log(line);
  }
}

if (require.main === module) {
  main().catch((err) => {
    logger.error("Streaming client failed:", errorMessage(err));
    process.exitCode = 1;
  });
}
