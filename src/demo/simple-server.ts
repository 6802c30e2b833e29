/**
 * Minimal A2A agent server that answers every message with a greeting.
 *
 * Usage: node dist/demo/simple-server.js
 * Set A2A_PROBE_REPLY_MODE=artifact to stream the reply as artifact chunks.
 */
import { loadConfig } from "../config";
import { logger } from "../utils/logger";
import { buildA2AApp } from "../a2a";
import { simpleAgentCard } from "../a2a/agentCard";
import { SimpleAgentExecutor } from "../a2a/SimpleAgentExecutor";

export function main(): void {
  const config = loadConfig();
  const { host, port, publicUrl, corsOrigins, replyMode, chunkSize } = config.server;

  const app = buildA2AApp({
    agentCard: simpleAgentCard(publicUrl),
    executor: new SimpleAgentExecutor({ replyMode, chunkSize }),
    corsOrigins,
  });

  app.listen(port, host, () => {
    logger.log(`A2A agent listening at http://${host}:${port} (advertised as ${publicUrl})`);
  });
}

if (require.main === module) {
  main();
}
