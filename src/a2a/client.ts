import { AGENT_CARD_PATH } from "@a2a-js/sdk";
import { A2AClient, type A2AClientOptions } from "@a2a-js/sdk/client";
import { v4 as uuidv4 } from "uuid";

import { errorMessage } from "../core/utils";
import { logger } from "../utils/logger";
import {
  isErrorReply,
  type AgentCard,
  type GetTaskResponse,
  type Message,
  type MessageSendParams,
  type SendMessageResponse,
  type SendStreamingMessageSuccessResponse,
  type StreamEvent,
  type TaskQueryParams,
} from "./types";

export { A2AClient } from "@a2a-js/sdk/client";
export type { A2AClientOptions } from "@a2a-js/sdk/client";

/** The slice of the SDK client that task queries and polling need. */
export interface TaskQueryClient {
  getTask(params: TaskQueryParams): Promise<GetTaskResponse>;
}

/** The slice of the SDK client the example scripts talk to. */
export interface MessagingClient extends TaskQueryClient {
  sendMessage(params: MessageSendParams): Promise<SendMessageResponse>;
  sendMessageStream(params: MessageSendParams): AsyncIterable<StreamEvent>;
}

export interface AgentConnection {
  client: A2AClient;
  card: AgentCard;
}

/**
 * Well-known agent card location for an agent served at `baseUrl`.
 */
export function agentCardUrl(baseUrl: string): string {
  const base = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
  return new URL(AGENT_CARD_PATH, base).toString();
}

/**
 * Resolve the agent card at `baseUrl` and return a client bound to it.
 * Connection failures propagate to the caller.
 */
export async function connectToAgent(
  baseUrl: string,
  options?: A2AClientOptions,
): Promise<AgentConnection> {
  const client = await A2AClient.fromCardUrl(agentCardUrl(baseUrl), options);
  const card = await client.getAgentCard();
  return { client, card };
}

export function supportsStreaming(card: AgentCard): boolean {
  return card.capabilities.streaming === true;
}

export function buildUserMessage(text: string): Message {
  return {
    kind: "message",
    messageId: uuidv4(),
    role: "user",
    parts: [{ kind: "text", text }],
  };
}

/**
 * Send `text` with `message/send` and pull the task id out of the reply.
 * Returns undefined (after logging) when the agent errors or names no task.
 */
export async function sendMessageForTaskId(
  client: MessagingClient,
  text: string,
): Promise<string | undefined> {
  let response: SendMessageResponse;
  try {
    response = await client.sendMessage({ message: buildUserMessage(text) });
  } catch (err) {
    logger.error("Error sending message:", errorMessage(err));
    return undefined;
  }

  if (isErrorReply(response)) {
    logger.error("Error sending message:", response.error.message);
    return undefined;
  }

  const result = response.result;
  let taskId: string | undefined;
  if (result != null) {
    taskId = result.kind === "task" ? result.id : result.taskId;
  }
  if (!taskId) {
    logger.warn("No task ID found in response");
    return undefined;
  }
  return taskId;
}

/**
 * Re-wrap the SDK's bare stream events as JSON-RPC success envelopes so the
 * aggregator sees the same frame shape the wire carries.
 */
export async function* streamFrames(
  client: MessagingClient,
  params: MessageSendParams,
  requestId: string = uuidv4(),
): AsyncGenerator<SendStreamingMessageSuccessResponse> {
  for await (const event of client.sendMessageStream(params)) {
    yield { jsonrpc: "2.0", id: requestId, result: event };
  }
}
