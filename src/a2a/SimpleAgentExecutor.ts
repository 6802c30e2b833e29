import { v4 as uuidv4 } from "uuid";
import {
  A2AError,
  type AgentExecutor,
  type ExecutionEventBus,
  type RequestContext,
} from "@a2a-js/sdk/server";

import type { ReplyMode } from "../config";
import { errorMessage } from "../core/utils";
import { logger } from "../utils/logger";
import type {
  Message,
  Task,
  TaskArtifactUpdateEvent,
  TaskState,
  TaskStatusUpdateEvent,
} from "./types";

/** Produces the reply text for an incoming user message. */
export interface ReplyAgent {
  invoke(message: Message): Promise<string>;
}

export class GreetingAgent implements ReplyAgent {
  async invoke(): Promise<string> {
    return "Hi there!";
  }
}

export interface SimpleAgentExecutorOptions {
  agent?: ReplyAgent;
  /** `message` answers with one agent message; `artifact` streams a task. */
  replyMode?: ReplyMode;
  chunkSize?: number;
}

export const REPLY_ARTIFACT_NAME = "reply";

export function agentTextMessage(
  text: string,
  contextId?: string,
  taskId?: string,
): Message {
  return {
    kind: "message",
    messageId: uuidv4(),
    role: "agent",
    parts: [{ kind: "text", text }],
    contextId,
    taskId,
  };
}

export function chunkText(text: string, size: number): string[] {
  const chunks: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    chunks.push(text.slice(i, i + size));
  }
  return chunks;
}

export class SimpleAgentExecutor implements AgentExecutor {
  private readonly agent: ReplyAgent;
  private readonly replyMode: ReplyMode;
  private readonly chunkSize: number;

  constructor(options: SimpleAgentExecutorOptions = {}) {
    this.agent = options.agent ?? new GreetingAgent();
    this.replyMode = options.replyMode ?? "message";
    this.chunkSize = Math.max(1, options.chunkSize ?? 4);
  }

  async execute(
    requestContext: RequestContext,
    eventBus: ExecutionEventBus,
  ): Promise<void> {
    try {
      if (this.replyMode === "artifact") {
        await this.replyWithArtifact(requestContext, eventBus);
      } else {
        await this.replyWithMessage(requestContext, eventBus);
      }
    } finally {
      eventBus.finished();
    }
  }

  async cancelTask(taskId: string, _eventBus: ExecutionEventBus): Promise<void> {
    throw A2AError.taskNotCancelable(taskId);
  }

  private async replyWithMessage(
    requestContext: RequestContext,
    eventBus: ExecutionEventBus,
  ): Promise<void> {
    try {
      const reply = await this.agent.invoke(requestContext.userMessage);
      eventBus.publish(agentTextMessage(reply, requestContext.contextId));
    } catch (err) {
      logger.error("[SimpleAgentExecutor] Agent failed.", {
        error: errorMessage(err),
        contextId: requestContext.contextId,
      });
      throw err;
    }
  }

  private async replyWithArtifact(
    requestContext: RequestContext,
    eventBus: ExecutionEventBus,
  ): Promise<void> {
    const { taskId, contextId, userMessage } = requestContext;

    if (!requestContext.task) {
      const submitted: Task = {
        kind: "task",
        id: taskId,
        contextId,
        status: { state: "submitted", timestamp: new Date().toISOString() },
        history: [userMessage],
      };
      eventBus.publish(submitted);
    }
    eventBus.publish(this.statusEvent(taskId, contextId, "working", false));

    try {
      const reply = await this.agent.invoke(userMessage);
      const artifactId = uuidv4();
      const chunks = chunkText(reply, this.chunkSize);

      chunks.forEach((chunk, i) => {
        const update: TaskArtifactUpdateEvent = {
          kind: "artifact-update",
          taskId,
          contextId,
          artifact: {
            artifactId,
            name: REPLY_ARTIFACT_NAME,
            parts: [{ kind: "text", text: chunk }],
          },
          append: i > 0,
          lastChunk: i === chunks.length - 1,
        };
        eventBus.publish(update);
      });

      eventBus.publish(
        this.statusEvent(
          taskId,
          contextId,
          "completed",
          true,
          agentTextMessage(reply, contextId, taskId),
        ),
      );
    } catch (err) {
      logger.error("[SimpleAgentExecutor] Agent failed.", {
        error: errorMessage(err),
        taskId,
        contextId,
      });
      eventBus.publish(
        this.statusEvent(
          taskId,
          contextId,
          "failed",
          true,
          agentTextMessage(`Agent failed: ${errorMessage(err)}`, contextId, taskId),
        ),
      );
    }
  }

  private statusEvent(
    taskId: string,
    contextId: string,
    state: TaskState,
    final: boolean,
    message?: Message,
  ): TaskStatusUpdateEvent {
    return {
      kind: "status-update",
      taskId,
      contextId,
      status: { state, message, timestamp: new Date().toISOString() },
      final,
    };
  }
}
