import type {
  JSONRPCErrorResponse,
  Part,
  SendStreamingMessageSuccessResponse,
  TaskState,
  TextPart,
} from "@a2a-js/sdk";

export type {
  AgentCard,
  AgentCapabilities,
  AgentProvider,
  AgentSkill,
  Artifact,
  GetTaskResponse,
  Message,
  MessageSendParams,
  Part,
  SendMessageResponse,
  SendStreamingMessageResponse,
  SendStreamingMessageSuccessResponse,
  Task,
  TaskArtifactUpdateEvent,
  TaskQueryParams,
  TaskState,
  TaskStatusUpdateEvent,
  TextPart,
} from "@a2a-js/sdk";

/** Any event the server can push over `message/stream`. */
export type StreamEvent = SendStreamingMessageSuccessResponse["result"];

/** States after which a task never changes again. */
export const TERMINAL_TASK_STATES: ReadonlySet<TaskState> = new Set<TaskState>([
  "completed",
  "failed",
  "canceled",
]);

export function isTerminalState(state: TaskState): boolean {
  return TERMINAL_TASK_STATES.has(state);
}

/**
 * True when a JSON-RPC reply carries an actual error object. Servers may
 * serialize `"error": null` beside a result, which is not an error.
 */
export function isErrorReply(
  reply: JSONRPCErrorResponse | { result?: unknown },
): reply is JSONRPCErrorResponse {
  return "error" in reply && reply.error != null;
}

// --- Utility: Type guard helpers for Part ---

export function isTextPart(part: Part): part is TextPart {
  return part.kind === "text";
}

/** Text content of the text parts, in order. */
export function textsOf(parts: Part[]): string[] {
  return parts.filter(isTextPart).map((part) => part.text);
}

export function textOf(parts: Part[], separator = " "): string {
  return textsOf(parts).join(separator);
}
