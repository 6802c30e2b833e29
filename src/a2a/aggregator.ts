import { errorMessage } from "../core/utils";
import { logger } from "../utils/logger";
import {
  isErrorReply,
  textsOf,
  type SendStreamingMessageResponse,
  type StreamEvent,
  type TaskArtifactUpdateEvent,
  type TaskState,
} from "./types";

/** One JSON-RPC envelope from a `message/stream` session. */
export type StreamFrame = SendStreamingMessageResponse;

export type StreamOutcome =
  /** A status update arrived with `final: true`. */
  | "final"
  /** The server sent an error envelope. */
  | "error"
  /** Iterating the source threw. */
  | "transport-error"
  /** The source ended without a final status. */
  | "exhausted";

export interface StreamSummary {
  /** Artifact id → accumulated text, in first-seen order. */
  artifacts: Map<string, string>;
  /** First task id seen on any event. */
  taskId?: string;
  /** Last reported task state. */
  state?: TaskState;
  /** Text of agent messages received during the session. */
  messages: string[];
  outcome: StreamOutcome;
  error?: string;
}

export interface AggregateOptions {
  onArtifact?: (artifactId: string, text: string) => void;
  onStatus?: (state: TaskState, final: boolean) => void;
  onMessage?: (text: string) => void;
}

/**
 * Consume a streaming session, folding artifact deltas into per-artifact text.
 *
 * Stops at the first final status update, error envelope or transport failure,
 * and always resolves with whatever was accumulated up to that point.
 */
export async function aggregateStream(
  frames: AsyncIterable<StreamFrame>,
  options: AggregateOptions = {},
): Promise<StreamSummary> {
  const summary: StreamSummary = {
    artifacts: new Map(),
    messages: [],
    outcome: "exhausted",
  };

  try {
    for await (const frame of frames) {
      if (isErrorReply(frame)) {
        logger.error("Received an error:", frame.error.message);
        summary.outcome = "error";
        summary.error = frame.error.message;
        break;
      }

      if (!("result" in frame) || frame.result == null) {
        logger.warn("Received a response without a result or error:", frame);
        continue;
      }

      if (applyEvent(summary, frame.result, options)) {
        summary.outcome = "final";
        break;
      }
    }
  } catch (err) {
    logger.error("An error occurred during streaming:", errorMessage(err));
    summary.outcome = "transport-error";
    summary.error = errorMessage(err);
  }

  return summary;
}

/**
 * Apply a single event to the summary. Returns true when the stream is done.
 */
function applyEvent(
  summary: StreamSummary,
  event: StreamEvent,
  options: AggregateOptions,
): boolean {
  switch (event.kind) {
    case "artifact-update":
      captureTaskId(summary, event.taskId);
      applyArtifact(summary.artifacts, event, options);
      return false;

    case "status-update":
      captureTaskId(summary, event.taskId);
      summary.state = event.status.state;
      logger.log("Task status update:", event.status.state);
      options.onStatus?.(event.status.state, event.final);
      return event.final;

    case "task":
      captureTaskId(summary, event.id);
      summary.state = event.status.state;
      return false;

    case "message": {
      captureTaskId(summary, event.taskId);
      const text = textsOf(event.parts).join(" ");
      summary.messages.push(text);
      options.onMessage?.(text);
      return false;
    }

    default:
      logger.warn("Ignoring unrecognised stream event:", event);
      return false;
  }
}

function applyArtifact(
  artifacts: Map<string, string>,
  event: TaskArtifactUpdateEvent,
  options: AggregateOptions,
): void {
  const { artifactId, parts } = event.artifact;
  const previous = artifacts.get(artifactId) ?? "";
  const texts = textsOf(parts);

  let next = previous;
  if (texts.length > 0) {
    const chunk = texts.join("");
    next = event.append === true ? previous + chunk : chunk;
  }
  artifacts.set(artifactId, next);
  options.onArtifact?.(artifactId, next);
}

function captureTaskId(summary: StreamSummary, taskId: string | undefined): void {
  if (!summary.taskId && taskId) {
    summary.taskId = taskId;
  }
}
