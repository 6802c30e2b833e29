import { textOf, textsOf, type Artifact, type Message, type Task } from "./types";

const RULE = "=".repeat(60);
const SECTION_RULE = "-".repeat(30);
const PREVIEW_LENGTH = 100;

// Counted in code points so a surrogate pair is never split.
function preview(text: string): string {
  const chars = Array.from(text);
  return chars.length > PREVIEW_LENGTH
    ? `${chars.slice(0, PREVIEW_LENGTH).join("")}...`
    : text;
}

function formatValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value) ?? String(value);
}

function currentMessageText(task: Task): string | undefined {
  const message = task.status.message;
  if (!message) return undefined;
  const texts = textsOf(message.parts);
  return texts.length > 0 ? texts.join(" ") : undefined;
}

function formatArtifact(artifact: Artifact, index: number): string[] {
  const lines = [
    `${index}. Name: ${artifact.name ?? "(unnamed)"}`,
    `   ID: ${artifact.artifactId}`,
  ];
  if (artifact.parts.length > 0) {
    lines.push(`   Parts: ${artifact.parts.length}`);
    artifact.parts.forEach((part, i) => {
      if (part.kind === "text") {
        lines.push(`     ${i + 1}. Text: ${preview(part.text)}`);
      }
    });
  }
  lines.push("");
  return lines;
}

/**
 * Full human-readable report for a single task snapshot.
 */
export function formatTaskReport(task: Task): string[] {
  const lines = [
    RULE,
    "TASK INFORMATION",
    RULE,
    `Task ID: ${task.id}`,
    `Context ID: ${task.contextId}`,
    `Status: ${task.status.state}`,
    `Timestamp: ${task.status.timestamp ?? "n/a"}`,
  ];

  const current = currentMessageText(task);
  if (current !== undefined) {
    lines.push("", "Current Message:", SECTION_RULE, current);
  }

  const history = task.history ?? [];
  if (history.length > 0) {
    lines.push("", `Task History (${history.length} messages):`, SECTION_RULE);
    history.forEach((message, i) => {
      const index = String(i + 1).padStart(2);
      lines.push(`${index}. [${message.role.padEnd(6)}]: ${textOf(message.parts)}`);
    });
  }

  const artifacts = task.artifacts ?? [];
  if (artifacts.length > 0) {
    lines.push("", `Artifacts (${artifacts.length}):`, SECTION_RULE);
    artifacts.forEach((artifact, i) => lines.push(...formatArtifact(artifact, i + 1)));
  }

  const metadata = Object.entries(task.metadata ?? {});
  if (metadata.length > 0) {
    lines.push("", "Metadata:", SECTION_RULE);
    for (const [key, value] of metadata) {
      lines.push(`${key}: ${formatValue(value)}`);
    }
  }

  lines.push(RULE);
  return lines;
}

/** Lines printed for each poll of a running task. */
export function formatPollUpdate(task: Task, attempt: number): string[] {
  const lines = [`Poll ${attempt}: Task Status = ${task.status.state}`];

  const current = currentMessageText(task);
  if (current !== undefined) {
    lines.push(`  Current message: ${current}`);
  }

  const artifacts = task.artifacts ?? [];
  if (artifacts.length > 0) {
    lines.push(`  Artifacts: ${artifacts.length} available`);
    for (const artifact of artifacts) {
      lines.push(`    - ${artifact.name ?? "(unnamed)"} (ID: ${artifact.artifactId})`);
    }
  }
  return lines;
}

export function formatHistory(messages: Message[]): string[] {
  return messages.map(
    (message, i) => `  ${i + 1}. [${message.role}]: ${textOf(message.parts)}`,
  );
}

export function formatArtifactSummary(artifacts: Map<string, string>): string[] {
  return [...artifacts].map(([artifactId, text]) => `- ${artifactId}: ${text}`);
}
