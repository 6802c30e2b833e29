import { z } from "zod";

export const DEFAULT_PROMPT =
  "Hello from A2A client! Tell me a very short story.";

const EnvSchema = z.object({
  A2A_PROBE_BASE_URL: z.string().url().default("http://localhost:8080"),
  A2A_PROBE_PROMPT: z.string().min(1).default(DEFAULT_PROMPT),
  A2A_PROBE_MAX_POLLS: z.coerce.number().int().positive().default(30),
  A2A_PROBE_POLL_INTERVAL_MS: z.coerce.number().int().nonnegative().default(2000),
  A2A_PROBE_POLL_HISTORY_LENGTH: z.coerce.number().int().nonnegative().default(5),
  A2A_PROBE_QUERY_HISTORY_LENGTH: z.coerce.number().int().nonnegative().default(20),
  A2A_PROBE_HOST: z.string().min(1).default("0.0.0.0"),
  A2A_PROBE_PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  A2A_PROBE_PUBLIC_URL: z.string().url().optional(),
  A2A_PROBE_CORS_ORIGINS: z.string().default("*"),
  A2A_PROBE_REPLY_MODE: z.enum(["message", "artifact"]).default("message"),
  A2A_PROBE_CHUNK_SIZE: z.coerce.number().int().positive().default(4),
});

export type ReplyMode = z.infer<typeof EnvSchema>["A2A_PROBE_REPLY_MODE"];

export interface ProbeConfig {
  baseUrl: string;
  prompt: string;
  polling: {
    maxPolls: number;
    intervalMs: number;
    historyLength: number;
  };
  queryHistoryLength: number;
  server: {
    host: string;
    port: number;
    publicUrl: string;
    corsOrigins: string[];
    replyMode: ReplyMode;
    chunkSize: number;
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Read a2a-probe settings from the environment.
 * @throws ConfigError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ProbeConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid a2a-probe configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    baseUrl: vars.A2A_PROBE_BASE_URL,
    prompt: vars.A2A_PROBE_PROMPT,
    polling: {
      maxPolls: vars.A2A_PROBE_MAX_POLLS,
      intervalMs: vars.A2A_PROBE_POLL_INTERVAL_MS,
      historyLength: vars.A2A_PROBE_POLL_HISTORY_LENGTH,
    },
    queryHistoryLength: vars.A2A_PROBE_QUERY_HISTORY_LENGTH,
    server: {
      host: vars.A2A_PROBE_HOST,
      port: vars.A2A_PROBE_PORT,
      publicUrl:
        vars.A2A_PROBE_PUBLIC_URL ?? `http://localhost:${vars.A2A_PROBE_PORT}/`,
      corsOrigins: vars.A2A_PROBE_CORS_ORIGINS.split(",")
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
      replyMode: vars.A2A_PROBE_REPLY_MODE,
      chunkSize: vars.A2A_PROBE_CHUNK_SIZE,
    },
  };
}
