import type { AgentCard, AgentSkill } from "./types";

export type AgentCardOptions = Pick<AgentCard, "name" | "url" | "version" | "skills"> &
  Partial<Omit<AgentCard, "name" | "url" | "version" | "skills">>;

export const DEFAULT_PROTOCOL_VERSION = "0.3.0";

/**
 * Build an AgentCard, filling in protocol defaults for anything not given.
 * Optional fields that are left undefined stay off the card.
 */
export function generateAgentCard(opts: AgentCardOptions): AgentCard {
  const card: AgentCard = {
    name: opts.name,
    url: opts.url,
    version: opts.version,
    protocolVersion: opts.protocolVersion ?? DEFAULT_PROTOCOL_VERSION,
    preferredTransport: opts.preferredTransport ?? "JSONRPC",
    description: opts.description ?? "",
    capabilities: opts.capabilities ?? {},
    defaultInputModes: opts.defaultInputModes ?? ["text"],
    defaultOutputModes: opts.defaultOutputModes ?? ["text"],
    skills: opts.skills,
  };

  for (const [key, value] of Object.entries(opts)) {
    if (value !== undefined && !(key in card)) {
      Object.assign(card, { [key]: value });
    }
  }

  return card;
}

export const SIMPLE_HELLO_SKILL: AgentSkill = {
  id: "simple_hello",
  name: "Simple Hello",
  description: "Returns a simple hello message",
  tags: ["hello", "simple"],
  examples: ["say hello"],
};

/** Card advertised by the demo server. */
export function simpleAgentCard(url: string): AgentCard {
  return generateAgentCard({
    name: "Simple A2A Agent",
    description: "A minimal A2A agent server",
    url,
    version: "1.0.0",
    capabilities: { streaming: true },
    skills: [SIMPLE_HELLO_SKILL],
    supportsAuthenticatedExtendedCard: false,
  });
}
