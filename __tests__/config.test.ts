import { ConfigError, DEFAULT_PROMPT, loadConfig } from "../src/config";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      baseUrl: "http://localhost:8080",
      prompt: DEFAULT_PROMPT,
      polling: { maxPolls: 30, intervalMs: 2000, historyLength: 5 },
      queryHistoryLength: 20,
      server: {
        host: "0.0.0.0",
        port: 8080,
        publicUrl: "http://localhost:8080/",
        corsOrigins: ["*"],
        replyMode: "message",
        chunkSize: 4,
      },
    });
  });

  it("coerces numeric settings from strings", () => {
    const config = loadConfig({
      A2A_PROBE_MAX_POLLS: "3",
      A2A_PROBE_POLL_INTERVAL_MS: "250",
      A2A_PROBE_POLL_HISTORY_LENGTH: "0",
      A2A_PROBE_QUERY_HISTORY_LENGTH: "50",
    });

    expect(config.polling).toEqual({ maxPolls: 3, intervalMs: 250, historyLength: 0 });
    expect(config.queryHistoryLength).toBe(50);
  });

  it("derives the public url from the port", () => {
    expect(loadConfig({ A2A_PROBE_PORT: "9090" }).server.publicUrl).toBe(
      "http://localhost:9090/",
    );
    expect(
      loadConfig({ A2A_PROBE_PUBLIC_URL: "https://agent.test/" }).server.publicUrl,
    ).toBe("https://agent.test/");
  });

  it("splits the cors origin list", () => {
    const config = loadConfig({ A2A_PROBE_CORS_ORIGINS: "https://a.test, https://b.test," });

    expect(config.server.corsOrigins).toEqual(["https://a.test", "https://b.test"]);
  });

  it("reads the reply mode", () => {
    const config = loadConfig({ A2A_PROBE_REPLY_MODE: "artifact", A2A_PROBE_CHUNK_SIZE: "8" });

    expect(config.server.replyMode).toBe("artifact");
    expect(config.server.chunkSize).toBe(8);
  });

  it("names every invalid variable", () => {
    const load = () =>
      loadConfig({ A2A_PROBE_PORT: "not-a-port", A2A_PROBE_BASE_URL: "nowhere" });

    expect(load).toThrow(ConfigError);
    expect(load).toThrow(/A2A_PROBE_BASE_URL/);
    expect(load).toThrow(/A2A_PROBE_PORT/);
  });

  it("rejects a zero poll budget", () => {
    expect(() => loadConfig({ A2A_PROBE_MAX_POLLS: "0" })).toThrow(/A2A_PROBE_MAX_POLLS/);
  });
});
