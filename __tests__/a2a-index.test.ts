import express from "express";
import { InMemoryTaskStore } from "@a2a-js/sdk/server";
import { A2AExpressApp } from "@a2a-js/sdk/server/express";

import { simpleAgentCard } from "../src/a2a/agentCard";
import {
  a2aServerHandler,
  buildA2AApp,
  corsOptions,
  createSimpleA2AServer,
  SimpleAgentExecutor,
} from "../src/a2a";

const agentCard = simpleAgentCard("http://localhost:8080/");

describe("A2A server assembly", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("creates a server bundle with an in-memory task store and the demo executor", () => {
    const server = createSimpleA2AServer({ agentCard });

    expect(server.taskStore).toBeInstanceOf(InMemoryTaskStore);
    expect(server.executor).toBeInstanceOf(SimpleAgentExecutor);
    expect(server.requestHandler).toBeDefined();
    expect(server.expressApp).toBeInstanceOf(A2AExpressApp);
  });

  it("uses the executor and task store it is given", () => {
    const taskStore = new InMemoryTaskStore();
    const executor = new SimpleAgentExecutor({ replyMode: "artifact" });

    const server = createSimpleA2AServer({ agentCard, taskStore, executor });

    expect(server.taskStore).toBe(taskStore);
    expect(server.executor).toBe(executor);
  });

  it("delegates route registration through A2AExpressApp", () => {
    const setupSpy = jest
      .spyOn(A2AExpressApp.prototype, "setupRoutes")
      .mockImplementation((app) => app);

    const handler = a2aServerHandler({ agentCard });
    const app = express();
    const middlewares = [jest.fn()];

    handler(app);
    expect(setupSpy).toHaveBeenCalledWith(app, "", undefined, undefined);

    handler(app, "/custom", middlewares, "/card.json");
    expect(setupSpy).toHaveBeenCalledWith(app, "/custom", middlewares, "/card.json");
  });

  it("mounts the routes at the requested base path", () => {
    const setupSpy = jest
      .spyOn(A2AExpressApp.prototype, "setupRoutes")
      .mockImplementation((app) => app);

    const app = buildA2AApp({ agentCard, basePath: "/rpc" });

    expect(setupSpy).toHaveBeenCalledWith(app, "/rpc", undefined, undefined);
  });

  it("builds a working express app with the real SDK routes", () => {
    const app = buildA2AApp({ agentCard, corsOrigins: ["https://ui.test"] });

    expect(typeof app.listen).toBe("function");
  });
});

describe("corsOptions", () => {
  it("reflects the request origin for a wildcard", () => {
    expect(corsOptions(["*"])).toEqual({ origin: true, credentials: true });
  });

  it("lists explicit origins", () => {
    expect(corsOptions(["https://a.test", "https://b.test"])).toEqual({
      origin: ["https://a.test", "https://b.test"],
      credentials: true,
    });
  });
});
