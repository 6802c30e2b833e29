/**
 * a2a-probe A2A - Barrel export for A2A types, client helpers, the streaming
 * aggregator, the task poller, and the demo server assembly.
 * ------------------------------------------------------------------------
 */

import express, {
  type ErrorRequestHandler,
  type Express,
  type Request,
  type RequestHandler,
  type Response,
} from "express";
import bodyParser from "body-parser";
import compression from "compression";
import cors from "cors";
import {
  DefaultRequestHandler,
  InMemoryTaskStore,
  type AgentExecutor,
  type TaskStore,
} from "@a2a-js/sdk/server";
import { A2AExpressApp } from "@a2a-js/sdk/server/express";

import type { AgentCard } from "./types";
import { SimpleAgentExecutor } from "./SimpleAgentExecutor";

export * from "./types";
export * from "./agentCard";
export * from "./client";
export * from "./aggregator";
export * from "./poller";
export * from "./taskQuery";
export * from "./format";
export * from "./validation";
export * from "./SimpleAgentExecutor";

type Middleware = RequestHandler | ErrorRequestHandler;

export interface A2AServerOptions {
  agentCard: AgentCard;
  taskStore?: TaskStore;
  executor?: AgentExecutor;
}

export interface SimpleA2AServer {
  taskStore: TaskStore;
  executor: AgentExecutor;
  requestHandler: DefaultRequestHandler;
  expressApp: A2AExpressApp;
}

export function createSimpleA2AServer(options: A2AServerOptions): SimpleA2AServer {
  const taskStore = options.taskStore ?? new InMemoryTaskStore();
  const executor = options.executor ?? new SimpleAgentExecutor();

  const requestHandler = new DefaultRequestHandler(
    options.agentCard,
    taskStore,
    executor,
  );

  const expressApp = new A2AExpressApp(requestHandler);

  return { taskStore, executor, requestHandler, expressApp };
}

/**
 * Helper to register the A2A JSON-RPC and agent card routes on an existing app.
 * Usage: `a2aServerHandler(opts)(app, "/a2a")`
 */
export function a2aServerHandler(options: A2AServerOptions) {
  const server = createSimpleA2AServer(options);
  return (
    app: Express,
    baseUrl = "",
    middlewares?: Middleware[],
    agentCardPath?: string,
  ) => server.expressApp.setupRoutes(app, baseUrl, middlewares, agentCardPath);
}

export interface A2AAppOptions extends A2AServerOptions {
  /** Mount point for the JSON-RPC endpoint; the root by default. */
  basePath?: string;
  /** Allowed origins; `*` reflects whatever origin asks. */
  corsOrigins?: string[];
  middlewares?: Middleware[];
}

// SSE responses must reach the client chunk by chunk.
function shouldCompress(req: Request, res: Response): boolean {
  const contentType = String(res.getHeader("Content-Type") ?? "");
  if (contentType.includes("text/event-stream")) return false;
  return compression.filter(req, res);
}

export function corsOptions(origins: string[]): cors.CorsOptions {
  return {
    origin: origins.includes("*") ? true : origins,
    credentials: true,
  };
}

/**
 * Build a ready-to-listen Express app serving the agent over A2A.
 */
export function buildA2AApp(options: A2AAppOptions): Express {
  const app = express();
  app.use(cors(corsOptions(options.corsOrigins ?? ["*"])));
  app.use(compression({ filter: shouldCompress }));
  app.use(bodyParser.json());

  return a2aServerHandler(options)(app, options.basePath ?? "", options.middlewares);
}
