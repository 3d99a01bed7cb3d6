#!/usr/bin/env node
import { randomUUID } from "node:crypto";
import { createServer, IncomingMessage, ServerResponse } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import "dotenv/config";
import { z } from "zod";
import { AppConfig, loadConfig } from "./config/env.js";
import { askStreamBodySchema, createSseSink, streamAsk } from "./http/askStream.js";
import { ChatTurn } from "./domain/types.js";
import { createAiProviders } from "./infra/ai/createAiProviders.js";
import { GenerationProvider } from "./infra/ai/types.js";
import { FileConversationLog } from "./infra/log/conversationLog.js";
import { createVectorStore } from "./infra/store/createVectorStore.js";
import { EmbeddingGateway } from "./pipelines/embeddingGateway.js";
import { Retriever } from "./pipelines/retriever.js";
import { ChatSession, loadSystemPrompt } from "./services/chatService.js";
import { IngestionService } from "./services/ingestionService.js";
import { registerAskTool } from "./tools/ask.js";
import { registerIngestDocumentsTool } from "./tools/ingestDocuments.js";
import { registerListModelsTool } from "./tools/listModels.js";
import { registerListSourcesTool } from "./tools/listSources.js";
import { registerResetIndexTool } from "./tools/resetIndex.js";
import { registerSearchChunksTool } from "./tools/searchChunks.js";

const SERVER_NAME = "grounded-chat-mcp";
const SERVER_VERSION = "0.1.0";

interface SessionEntry {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

type SessionMap = Record<string, SessionEntry>;

interface AppContext {
  config: AppConfig;
  ingestion: IngestionService;
  retriever: Retriever;
  generation: GenerationProvider;
  createChatSession: (history?: readonly ChatTurn[]) => ChatSession;
}

const MCP_PATH = "/mcp";
const ASK_STREAM_PATH = "/api/ask-stream";

async function main() {
  const config = loadConfig();
  const providers = createAiProviders(config);
  const gateway = new EmbeddingGateway(providers.embedding, {
    dimension: config.embeddingDimension,
    concurrency: config.embeddingConcurrency,
  });

  const { store, close } = await createVectorStore(config);
  const shutdownTasks: Array<() => Promise<void>> = [close];

  const systemInstructions = await loadSystemPrompt(config.systemPromptFile);
  const log = new FileConversationLog(config.conversationLogPath);
  const retriever = new Retriever(store, gateway);
  const ingestion = new IngestionService(store, gateway, {
    chunkSize: config.chunkSize,
    overlap: config.chunkOverlap,
    batchSize: config.batchSize,
  });

  const context: AppContext = {
    config,
    ingestion,
    retriever,
    generation: providers.generation,
    createChatSession: (history = []) =>
      new ChatSession(
        retriever,
        providers.generation,
        log,
        {
          topK: config.retrievalTopK,
          historyTurns: config.historyTurns,
          temperature: config.generationTemperature,
          systemInstructions,
        },
        history,
      ),
  };

  console.error(
    `[server] store=${config.vectorStore} embeddings=${config.embeddingProvider}:${providers.embedding.modelName} chat=${providers.generation.modelName}`,
  );

  if (config.transport === "http") {
    const stopHttpServer = await runHttpServer(config.host, config.port, context);
    shutdownTasks.unshift(stopHttpServer);
    console.error(`[server] MCP HTTP server listening on http://${config.host}:${config.port}${MCP_PATH}`);
  } else {
    await runStdioServer(createAppServer(context));
  }

  const shutdown = async () => {
    for (const task of shutdownTasks) {
      await task();
    }
    process.exit(0);
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

/** One MCP server per client session; each carries its own conversation. */
function createAppServer(context: AppContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns basic server status.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      return {
        content: [
          {
            type: "text",
            text: `${SERVER_NAME} is running. hello ${who}`,
          },
        ],
      };
    },
  );

  registerIngestDocumentsTool(server, context.ingestion);
  registerSearchChunksTool(server, context.retriever, context.config.retrievalTopK);
  registerAskTool(server, context.createChatSession());
  registerListSourcesTool(server, context.ingestion);
  registerResetIndexTool(server, context.ingestion);
  registerListModelsTool(server, context.generation);

  return server;
}

async function runStdioServer(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

async function runHttpServer(
  host: string,
  port: number,
  context: AppContext,
): Promise<() => Promise<void>> {
  const sessions: SessionMap = {};
  const serverFactory = () => createAppServer(context);

  const httpServer = createServer(async (req, res) => {
    try {
      const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

      if (url.pathname === "/healthz") {
        res.writeHead(200, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ ok: true }));
        return;
      }

      if (url.pathname === ASK_STREAM_PATH) {
        if (req.method !== "POST") {
          res.writeHead(405, { "Content-Type": "application/json" });
          res.end(JSON.stringify({ error: "Method not allowed" }));
          return;
        }
        await handleAskStream(req, res, context);
        return;
      }

      if (url.pathname !== MCP_PATH) {
        res.writeHead(404, { "Content-Type": "text/plain" });
        res.end("Not found");
        return;
      }

      if (req.method === "POST") {
        const body = await readJsonBody(req);
        await handleMcpPost(req, res, body, sessions, serverFactory);
        return;
      }

      if (req.method === "GET" || req.method === "DELETE") {
        await handleSessionRequest(req, res, sessions);
        return;
      }

      res.writeHead(405, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ error: "Method not allowed" }));
    } catch (error) {
      if (!res.headersSent) {
        res.writeHead(500, { "Content-Type": "application/json" });
        res.end(
          JSON.stringify({
            error: error instanceof Error ? error.message : "Internal server error",
          }),
        );
      }
    }
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.listen(port, host, () => resolve());
    httpServer.once("error", reject);
  });

  return async () => {
    await Promise.all(
      Object.values(sessions).map(async (entry) => {
        await entry.transport.close();
        await entry.server.close();
      }),
    );

    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  };
}

async function handleMcpPost(
  req: IncomingMessage,
  res: ServerResponse,
  body: unknown,
  sessions: SessionMap,
  serverFactory: () => McpServer,
) {
  const sessionId = getSessionId(req);
  const existing = sessionId ? sessions[sessionId] : null;

  if (existing) {
    await existing.transport.handleRequest(req, res, body);
    return;
  }

  if (sessionId && !existing) {
    writeJsonRpcError(res, 404, -32001, "Session not found");
    return;
  }

  if (!isInitializeRequest(body)) {
    writeJsonRpcError(
      res,
      400,
      -32000,
      "Initialize request is required when session is not established",
    );
    return;
  }

  const server = serverFactory();
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: () => randomUUID(),
    onsessioninitialized: (newSessionId) => {
      sessions[newSessionId] = { server, transport };
    },
  });

  transport.onclose = () => {
    const closedSessionId = transport.sessionId;
    if (!closedSessionId) {
      return;
    }

    const entry = sessions[closedSessionId];
    if (!entry) {
      return;
    }

    delete sessions[closedSessionId];
    void entry.server.close();
  };

  await server.connect(transport);
  await transport.handleRequest(req, res, body);
}

async function handleAskStream(
  req: IncomingMessage,
  res: ServerResponse,
  context: AppContext,
) {
  const parsed = askStreamBodySchema.safeParse(await readJsonBody(req));
  if (!parsed.success) {
    res.writeHead(400, { "Content-Type": "application/json" });
    res.end(
      JSON.stringify({
        error: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "),
      }),
    );
    return;
  }

  const controller = new AbortController();
  res.on("close", () => controller.abort());

  const sink = createSseSink(res);
  const session = context.createChatSession(parsed.data.history ?? []);
  await streamAsk(session, parsed.data.question, sink, controller.signal);
  if (!sink.closed) {
    res.end();
  }
}

async function handleSessionRequest(
  req: IncomingMessage,
  res: ServerResponse,
  sessions: SessionMap,
) {
  const sessionId = getSessionId(req);
  if (!sessionId || !sessions[sessionId]) {
    res.writeHead(400, { "Content-Type": "text/plain" });
    res.end("Missing or invalid mcp-session-id");
    return;
  }

  await sessions[sessionId].transport.handleRequest(req, res);
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new Error("Invalid JSON body");
  }
}

function getSessionId(req: IncomingMessage): string | null {
  const headerValue = req.headers["mcp-session-id"];
  if (!headerValue) {
    return null;
  }
  return Array.isArray(headerValue) ? headerValue[0] : headerValue;
}

function writeJsonRpcError(
  res: ServerResponse,
  httpCode: number,
  code: number,
  message: string,
) {
  res.writeHead(httpCode, { "Content-Type": "application/json" });
  res.end(
    JSON.stringify({
      jsonrpc: "2.0",
      error: { code, message },
      id: null,
    }),
  );
}

main().catch((error) => {
  console.error("[server] failed to start:", error);
  process.exit(1);
});
