import express from "express";
import cors from "cors";
import { randomUUID } from "crypto";
import type { Request, Response } from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { loadConfig } from "./config.js";
import { formatElapsed } from "./format.js";
import { createStopwatchServer } from "./server.js";

async function bootstrap() {
  const config = loadConfig();
  const { server, stopwatch } = createStopwatchServer(config);

  const app = express();
  app.use(express.json({ limit: "256kb" }));
  app.use(
    cors({
      origin: "*",
      exposedHeaders: ["Mcp-Session-Id"]
    })
  );

  const transports = new Map<string, StreamableHTTPServerTransport>();

  const createTransport = () => {
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: sessionId => {
        transports.set(sessionId, transport);
      }
    });

    transport.onclose = () => {
      if (transport.sessionId) {
        transports.delete(transport.sessionId);
      }
    };

    return transport;
  };

  const sessionTransport = (req: Request, res: Response): StreamableHTTPServerTransport | undefined => {
    const sessionId = req.header("mcp-session-id");
    if (!sessionId) {
      res.status(400).json({
        error: "missing_session",
        message: "Provide an Mcp-Session-Id header."
      });
      return undefined;
    }

    const transport = transports.get(sessionId);
    if (!transport) {
      res.status(404).json({
        error: "unknown_session",
        message: "Session not found. Start a new session to initialize."
      });
      return undefined;
    }
    return transport;
  };

  const replyWithError = (res: Response, context: string, error: unknown) => {
    console.error(context, error);
    if (!res.headersSent) {
      res.status(500).json({
        error: "internal_error",
        message: "Splitwatch encountered an unexpected error."
      });
    }
  };

  app.get("/healthz", (_req: Request, res: Response) => {
    const snapshot = stopwatch.snapshot();
    res.json({
      status: snapshot.status,
      elapsed: formatElapsed(snapshot.elapsedSeconds),
      splits: snapshot.splits.length
    });
  });

  app.post("/mcp", async (req: Request, res: Response) => {
    try {
      if (req.header("mcp-session-id")) {
        const existing = sessionTransport(req, res);
        if (existing) {
          await existing.handleRequest(req, res, req.body);
        }
        return;
      }

      const transport = createTransport();
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      replyWithError(res, "Error handling MCP POST request", error);
    }
  });

  app.get("/mcp", async (req: Request, res: Response) => {
    const transport = sessionTransport(req, res);
    if (!transport) {
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      replyWithError(res, "Error handling MCP GET stream", error);
    }
  });

  app.delete("/mcp", async (req: Request, res: Response) => {
    const transport = sessionTransport(req, res);
    if (!transport) {
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      replyWithError(res, "Error handling MCP DELETE request", error);
    } finally {
      if (transport.sessionId) {
        transports.delete(transport.sessionId);
      }
    }
  });

  const listener = app.listen(config.port, () => {
    console.log(`Splitwatch MCP server listening on port ${config.port}, logbook at ${config.logFile}`);
  });

  const shutdown = async () => {
    console.log("Shutting down Splitwatch server...");
    listener.close();
    await Promise.all(
      [...transports.values()].map(async transport => {
        try {
          await transport.close();
        } catch (error) {
          console.error("Error closing transport", error);
        }
      })
    );
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

bootstrap().catch(error => {
  console.error("Failed to start Splitwatch HTTP server", error);
  process.exit(1);
});
