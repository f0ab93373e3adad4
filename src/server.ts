import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import packageJson from "../package.json" with { type: "json" };
import { loadConfig, type SplitwatchConfig } from "./config.js";
import { isStopwatchError } from "./errors.js";
import { formatElapsed } from "./format.js";
import { LogbookFileStorage } from "./state/logbookStorage.js";
import { Stopwatch } from "./stopwatch.js";
import { StopwatchToolset, stopwatchCommandShape, type StopwatchCommand } from "./tools/stopwatchTool.js";
import type { StopwatchSnapshot } from "./types.js";

export interface StopwatchServerContext {
  server: McpServer;
  stopwatch: Stopwatch;
  toolset: StopwatchToolset;
}

export function createStopwatchServer(config: SplitwatchConfig = loadConfig()): StopwatchServerContext {
  const stopwatch = new Stopwatch({ maxSplits: config.maxSplits });
  const toolset = new StopwatchToolset(stopwatch, new LogbookFileStorage(config.logFile));
  const server = new McpServer(
    {
      name: "Splitwatch",
      version: packageJson.version
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  server.registerTool(
    "stopwatch",
    {
      title: "Stopwatch",
      description: "Start or pause the main timer, open, close and climb nested splits, and save the Org logbook.",
      inputSchema: stopwatchCommandShape,
      annotations: {
        readOnlyHint: false
      }
    },
    async input => handleStopwatchTool(toolset, input)
  );

  return {
    server,
    stopwatch,
    toolset
  };
}

export async function handleStopwatchTool(toolset: StopwatchToolset, input: StopwatchCommand) {
  try {
    const result = await toolset.run(input);
    return buildResult(result.message, result.snapshot);
  } catch (error) {
    if (!isStopwatchError(error)) {
      throw error;
    }
    return {
      ...buildResult(`${error.code}: ${error.message}`, toolset.getSnapshot()),
      isError: true
    };
  }
}

function buildResult(message: string, snapshot: StopwatchSnapshot) {
  return {
    content: [
      {
        type: "text" as const,
        text: message
      }
    ],
    structuredContent: buildStructuredContent(snapshot)
  };
}

export function buildStructuredContent(snapshot: StopwatchSnapshot) {
  return {
    app: "Splitwatch",
    status: snapshot.status,
    goal: snapshot.goalName,
    elapsed: formatElapsed(snapshot.elapsedSeconds),
    startedAt: snapshot.sessionWallClockStart ? snapshot.sessionWallClockStart.toISOString() : null,
    splits: snapshot.splits.map(split => ({
      id: split.id,
      name: split.name,
      depth: split.depth,
      start: formatElapsed(split.start),
      end: split.end === null ? null : formatElapsed(split.end),
      open: split.open,
      active: split.id === snapshot.activeSplit
    }))
  };
}
