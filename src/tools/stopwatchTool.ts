import { z } from "zod";
import { formatElapsed } from "../format.js";
import { Stopwatch } from "../stopwatch.js";
import type { LogbookStorage } from "../state/logbookStorage.js";
import type { StopwatchSnapshot, StopwatchUpdateResult } from "../types.js";

const nameSchema = z.string().max(1024).default("");

export const startStopwatchInput = z.object({
  goal: nameSchema
});

export const openSplitInput = z.object({
  name: nameSchema,
  nested: z.boolean().default(false)
});

export const stopwatchActions = ["start", "stop", "reset", "open_split", "close_split", "move_up", "save", "status"] as const;

export const stopwatchCommandShape = {
  action: z.enum(stopwatchActions),
  name: z.string().max(1024).optional().describe("Goal name for start, split name for open_split."),
  nested: z.boolean().optional().describe("Require an active split to nest under.")
};

export const stopwatchCommandInput = z.object(stopwatchCommandShape);

export type StopwatchCommand = z.input<typeof stopwatchCommandInput>;

export class StopwatchToolset {
  constructor(
    private readonly stopwatch: Stopwatch,
    private readonly storage: LogbookStorage
  ) {}

  getSnapshot(): StopwatchSnapshot {
    return this.stopwatch.snapshot();
  }

  async run(input: StopwatchCommand): Promise<StopwatchUpdateResult> {
    const command = stopwatchCommandInput.parse(input);

    switch (command.action) {
      case "start":
        return this.start({ goal: command.name });
      case "stop":
        return this.stop();
      case "reset":
        return this.reset();
      case "open_split":
        return this.openSplit({ name: command.name, nested: command.nested });
      case "close_split":
        return this.closeSplit();
      case "move_up":
        return this.moveUp();
      case "save":
        return this.save();
      case "status":
      default:
        return this.result(this.describeStatus());
    }
  }

  async start(input: z.input<typeof startStopwatchInput> = {}): Promise<StopwatchUpdateResult> {
    const parsed = startStopwatchInput.parse(input);
    const before = this.stopwatch.state;
    const status = this.stopwatch.start(parsed.goal);

    if (status === "paused") {
      return this.result(`Paused at ${formatElapsed(this.stopwatch.currentElapsed())}.`);
    }
    if (before === "paused") {
      return this.result(`Resumed at ${formatElapsed(this.stopwatch.currentElapsed())}.`);
    }
    const goal = this.stopwatch.snapshot().goalName;
    return this.result(goal ? `Started "${goal}".` : "Started.");
  }

  async stop(): Promise<StopwatchUpdateResult> {
    this.stopwatch.stop();
    return this.result(`Paused at ${formatElapsed(this.stopwatch.currentElapsed())}.`);
  }

  async reset(): Promise<StopwatchUpdateResult> {
    this.stopwatch.reset();
    return this.result("Reset.");
  }

  async openSplit(input: z.input<typeof openSplitInput> = {}): Promise<StopwatchUpdateResult> {
    const parsed = openSplitInput.parse(input);
    const ref = this.stopwatch.openSplit(parsed);
    const split = this.stopwatch.snapshot().splits.find(candidate => candidate.id === ref);
    const label = split?.name ? `"${split.name}"` : "split";
    return this.result(`Opened ${label} at ${formatElapsed(split?.start ?? 0)}.`);
  }

  async closeSplit(): Promise<StopwatchUpdateResult> {
    const ref = this.stopwatch.closeActiveSplit();
    const split = this.stopwatch.snapshot().splits.find(candidate => candidate.id === ref);
    if (!split || split.end === null) {
      return this.result("Closed split.");
    }
    const label = split.name ? `"${split.name}"` : "split";
    return this.result(`Closed ${label} after ${formatElapsed(split.end - split.start)}.`);
  }

  async moveUp(): Promise<StopwatchUpdateResult> {
    const ref = this.stopwatch.moveUp();
    if (ref === null) {
      return this.result("Back at the top level.");
    }
    const parent = this.stopwatch.snapshot().splits.find(candidate => candidate.id === ref);
    return this.result(parent?.name ? `Now under "${parent.name}".` : "Moved up one level.");
  }

  async save(): Promise<StopwatchUpdateResult> {
    const saved = await this.stopwatch.save(this.storage);
    if (!saved.written) {
      return { ...this.result("Nothing to save without a goal."), saved };
    }
    return {
      ...this.result(`Saved ${saved.blocks} ${saved.blocks === 1 ? "entry" : "entries"} to the logbook.`),
      saved
    };
  }

  private describeStatus(): string {
    const snapshot = this.stopwatch.snapshot();
    const elapsed = formatElapsed(snapshot.elapsedSeconds);
    switch (snapshot.status) {
      case "running":
        return `Running for ${elapsed} with ${snapshot.splits.length} split${snapshot.splits.length === 1 ? "" : "s"}.`;
      case "paused":
        return `Paused at ${elapsed}.`;
      case "idle":
      default:
        return "Idle.";
    }
  }

  private result(message: string): StopwatchUpdateResult {
    return {
      snapshot: this.stopwatch.snapshot(),
      message
    };
  }
}
