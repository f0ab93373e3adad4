import { EventEmitter } from "events";
import { systemClock, secondsBetween, type Clock } from "./clock.js";
import { StopwatchError } from "./errors.js";
import { exportLogbook, type LogbookExport } from "./logbook.js";
import { SplitTree, clipName } from "./state/splitTree.js";
import type { LogbookStorage } from "./state/logbookStorage.js";
import type { SplitRef, StopwatchSnapshot, StopwatchStatus } from "./types.js";

interface StopwatchOptions {
  clock?: Clock;
  maxSplits?: number;
}

type StopwatchEvents = {
  change: (snapshot: StopwatchSnapshot) => void;
  saved: (result: LogbookExport) => void;
};

export class Stopwatch {
  private readonly emitter = new EventEmitter();
  private readonly clock: Clock;
  private readonly tree: SplitTree;

  private status: StopwatchStatus = "idle";
  private goalName = "";
  private elapsedBeforeCurrentRun = 0;
  private currentRunAnchor: bigint | null = null;
  private activeSplit: SplitRef | null = null;
  private sessionWallClockStart: Date | null = null;

  constructor(options: StopwatchOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.tree = new SplitTree({ maxSplits: options.maxSplits });
  }

  on<T extends keyof StopwatchEvents>(event: T, listener: StopwatchEvents[T]): () => void {
    this.emitter.on(event, listener);
    return () => this.emitter.off(event, listener);
  }

  get state(): StopwatchStatus {
    return this.status;
  }

  get splitsFull(): boolean {
    return this.tree.isFull;
  }

  /**
   * Starts a fresh session from idle, resumes from paused, and pauses when
   * already running. The goal name only matters when starting from idle.
   */
  start(goalName = ""): StopwatchStatus {
    switch (this.status) {
      case "running":
        return this.stop();
      case "paused":
        this.currentRunAnchor = this.clock.now();
        this.status = "running";
        break;
      case "idle":
        this.goalName = clipName(goalName);
        this.sessionWallClockStart = this.clock.wallClockNow();
        this.tree.clear();
        this.activeSplit = null;
        this.elapsedBeforeCurrentRun = 0;
        this.currentRunAnchor = this.clock.now();
        this.status = "running";
        break;
    }

    this.emitChange();
    return this.status;
  }

  stop(): StopwatchStatus {
    if (this.status !== "running") {
      throw new StopwatchError("InvalidState", "The timer is not running.");
    }

    this.elapsedBeforeCurrentRun = this.currentElapsed();
    this.currentRunAnchor = null;
    this.status = "paused";
    this.emitChange();
    return this.status;
  }

  /** Drops the goal, the elapsed time and every split, open or closed. */
  reset(): void {
    this.status = "idle";
    this.goalName = "";
    this.elapsedBeforeCurrentRun = 0;
    this.currentRunAnchor = null;
    this.activeSplit = null;
    this.sessionWallClockStart = null;
    this.tree.clear();
    this.emitChange();
  }

  /**
   * Opens a split under the active one, or at the top level when nothing is
   * active. A nested request insists on an active parent.
   */
  openSplit(input: { name?: string; nested?: boolean } = {}): SplitRef {
    if (this.status !== "running") {
      throw new StopwatchError("InvalidState", "Splits can only be opened while the timer is running.");
    }
    if (input.nested && this.activeSplit === null) {
      throw new StopwatchError("NoActiveSplit", "Open a split before nesting one under it.");
    }

    const ref = this.tree.openSplit(this.activeSplit, input.name ?? "", this.currentElapsed());
    this.activeSplit = ref;
    this.emitChange();
    return ref;
  }

  /** Closes the active split and makes its parent active. Open children stay open. */
  closeActiveSplit(): SplitRef {
    const ref = this.requireActive();
    const parent = this.tree.parentOf(ref);
    this.tree.closeSplit(ref, this.currentElapsed());
    this.activeSplit = parent;
    this.emitChange();
    return ref;
  }

  moveUp(): SplitRef | null {
    const ref = this.requireActive();
    this.activeSplit = this.tree.parentOf(ref);
    this.emitChange();
    return this.activeSplit;
  }

  currentElapsed(): number {
    if (this.status !== "running" || this.currentRunAnchor === null) {
      return this.elapsedBeforeCurrentRun;
    }
    return this.elapsedBeforeCurrentRun + secondsBetween(this.clock, this.currentRunAnchor, this.clock.now());
  }

  /** Time spent in the active split so far, or `null` when none is active. */
  activeSplitElapsed(): number | null {
    if (this.activeSplit === null) {
      return null;
    }
    const split = this.tree.get(this.activeSplit);
    return split ? Math.max(this.currentElapsed() - split.start, 0) : null;
  }

  /**
   * Appends the goal and every closed split to the logbook. Open splits are
   * skipped. Nothing is written for a session without a goal name.
   */
  async save(storage: LogbookStorage): Promise<LogbookExport> {
    if (this.status === "running") {
      throw new StopwatchError("InvalidState", "Stop the timer before saving the log.");
    }

    const result = await exportLogbook(this.snapshot(), this.clock.wallClockNow(), storage);
    if (result.written) {
      this.emitter.emit("saved", result);
    }
    return result;
  }

  snapshot(): StopwatchSnapshot {
    return {
      status: this.status,
      goalName: this.goalName,
      elapsedSeconds: this.currentElapsed(),
      activeSplit: this.activeSplit,
      sessionWallClockStart: this.sessionWallClockStart,
      splits: this.tree.allSplits().map(split => ({ ...split, open: split.end === null }))
    };
  }

  private requireActive(): SplitRef {
    if (this.activeSplit === null) {
      throw new StopwatchError("NoActiveSplit", "No split is active.");
    }
    return this.activeSplit;
  }

  private emitChange(): void {
    this.emitter.emit("change", this.snapshot());
  }
}
