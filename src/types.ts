export type StopwatchStatus = "idle" | "running" | "paused";

/** Stable handle to a split. Survives tree growth, unlike a positional index. */
export type SplitRef = string;

export interface Split {
  id: SplitRef;
  name: string;
  /** Elapsed seconds (relative to the main timer) when the split opened. */
  start: number;
  /** Elapsed seconds when the split closed, `null` while it is still open. */
  end: number | null;
  parent: SplitRef | null;
  depth: number;
}

export interface SplitView extends Split {
  open: boolean;
}

export interface StopwatchSnapshot {
  status: StopwatchStatus;
  goalName: string;
  elapsedSeconds: number;
  activeSplit: SplitRef | null;
  sessionWallClockStart: Date | null;
  splits: SplitView[];
}

export interface StopwatchUpdateResult {
  snapshot: StopwatchSnapshot;
  message: string;
  saved?: {
    written: boolean;
    blocks: number;
  };
}
