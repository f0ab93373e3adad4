#!/usr/bin/env node
import readline from "readline";
import { loadConfig, type SplitwatchConfig } from "./config.js";
import { isStopwatchError } from "./errors.js";
import { LogbookFileStorage } from "./state/logbookStorage.js";
import { Stopwatch } from "./stopwatch.js";
import { StopwatchToolset, type StopwatchCommand } from "./tools/stopwatchTool.js";
import { buildScreen, buildSplitLine, buildTimeLine, splitRow, TIME_ROW } from "./ui/builders.js";
import { actionForKey, type Keypress } from "./ui/keymap.js";

class TerminalApp {
  private readonly stopwatch: Stopwatch;
  private readonly toolset: StopwatchToolset;
  private readonly input = process.stdin;
  private readonly output = process.stdout;
  private refresh: NodeJS.Timeout | null = null;
  private statusLine = "";
  private busy = false;
  private exiting = false;

  constructor(private readonly config: SplitwatchConfig) {
    this.stopwatch = new Stopwatch({ maxSplits: config.maxSplits });
    this.toolset = new StopwatchToolset(this.stopwatch, new LogbookFileStorage(config.logFile));
  }

  run(): void {
    readline.emitKeypressEvents(this.input);
    this.input.setRawMode(true);
    this.input.resume();
    this.input.on("keypress", this.onKeypress);

    this.stopwatch.on("change", snapshot => {
      if (snapshot.status === "running") {
        this.startRefresh();
      } else {
        this.stopRefresh();
      }
    });

    this.drawStatic();
  }

  private readonly onKeypress = (_chunk: string | undefined, key: Keypress | undefined) => {
    if (this.busy || !key) {
      return;
    }

    const action = actionForKey(key, { ...this.stopwatch.snapshot(), splitsFull: this.stopwatch.splitsFull });
    if (!action) {
      return;
    }

    switch (action.kind) {
      case "quit":
        this.quit(0);
        return;
      case "redraw":
        this.drawStatic();
        return;
      case "command":
        this.busy = true;
        void this.dispatch(action.command, action.prompt)
          .catch(error => this.fail(error))
          .finally(() => {
            this.busy = false;
          });
        return;
    }
  };

  private async dispatch(command: StopwatchCommand, prompt?: string): Promise<void> {
    const name = prompt ? await this.ask(prompt) : command.name;

    try {
      const result = await this.toolset.run({ ...command, name });
      this.statusLine = result.message;
    } catch (error) {
      if (!isStopwatchError(error)) {
        throw error;
      }
      this.statusLine = `${error.code}: ${error.message}`;
    }

    this.drawStatic();
  }

  private async ask(prompt: string): Promise<string> {
    this.input.setRawMode(false);
    const rl = readline.createInterface({ input: this.input, output: this.output });
    try {
      this.output.write("\n");
      return await new Promise<string>(resolve => rl.question(prompt, resolve));
    } finally {
      rl.close();
      this.input.setRawMode(true);
      this.input.resume();
    }
  }

  private drawStatic(): void {
    const lines = buildScreen({
      snapshot: this.stopwatch.snapshot(),
      activeElapsed: this.stopwatch.activeSplitElapsed(),
      statusLine: this.statusLine
    });
    readline.cursorTo(this.output, 0, 0);
    readline.clearScreenDown(this.output);
    this.output.write(`${lines.join("\n")}\n`);
  }

  private drawDynamic(): void {
    if (this.busy) {
      return;
    }
    const snapshot = this.stopwatch.snapshot();
    this.writeRow(TIME_ROW, buildTimeLine(snapshot.elapsedSeconds));

    const index = snapshot.splits.findIndex(split => split.id === snapshot.activeSplit);
    if (index >= 0) {
      this.writeRow(splitRow(index), buildSplitLine(snapshot.splits[index], index, this.stopwatch.activeSplitElapsed()));
    }
  }

  private writeRow(row: number, text: string): void {
    readline.cursorTo(this.output, 0, row);
    readline.clearLine(this.output, 0);
    this.output.write(text);
  }

  private startRefresh(): void {
    if (this.refresh) {
      return;
    }
    this.refresh = setInterval(() => this.drawDynamic(), this.config.refreshMs);
  }

  private stopRefresh(): void {
    if (this.refresh) {
      clearInterval(this.refresh);
      this.refresh = null;
    }
  }

  private fail(error: unknown): void {
    if (this.exiting) {
      return;
    }
    this.exiting = true;
    this.restoreTerminal();
    console.error("Splitwatch stopped on an unexpected error", error);
    process.exit(1);
  }

  private quit(code: number): void {
    if (this.exiting) {
      return;
    }
    this.exiting = true;
    this.restoreTerminal();
    process.exit(code);
  }

  private restoreTerminal(): void {
    this.stopRefresh();
    this.input.off("keypress", this.onKeypress);
    if (this.input.isTTY) {
      this.input.setRawMode(false);
    }
    this.input.pause();
    this.output.write("\n");
  }
}

function main() {
  if (!process.stdin.isTTY) {
    throw new Error("Splitwatch needs an interactive terminal.");
  }
  const app = new TerminalApp(loadConfig());
  app.run();
}

try {
  main();
} catch (error) {
  console.error("Failed to start Splitwatch", error);
  process.exit(1);
}
