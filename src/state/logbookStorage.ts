import { appendFile, mkdir } from "fs/promises";
import { dirname } from "path";

export interface LogbookStorage {
  append(text: string): Promise<void>;
}

/** Appends logbook entries to a single Org file, one write at a time. */
export class LogbookFileStorage implements LogbookStorage {
  private pending = Promise.resolve();

  constructor(readonly filePath: string) {}

  async append(text: string): Promise<void> {
    const write = this.pending
      .catch(() => undefined)
      .then(async () => {
        await mkdir(dirname(this.filePath), { recursive: true });
        await appendFile(this.filePath, text, "utf-8");
      });
    this.pending = write;
    await write;
  }
}
