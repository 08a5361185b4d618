import { once } from "node:events";
import { createWriteStream, renameSync, writeFileSync, type WriteStream } from "node:fs";

/** Append-only JSON Lines file; one record per line, flushed on close. */
export class JsonlWriter {
  readonly path: string;
  private readonly stream: WriteStream;
  private failure: Error | null = null;
  private closed = false;
  private count = 0;

  constructor(path: string) {
    this.path = path;
    this.stream = createWriteStream(path, { flags: "a" });
    this.stream.on("error", (error) => {
      this.failure = error;
    });
  }

  get recordCount(): number {
    return this.count;
  }

  append(record: unknown): void {
    if (this.closed) {
      throw new Error(`JSONL writer is closed: ${this.path}`);
    }
    if (this.failure) {
      throw this.failure;
    }
    this.stream.write(`${JSON.stringify(record)}\n`);
    this.count += 1;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.failure) {
      throw this.failure;
    }
    const finished = once(this.stream, "finish");
    this.stream.end();
    await finished;
  }
}

/** Writes through a sibling `.tmp` file so readers never see a half-written artifact. */
export const writeTextAtomic = (path: string, text: string): void => {
  const tmpPath = `${path}.tmp`;
  writeFileSync(tmpPath, text.endsWith("\n") ? text : `${text}\n`, "utf8");
  renameSync(tmpPath, path);
};

export const writeJsonAtomic = (path: string, data: unknown): void => {
  writeTextAtomic(path, JSON.stringify(data, null, 2));
};
