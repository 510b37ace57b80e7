import { ServerResponse } from "node:http";

/** Writes `text/event-stream` frames; JSON-encodes anything that is not already a string. */
export class SseWriter {
  private opened = false;

  constructor(private readonly res: ServerResponse) {}

  private get isOpen(): boolean {
    return this.opened && !this.res.writableEnded;
  }

  open(): void {
    if (this.opened) {
      return;
    }
    this.res.writeHead(200, {
      "Content-Type": "text/event-stream; charset=utf-8",
      "Cache-Control": "no-cache, no-transform",
      Connection: "keep-alive",
      "X-Accel-Buffering": "no",
    });
    this.opened = true;
  }

  send(event: string, data: unknown): void {
    if (!this.isOpen || this.res.destroyed) {
      return;
    }
    const payload = typeof data === "string" ? data : JSON.stringify(data);
    const dataLines = payload
      .split("\n")
      .map((line) => `data: ${line}`)
      .join("\n");
    this.res.write(`event: ${event}\n${dataLines}\n\n`);
  }

  end(): void {
    if (!this.res.writableEnded) {
      this.res.end();
    }
  }
}
