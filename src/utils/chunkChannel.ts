/**
 * Single-consumer async queue of text chunks. Producers push without
 * waiting for the consumer; the consumer sees chunks in push order and
 * finishes once the channel is closed and drained.
 */
export class ChunkChannel implements AsyncIterable<string> {
  private readonly pending: string[] = [];
  private closed = false;
  private wake: (() => void) | null = null;

  push(chunk: string): void {
    if (this.closed) return;
    this.pending.push(chunk);
    this.signal();
  }

  close(): void {
    this.closed = true;
    this.signal();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<string, void, undefined> {
    while (true) {
      const next = this.pending.shift();
      if (next !== undefined) {
        yield next;
        continue;
      }
      if (this.closed) return;
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  private signal(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
