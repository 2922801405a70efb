/**
 * Redraws a small list of status lines in place on stdout.
 */
export class Printer {
  private items: Map<string, [string, boolean]>;
  private lastRender: string = '';

  constructor() {
    this.items = new Map();
  }

  end(): void {
    this.flush();
    process.stdout.write('\n');
  }

  updateItem(itemId: string, content: string, isDone: boolean = false): void {
    this.items.set(itemId, [content, isDone]);
    this.flush();
  }

  markItemDone(itemId: string, content?: string): void {
    const item = this.items.get(itemId);
    if (item) {
      this.items.set(itemId, [content ?? item[0], true]);
    }
    this.flush();
  }

  private flush(): void {
    const lines: string[] = [];

    for (const [content, isDone] of this.items.values()) {
      lines.push(isDone ? `✓ ${content}` : `... ${content}`);
    }

    if (this.lastRender) {
      const numLines = this.lastRender.split('\n').length;
      for (let i = 1; i < numLines; i++) {
        process.stdout.write('\x1b[2K'); // Clear line
        process.stdout.write('\x1b[1A'); // Move up one line
      }
      process.stdout.write('\x1b[2K\r');
    }

    const output = lines.join('\n');
    process.stdout.write(output);
    this.lastRender = output;
  }
}
