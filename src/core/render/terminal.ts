export interface Renderer {
  clear(): void;
  /** Lines are written top to bottom in the order given. */
  print(lines: readonly string[]): void;
  hideCursor(): void;
  showCursor(): void;
}

export const ANSI = Object.freeze({
  clear: '\x1b[H\x1b[2J',
  hideCursor: '\x1b[?25l',
  showCursor: '\x1b[?25h',
});

export interface TextSink {
  write(chunk: string): unknown;
}

export class TerminalRenderer implements Renderer {
  constructor(private readonly out: TextSink = process.stdout) {}

  clear() {
    this.out.write(ANSI.clear);
  }

  print(lines: readonly string[]) {
    if (lines.length === 0) return;
    this.out.write(lines.join('\n') + '\n');
  }

  hideCursor() {
    this.out.write(ANSI.hideCursor);
  }

  showCursor() {
    this.out.write(ANSI.showCursor);
  }
}
