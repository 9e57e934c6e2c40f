import { describe, it, expect, beforeEach } from 'vitest';
import { ANSI, TerminalRenderer, type TextSink } from '../core/render/terminal';

class MemorySink implements TextSink {
  readonly chunks: string[] = [];

  write(chunk: string) {
    this.chunks.push(chunk);
    return true;
  }
}

describe('TerminalRenderer', () => {
  let sink: MemorySink;
  let renderer: TerminalRenderer;

  beforeEach(() => {
    sink = new MemorySink();
    renderer = new TerminalRenderer(sink);
  });

  it('should home the cursor and clear the screen', () => {
    renderer.clear();
    expect(sink.chunks).toEqual(['\x1b[H\x1b[2J']);
  });

  it('should write lines in order with a trailing newline', () => {
    renderer.print(['first', '', 'third']);
    expect(sink.chunks).toEqual(['first\n\nthird\n']);
  });

  it('should write nothing for no lines', () => {
    renderer.print([]);
    expect(sink.chunks).toEqual([]);
  });

  it('should toggle cursor visibility', () => {
    renderer.hideCursor();
    renderer.showCursor();
    expect(sink.chunks).toEqual([ANSI.hideCursor, ANSI.showCursor]);
    expect(ANSI.hideCursor).toBe('\x1b[?25l');
  });
});
