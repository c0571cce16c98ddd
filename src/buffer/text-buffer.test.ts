import { describe, it, expect, vi } from 'vitest';
import { TextBuffer, detectLineEnding } from './text-buffer.js';
import { lineStartOffset, positionToOffset, comparePositions, textBeforeCursor } from './offsets.js';

describe('TextBuffer', () => {
  describe('construction', () => {
    it('should split text into lines', () => {
      const buffer = TextBuffer.fromText('fn a() {\n}\n');

      expect(buffer.getLines()).toEqual(['fn a() {', '}', '']);
      expect(buffer.lineCount()).toBe(3);
    });

    it('should treat CRLF like LF', () => {
      expect(TextBuffer.fromText('a\r\nb').getLines()).toEqual(['a', 'b']);
    });

    it('should join lines with the requested line ending', () => {
      const text = 'fn a() {\r\n}\r\n';
      const buffer = TextBuffer.fromText(text);

      expect(detectLineEnding(text)).toBe('\r\n');
      expect(detectLineEnding('fn a() {\n}')).toBe('\n');
      expect(buffer.getText()).toBe('fn a() {\n}\n');
      expect(buffer.getText(detectLineEnding(text))).toBe(text);
    });

    it('should always hold at least one line', () => {
      expect(new TextBuffer([]).getLines()).toEqual(['']);
      expect(TextBuffer.fromText('').lineCount()).toBe(1);
    });

    it('should return empty text for lines outside the buffer', () => {
      const buffer = new TextBuffer(['only']);
      expect(buffer.lineText(5)).toBe('');
      expect(buffer.lineText(-1)).toBe('');
    });
  });

  describe('cursor', () => {
    it('should clamp positions into the buffer', () => {
      const buffer = new TextBuffer(['abc', 'de']);

      buffer.setCursorPosition(9, 9);
      expect(buffer.cursorPosition()).toEqual({ line: 1, column: 2 });

      buffer.setCursorPosition(-3, -1);
      expect(buffer.cursorPosition()).toEqual({ line: 0, column: 0 });
    });

    it('should hand out copies of the cursor', () => {
      const buffer = new TextBuffer(['abc']);
      const position = buffer.cursorPosition();
      position.column = 2;
      expect(buffer.cursorPosition().column).toBe(0);
    });
  });

  describe('insertText', () => {
    it('should insert at the cursor and advance it', () => {
      const buffer = new TextBuffer(['fn a()']);
      buffer.setCursorPosition(0, 6);

      buffer.insertText(' {');

      expect(buffer.getLines()).toEqual(['fn a() {']);
      expect(buffer.cursorPosition()).toEqual({ line: 0, column: 8 });
    });

    it('should split embedded newlines into lines', () => {
      const buffer = new TextBuffer(['ab']);
      buffer.setCursorPosition(0, 1);

      buffer.insertText('x\ny');

      expect(buffer.getLines()).toEqual(['ax', 'yb']);
      expect(buffer.cursorPosition()).toEqual({ line: 1, column: 1 });
    });
  });

  describe('insertLineBreak', () => {
    it('should move the rest of the line down', () => {
      const buffer = new TextBuffer(['return 1;']);
      buffer.setCursorPosition(0, 6);

      buffer.insertLineBreak();

      expect(buffer.getLines()).toEqual(['return', ' 1;']);
      expect(buffer.cursorPosition()).toEqual({ line: 1, column: 0 });
    });
  });

  describe('indentLineTo', () => {
    it('should replace leading whitespace', () => {
      const buffer = new TextBuffer(['  \treturn 1;']);
      buffer.indentLineTo(4);
      expect(buffer.lineText(0)).toBe('    return 1;');
    });

    it('should move a cursor inside the indentation to its end', () => {
      const buffer = new TextBuffer(['  x']);
      buffer.setCursorPosition(0, 1);

      buffer.indentLineTo(8);

      expect(buffer.cursorPosition()).toEqual({ line: 0, column: 8 });
    });

    it('should keep a cursor past the indentation on the same character', () => {
      const buffer = new TextBuffer(['        return 1;']);
      buffer.setCursorPosition(0, 10);

      buffer.indentLineTo(4);

      expect(buffer.cursorPosition()).toEqual({ line: 0, column: 6 });
    });

    it('should floor negative levels at zero', () => {
      const buffer = new TextBuffer(['  }']);
      buffer.indentLineTo(-4);
      expect(buffer.lineText(0)).toBe('}');
    });

    it('should not report a change when nothing changes', () => {
      const buffer = new TextBuffer(['    x']);
      const listener = vi.fn();
      buffer.onDidChange(listener);

      buffer.indentLineTo(4);

      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('atomic', () => {
    it('should fire one change notification for the whole edit', () => {
      const buffer = new TextBuffer(['a']);
      buffer.setCursorPosition(0, 1);
      const listener = vi.fn();
      buffer.onDidChange(listener);

      buffer.atomic(() => {
        buffer.insertText('b');
        buffer.insertLineBreak();
        buffer.insertText('c');
      });

      expect(listener).toHaveBeenCalledTimes(1);
      expect(buffer.version).toBe(1);
      expect(buffer.getLines()).toEqual(['ab', 'c']);
    });

    it('should roll back every mutation when the edit throws', () => {
      const buffer = new TextBuffer(['fn a() {']);
      buffer.setCursorPosition(0, 8);
      const listener = vi.fn();
      buffer.onDidChange(listener);

      expect(() =>
        buffer.atomic(() => {
          buffer.insertLineBreak();
          buffer.insertText('}');
          throw new Error('interrupted');
        }),
      ).toThrow('interrupted');

      expect(buffer.getLines()).toEqual(['fn a() {']);
      expect(buffer.cursorPosition()).toEqual({ line: 0, column: 8 });
      expect(listener).not.toHaveBeenCalled();
    });

    it('should notify once for nested edits', () => {
      const buffer = new TextBuffer(['']);
      const listener = vi.fn();
      buffer.onDidChange(listener);

      buffer.atomic(() => {
        buffer.insertText('x');
        buffer.atomic(() => buffer.insertText('y'));
      });

      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('should return the edit result', () => {
      const buffer = new TextBuffer();
      expect(buffer.atomic(() => 42)).toBe(42);
    });
  });

  it('should stop notifying after unsubscribe', () => {
    const buffer = new TextBuffer(['']);
    const listener = vi.fn();
    const dispose = buffer.onDidChange(listener);

    buffer.insertText('a');
    dispose();
    buffer.insertText('b');

    expect(listener).toHaveBeenCalledTimes(1);
  });
});

describe('offsets', () => {
  const buffer = new TextBuffer(['fn a() {', '    return 1;', '}']);

  it('should count one character per line break', () => {
    expect(lineStartOffset(buffer, 0)).toBe(0);
    expect(lineStartOffset(buffer, 1)).toBe(9);
    expect(lineStartOffset(buffer, 2)).toBe(23);
  });

  it('should convert positions to offsets', () => {
    expect(positionToOffset(buffer, { line: 1, column: 4 })).toBe(13);
  });

  it('should order positions', () => {
    expect(comparePositions({ line: 1, column: 0 }, { line: 0, column: 9 })).toBeGreaterThan(0);
    expect(comparePositions({ line: 2, column: 1 }, { line: 2, column: 3 })).toBeLessThan(0);
    expect(comparePositions({ line: 2, column: 1 }, { line: 2, column: 1 })).toBe(0);
  });

  it('should read the text before the cursor', () => {
    const local = new TextBuffer(['fn a() {  x']);
    local.setCursorPosition(0, 10);
    expect(textBeforeCursor(local)).toBe('fn a() {  ');
  });
});
