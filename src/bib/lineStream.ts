export type Line = {
  index: number;
  text: string;
  eol: string;
};

/**
 * Pull-based cursor over the lines of a text. Each line keeps its own
 * terminator so callers can write untouched lines back byte for byte.
 */
export class LineStream {
  private position = 0;

  private constructor(private readonly lines: readonly Line[]) {}

  static fromText(text: string): LineStream {
    const lines: Line[] = [];
    const re = /([^\n]*?)(\r?\n|$)/g;
    let match: RegExpExecArray | null;
    while ((match = re.exec(text))) {
      const body = match[1] ?? '';
      const eol = match[2] ?? '';
      if (!body && !eol) break;
      lines.push({ index: lines.length, text: body, eol });
    }
    return new LineStream(lines);
  }

  get done() {
    return this.position >= this.lines.length;
  }

  get length() {
    return this.lines.length;
  }

  peek(): Line | null {
    return this.lines[this.position] ?? null;
  }

  next(): Line | null {
    const line = this.lines[this.position] ?? null;
    if (line) this.position += 1;
    return line;
  }

  all(): readonly Line[] {
    return this.lines;
  }
}
