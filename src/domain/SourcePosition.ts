import { InvalidPositionError } from './errors';

/**
 * A 1-based `line:column` position. Hosts that think in lines and columns
 * convert through this class; the completion engine itself only takes flat
 * character offsets.
 */
export class SourcePosition {
  constructor(
    public readonly line: number,
    public readonly column: number,
  ) {}

  static parse(value: string): SourcePosition {
    const parts = value.split(':');
    if (parts.length !== 2) {
      throw new InvalidPositionError(value);
    }

    const line = Number(parts[0]);
    const column = Number(parts[1]);

    if (!Number.isInteger(line) || !Number.isInteger(column) || line < 1 || column < 1) {
      throw new InvalidPositionError(value);
    }
    return new SourcePosition(line, column);
  }

  static fromOffset(text: string, offset: number): SourcePosition {
    const before = text.slice(0, offset);
    const lines = before.split('\n');
    return new SourcePosition(lines.length, lines[lines.length - 1].length + 1);
  }

  /** Columns past the end of the line clamp to the line end. */
  toOffset(text: string): number {
    const lines = text.split('\n');
    if (this.line > lines.length) {
      throw new InvalidPositionError(this.toString());
    }

    let offset = 0;
    for (let i = 0; i < this.line - 1; i++) {
      offset += lines[i].length + 1;
    }
    return offset + Math.min(this.column - 1, lines[this.line - 1].length);
  }

  toString(): string {
    return `${this.line}:${this.column}`;
  }

  equals(other: SourcePosition): boolean {
    return this.line === other.line && this.column === other.column;
  }
}
