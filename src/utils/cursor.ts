import { InvalidCursorError } from '../domain/errors';
import { SourcePosition } from '../domain/SourcePosition';

export interface CursorOptions {
  offset?: number | string;
  at?: number | string;
}

/**
 * Turns the CLI's position flags into a flat offset. `--at` wins over
 * `--offset`; with neither, the cursor sits at the end of the file.
 */
export function resolveCursor(text: string, options: CursorOptions): number {
  if (options.at !== undefined) {
    return SourcePosition.parse(String(options.at)).toOffset(text);
  }
  if (options.offset !== undefined) {
    const offset = Number(options.offset);
    if (!Number.isInteger(offset)) {
      throw new InvalidCursorError(offset, text.length);
    }
    return offset;
  }
  return text.length;
}
