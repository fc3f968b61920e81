const IDENTIFIER_CHAR = /[A-Za-z0-9_]/;

export function isIdentifierChar(ch: string): boolean {
  return IDENTIFIER_CHAR.test(ch);
}

/**
 * Returns the identifier run (letters, digits, underscore) that ends exactly
 * at `offset`. Empty when the character before `offset` is not part of one.
 */
export function identifierPrefix(text: string, offset: number): string {
  let start = offset;
  while (start > 0 && isIdentifierChar(text[start - 1])) {
    start--;
  }
  return text.slice(start, offset);
}

export function lineStartOf(text: string, offset: number): number {
  if (offset <= 0) return 0;
  return text.lastIndexOf('\n', offset - 1) + 1;
}

export function lineEndOf(text: string, offset: number): number {
  const end = text.indexOf('\n', offset);
  return end === -1 ? text.length : end;
}

/** The whole line containing `offset`, without its newline. */
export function currentLine(text: string, offset: number): string {
  return text.slice(lineStartOf(text, offset), lineEndOf(text, offset));
}

type LexState = 'code' | 'line-comment' | 'block-comment' | 'string' | 'char';

/**
 * Replaces the contents of comments, string literals and character literals
 * with spaces. Delimiters, newlines and every offset are kept, so positions
 * found in the masked text are valid in the original one.
 */
export function maskNonCode(text: string): string {
  const out: string[] = new Array(text.length);
  let state: LexState = 'code';
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    const next = text[i + 1];

    switch (state) {
      case 'code':
        out[i] = ch;
        if (ch === '/' && next === '/') {
          out[i + 1] = next;
          state = 'line-comment';
          i += 2;
          continue;
        }
        if (ch === '/' && next === '*') {
          out[i + 1] = next;
          state = 'block-comment';
          i += 2;
          continue;
        }
        if (ch === '"') state = 'string';
        else if (ch === "'") state = 'char';
        break;

      case 'line-comment':
        if (ch === '\n') {
          out[i] = ch;
          state = 'code';
        } else {
          out[i] = ' ';
        }
        break;

      case 'block-comment':
        if (ch === '*' && next === '/') {
          out[i] = ch;
          out[i + 1] = next;
          state = 'code';
          i += 2;
          continue;
        }
        out[i] = ch === '\n' ? ch : ' ';
        break;

      case 'string':
      case 'char': {
        const quote = state === 'string' ? '"' : "'";
        if (ch === '\\' && next !== undefined) {
          out[i] = ' ';
          out[i + 1] = next === '\n' ? next : ' ';
          i += 2;
          continue;
        }
        if (ch === quote || ch === '\n') {
          // an unterminated literal ends at the line break
          out[i] = ch;
          state = 'code';
        } else {
          out[i] = ' ';
        }
        break;
      }
    }
    i++;
  }

  return out.join('');
}
