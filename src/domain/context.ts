import { ContextKind } from './entities';
import { InvalidCursorError } from './errors';
import { currentLine, identifierPrefix } from './lexer';

const INCLUDE_LINE = /^\s*#\s*include\b/;
const DIRECTIVE_LINE = /^\s*#/;

export function assertCursor(text: string, offset: number): void {
  if (!Number.isInteger(offset) || offset < 0 || offset > text.length) {
    throw new InvalidCursorError(offset, text.length);
  }
}

/**
 * Classifies the lexical context at `offset`. The checks are ordered: string
 * and comment dominate everything, the line-anchored directive checks run
 * before the paren-balance heuristic.
 */
export function classify(text: string, offset: number): ContextKind {
  assertCursor(text, offset);
  const before = text.slice(0, offset);

  if (isInsideString(before)) return 'string';
  if (isInsideComment(before)) return 'comment';

  const line = currentLine(text, offset);
  if (INCLUDE_LINE.test(line)) return 'include';
  if (DIRECTIVE_LINE.test(line)) return 'preprocessor';

  if (hasUnmatchedOpenParen(before)) return 'function-args';
  if (isMemberAccess(text, offset)) return 'struct-member';

  return 'general';
}

function isInsideString(before: string): boolean {
  let quotes = 0;
  for (let i = 0; i < before.length; i++) {
    if (before[i] === '"' && before[i - 1] !== '\\') {
      quotes++;
    }
  }
  return quotes % 2 === 1;
}

function isInsideComment(before: string): boolean {
  const block = before.lastIndexOf('/*');
  if (block !== -1 && before.indexOf('*/', block + 2) === -1) {
    return true;
  }
  const line = before.lastIndexOf('//');
  return line !== -1 && before.indexOf('\n', line) === -1;
}

// An argument list never spans a block boundary, so the scan stops at braces.
function hasUnmatchedOpenParen(before: string): boolean {
  let depth = 0;
  for (let i = before.length - 1; i >= 0; i--) {
    const ch = before[i];
    if (ch === ')') {
      depth++;
    } else if (ch === '(') {
      if (depth === 0) return true;
      depth--;
    } else if (ch === '{' || ch === '}') {
      return false;
    }
  }
  return false;
}

function isMemberAccess(text: string, offset: number): boolean {
  const start = offset - identifierPrefix(text, offset).length;
  return text[start - 1] === '.' || text.slice(Math.max(0, start - 2), start) === '->';
}
