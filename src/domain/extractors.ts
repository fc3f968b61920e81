import { C_TYPES, isReservedWord } from './cLanguage';
import { LocalVariableTable } from './entities';
import { maskNonCode } from './lexer';

// Heuristic, line- and regex-based harvesting. None of this parses C: macro
// invocations shaped like prototypes are over-matched and unusual declarator
// layouts are missed.

const INCLUDE_LINE = /^\s*#\s*include\b/;
const INCLUDE_DIRECTIVE = /^\s*#\s*include\s*[<"]([^>"]+)[>"]/;
// One level of nested parens covers function-pointer parameters.
const CALL_SHAPE = /([A-Za-z_]\w*)\s*\(((?:[^(){};]|\([^(){};]*\))*)\)\s*[{;]/g;
const RETURN_TYPE_TAIL = /([A-Za-z_]\w*)[\s*]+$/;
const TAGGED_TYPE = /\b(?:struct|union|enum)\s+([A-Za-z_]\w*)\s*\{/g;
const TYPEDEF = /\btypedef\b/g;
const FUNCTION_POINTER_NAME = /\(\s*\*\s*([A-Za-z_]\w*)\s*\)/;
const TRAILING_DECLARATOR = /([A-Za-z_]\w*)\s*(?:\[[^\]]*\]\s*)*$/;
const NEXT_DECLARATOR = /^\s*(?:\[[^\]]*\]\s*)*(?:=[^,;(){}]*)?,[\s*]*([A-Za-z_]\w*)/;

// Words that can precede a call expression but never a function name.
const STATEMENT_WORDS = new Set(['return', 'else', 'case', 'goto', 'do']);
const RETURN_TYPE_WINDOW = 256;

// The directive is recognised on the masked line, so commented-out includes
// are dropped; the quoted name is blanked there and is read from the raw line.
export function extractIncludes(text: string): string[] {
  const rawLines = text.split('\n');
  const maskedLines = maskNonCode(text).split('\n');
  const headers = new Set<string>();

  maskedLines.forEach((masked, i) => {
    if (!INCLUDE_LINE.test(masked)) return;
    const match = INCLUDE_DIRECTIVE.exec(rawLines[i]);
    if (match) {
      headers.add(match[1]);
    }
  });
  return [...headers];
}

/**
 * Names of functions defined or declared in `text`, matched as
 * `<type tokens> name(params) {` or `... ;`.
 */
export function extractFunctions(text: string): string[] {
  const masked = maskNonCode(text);
  const names = new Set<string>();

  for (const match of masked.matchAll(CALL_SHAPE)) {
    const name = match[1];
    const index = match.index ?? 0;
    if (isReservedWord(name)) continue;

    const before = masked.slice(Math.max(0, index - RETURN_TYPE_WINDOW), index);
    const tail = RETURN_TYPE_TAIL.exec(before);
    if (!tail || STATEMENT_WORDS.has(tail[1])) continue;

    names.add(name);
  }
  return [...names];
}

/** Struct/union/enum tags and typedef names declared in `text`. */
export function extractTypeNames(text: string): string[] {
  const masked = maskNonCode(text);
  const names = new Set<string>();

  for (const match of masked.matchAll(TAGGED_TYPE)) {
    names.add(match[1]);
  }

  for (const match of masked.matchAll(TYPEDEF)) {
    const start = (match.index ?? 0) + match[0].length;
    const end = findDeclarationEnd(masked, start);
    if (end === -1) continue;
    const name = typedefName(masked.slice(start, end));
    if (name) {
      names.add(name);
    }
  }
  return [...names];
}

/**
 * Variables declared in `text[0:offset]`, mapped to the offset of their last
 * declaration. `knownTypes` extends the builtin type list with typedef names.
 */
export function extractLocalVariables(
  text: string,
  offset: number,
  knownTypes: Iterable<string> = [],
): LocalVariableTable {
  const masked = maskNonCode(text.slice(0, offset));
  const table: LocalVariableTable = new Map();

  const typeWords = [...new Set([...C_TYPES, ...knownTypes])].map(escapeRegExp);
  const declarator = String.raw`[\s*]+(?=([A-Za-z_]\w*)\b(?!\s*\())`;
  const patterns = [
    new RegExp(String.raw`\b(?:${typeWords.join('|')})\b${declarator}`, 'g'),
    new RegExp(String.raw`\b(?:struct|union|enum)\s+[A-Za-z_]\w*${declarator}`, 'g'),
  ];

  const found: [string, number][] = [];
  for (const pattern of patterns) {
    for (const match of masked.matchAll(pattern)) {
      let name = match[1];
      let position = (match.index ?? 0) + match[0].length;
      while (!isReservedWord(name)) {
        found.push([name, position]);
        const rest = masked.slice(position + name.length);
        const next = NEXT_DECLARATOR.exec(rest);
        if (!next) break;
        position = position + name.length + next[0].length - next[1].length;
        name = next[1];
      }
    }
  }

  found.sort((a, b) => a[1] - b[1]);
  for (const [name, position] of found) {
    table.set(name, position);
  }
  return table;
}

// Index of the `;` closing the declaration that starts at `from`, skipping
// over braced bodies.
function findDeclarationEnd(text: string, from: number): number {
  let depth = 0;
  for (let i = from; i < text.length; i++) {
    const ch = text[i];
    if (ch === '{') depth++;
    else if (ch === '}') depth = Math.max(0, depth - 1);
    else if (ch === ';' && depth === 0) return i;
  }
  return -1;
}

function typedefName(declaration: string): string | undefined {
  let outside = '';
  let depth = 0;
  for (const ch of declaration) {
    if (ch === '{') depth++;
    else if (ch === '}') depth = Math.max(0, depth - 1);
    else if (depth === 0) outside += ch;
  }

  const pointer = FUNCTION_POINTER_NAME.exec(outside);
  if (pointer) return pointer[1];

  const last = TRAILING_DECLARATOR.exec(outside.trimEnd());
  return last && !isReservedWord(last[1]) ? last[1] : undefined;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
