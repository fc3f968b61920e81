import cLanguage from '../data/c-language.json';

export const C_KEYWORDS: readonly string[] = cLanguage.keywords;
export const C_TYPES: readonly string[] = cLanguage.types;
export const C_PREPROCESSOR_DIRECTIVES: readonly string[] = cLanguage.preprocessorDirectives;
export const C_STANDARD_HEADERS: readonly string[] = cLanguage.standardHeaders;
export const C_MEMBER_PLACEHOLDERS: readonly string[] = cLanguage.memberPlaceholders;

const STDLIB_BY_HEADER: Readonly<Record<string, readonly string[]>> = cLanguage.stdlibByHeader;
const SNIPPETS: Readonly<Record<string, string>> = cLanguage.snippets;

const RESERVED = new Set<string>([...C_KEYWORDS, ...C_TYPES]);
const STANDARD_HEADER_SET = new Set<string>(C_STANDARD_HEADERS);

export function isReservedWord(word: string): boolean {
  return RESERVED.has(word);
}

export function isStandardHeader(header: string): boolean {
  return STANDARD_HEADER_SET.has(header);
}

/**
 * Library functions declared by the given headers. Headers without an entry
 * in the table contribute nothing.
 */
export function stdlibFunctionsFor(headers: Iterable<string>): string[] {
  const result: string[] = [];
  for (const header of headers) {
    const functions = STDLIB_BY_HEADER[header];
    if (functions) {
      result.push(...functions);
    }
  }
  return result;
}

export function allStdlibFunctions(): string[] {
  return stdlibFunctionsFor(Object.keys(STDLIB_BY_HEADER));
}

export function snippetNames(): string[] {
  return Object.keys(SNIPPETS);
}

export function getSnippet(name: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(SNIPPETS, name) ? SNIPPETS[name] : undefined;
}
