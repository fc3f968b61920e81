import {
  allStdlibFunctions,
  C_KEYWORDS,
  C_MEMBER_PLACEHOLDERS,
  C_PREPROCESSOR_DIRECTIVES,
  C_STANDARD_HEADERS,
  C_TYPES,
  getSnippet,
  isStandardHeader,
  snippetNames,
  stdlibFunctionsFor,
} from '../domain/cLanguage';
import { assertCursor, classify } from '../domain/context';
import {
  AppliedCompletion,
  CompletionCandidate,
  CompletionList,
  ContextKind,
  SymbolKind,
} from '../domain/entities';
import { UnknownSnippetError } from '../domain/errors';
import { extractIncludes, extractLocalVariables, extractTypeNames } from '../domain/extractors';
import { identifierPrefix } from '../domain/lexer';
import { MatchMode, rankCandidates } from '../utils/sorter';
import { ISymbolSource } from './ports/ISymbolSource';

export interface CompletionOptions {
  matchMode: MatchMode;
  maxResults: number | null;
}

export const DEFAULT_COMPLETION_OPTIONS: CompletionOptions = {
  matchMode: 'contains',
  maxResults: null,
};

// The cursor lands after the first line break + one indent level of a snippet.
const SNIPPET_CURSOR_ANCHOR = '\n    ';

function asCandidates(kind: SymbolKind, names: Iterable<string>): CompletionCandidate[] {
  return Array.from(names, (text) => ({ kind, text }));
}

/**
 * Answers completion queries against a document buffer and a flat cursor
 * offset. Every call re-derives its context from the text; the symbol source
 * is only read.
 */
export class CompletionEngine {
  private readonly options: CompletionOptions;

  constructor(
    private readonly symbols: ISymbolSource,
    options: Partial<CompletionOptions> = {},
  ) {
    this.options = { ...DEFAULT_COMPLETION_OPTIONS, ...options };
  }

  classify(text: string, offset: number): ContextKind {
    return classify(text, offset);
  }

  getCompletions(text: string, offset: number): CompletionCandidate[] {
    return this.complete(text, offset).candidates;
  }

  /** Like `getCompletions`, but also reports the context and prefix used. */
  complete(text: string, offset: number): CompletionList {
    const context = classify(text, offset);
    const prefix = identifierPrefix(text, offset);

    if (context === 'string' || context === 'comment' || prefix === '') {
      return { context, prefix, candidates: [] };
    }

    const ranked = rankCandidates(this.gather(context, text, offset), prefix, this.options.matchMode);
    const candidates =
      this.options.maxResults === null ? ranked : ranked.slice(0, this.options.maxResults);

    return { context, prefix, candidates };
  }

  applyCompletion(text: string, offset: number, candidate: CompletionCandidate): AppliedCompletion {
    assertCursor(text, offset);
    const start = offset - identifierPrefix(text, offset).length;
    const before = text.slice(0, start);
    const after = text.slice(offset);

    if (candidate.kind === 'snippet') {
      const template = getSnippet(candidate.text);
      if (template === undefined) {
        throw new UnknownSnippetError(candidate.text);
      }
      const anchor = template.indexOf(SNIPPET_CURSOR_ANCHOR);
      return {
        newText: before + template + after,
        newCursorOffset:
          anchor === -1 ? start + template.length : start + anchor + SNIPPET_CURSOR_ANCHOR.length,
      };
    }

    if (candidate.kind === 'function') {
      return {
        newText: `${before}${candidate.text}()${after}`,
        newCursorOffset: start + candidate.text.length + 1,
      };
    }

    return {
      newText: before + candidate.text + after,
      newCursorOffset: start + candidate.text.length,
    };
  }

  private gather(context: ContextKind, text: string, offset: number): CompletionCandidate[] {
    switch (context) {
      case 'include':
        return asCandidates('header', [...C_STANDARD_HEADERS, ...this.symbols.headerNames()]);
      case 'preprocessor':
        return asCandidates('preprocessor', C_PREPROCESSOR_DIRECTIVES);
      case 'struct-member':
        // No receiver type resolution: a fixed placeholder set.
        return asCandidates('variable', C_MEMBER_PLACEHOLDERS);
      default:
        return this.gatherCode(text, offset);
    }
  }

  private gatherCode(text: string, offset: number): CompletionCandidate[] {
    const before = text.slice(0, offset);
    const documentTypes = extractTypeNames(before);
    const projectTypes = this.symbols.typeNames();
    const locals = extractLocalVariables(text, offset, [...documentTypes, ...projectTypes]);

    return [
      ...asCandidates('keyword', C_KEYWORDS),
      ...asCandidates('type', C_TYPES),
      ...asCandidates('function', this.libraryFunctions(before)),
      ...asCandidates('function', this.symbols.functionNames()),
      ...asCandidates('type', projectTypes),
      ...asCandidates('type', documentTypes),
      ...asCandidates('variable', locals.keys()),
      ...asCandidates('snippet', snippetNames()),
    ];
  }

  // Scoped to the standard headers included before the cursor. A buffer that
  // includes none yet is offered the whole table.
  private libraryFunctions(before: string): string[] {
    const included = extractIncludes(before).filter(isStandardHeader);
    return included.length > 0 ? stdlibFunctionsFor(included) : allStdlibFunctions();
  }
}
