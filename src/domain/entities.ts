export type SymbolKind =
  | 'keyword'
  | 'type'
  | 'function'
  | 'variable'
  | 'preprocessor'
  | 'header'
  | 'snippet';

export const SYMBOL_KINDS: readonly SymbolKind[] = [
  'keyword',
  'type',
  'function',
  'variable',
  'preprocessor',
  'header',
  'snippet',
];

export type ContextKind =
  | 'string'
  | 'comment'
  | 'include'
  | 'preprocessor'
  | 'function-args'
  | 'struct-member'
  | 'general';

export interface CompletionCandidate {
  kind: SymbolKind;
  text: string;
}

export interface CompletionList {
  context: ContextKind;
  prefix: string;
  candidates: CompletionCandidate[];
}

export interface AppliedCompletion {
  newText: string;
  newCursorOffset: number; // 0-based, one unit per UTF-16 code unit
}

// name -> offset of its last declaration before the cursor
export type LocalVariableTable = Map<string, number>;

export interface IndexSnapshot {
  root: string | null;
  functions: Record<string, string[]>;
  headers: string[];
  types: string[];
}

export interface ScanSummary {
  root: string;
  filesVisited: number;
  filesSkipped: number;
  functions: number;
  headers: number;
  types: number;
  elapsedMs: number;
}
