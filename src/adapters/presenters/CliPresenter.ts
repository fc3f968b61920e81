import * as colors from '@colors/colors/safe';
import * as path from 'path';
import Table from 'cli-table3';
import {
  AppliedCompletion,
  CompletionList,
  ContextKind,
  IndexSnapshot,
  ScanSummary,
  SymbolKind,
} from '../../domain/entities';
import { SourcePosition } from '../../domain/SourcePosition';
import { TerminalColor, Theme } from '../../domain/theme';

export interface PresentOptions {
  table?: boolean;
}

// The same colour library cli-table3 applies to `style.head` and `style.border`.
const PAINT: Record<TerminalColor, (text: string) => string> = {
  black: colors.black,
  red: colors.red,
  green: colors.green,
  yellow: colors.yellow,
  blue: colors.blue,
  magenta: colors.magenta,
  cyan: colors.cyan,
  white: colors.white,
  gray: colors.gray,
};

export class CliPresenter {
  constructor(
    private readonly theme: Theme,
    private readonly color: boolean = Boolean(process.stdout.isTTY),
  ) {}

  private toRelativePath(filePath: string): string {
    return path.relative(process.cwd(), filePath);
  }

  private createTable(head: string[]) {
    return new Table({
      head,
      style: { head: this.theme.head, border: this.theme.border },
    });
  }

  private paintKind(kind: SymbolKind): string {
    if (!this.color) return kind;
    return PAINT[this.theme.kinds[kind]](kind);
  }

  presentCompletions(list: CompletionList, options: PresentOptions): void {
    if (!options.table) {
      console.log(JSON.stringify(list, null, 2));
      return;
    }

    console.log(`Context: ${list.context}  Prefix: ${list.prefix || '(none)'}`);
    if (list.candidates.length === 0) {
      console.log('No completions.');
      return;
    }

    const table = this.createTable(['Text', 'Kind']);
    for (const candidate of list.candidates) {
      table.push([candidate.text, this.paintKind(candidate.kind)]);
    }
    console.log(table.toString());
  }

  presentContext(context: ContextKind, options: PresentOptions): void {
    if (!options.table) {
      console.log(JSON.stringify({ context }, null, 2));
      return;
    }
    console.log(context);
  }

  presentApplied(text: string, result: AppliedCompletion, options: PresentOptions): void {
    const cursor = SourcePosition.fromOffset(result.newText, result.newCursorOffset).toString();
    if (!options.table) {
      console.log(JSON.stringify({ ...result, cursor }, null, 2));
      return;
    }

    const table = this.createTable(['Cursor', 'Offset', 'Inserted']);
    table.push([cursor, result.newCursorOffset, result.newText.length - text.length]);
    console.log(table.toString());

    console.log('\nText:');
    console.log('---------------------------------------------------');
    console.log(result.newText);
    console.log('---------------------------------------------------');
  }

  presentFiles(name: string, files: string[], options: PresentOptions): void {
    if (!options.table) {
      console.log(JSON.stringify({ name, files }, null, 2));
      return;
    }
    if (files.length === 0) {
      console.log(`No files define ${name}.`);
      return;
    }

    const table = this.createTable(['File']);
    for (const file of files) {
      table.push([this.toRelativePath(file)]);
    }
    console.log(table.toString());
  }

  presentScan(summary: ScanSummary, options: PresentOptions): void {
    if (!options.table) {
      console.log(JSON.stringify(summary, null, 2));
      return;
    }

    const table = this.createTable(['Root', 'Files', 'Skipped', 'Functions', 'Headers', 'Types', 'ms']);
    table.push([
      summary.root,
      summary.filesVisited,
      summary.filesSkipped,
      summary.functions,
      summary.headers,
      summary.types,
      summary.elapsedMs,
    ]);
    console.log(table.toString());
  }

  presentIndex(snapshot: IndexSnapshot, options: PresentOptions): void {
    if (!options.table) {
      console.log(JSON.stringify(snapshot, null, 2));
      return;
    }

    const table = this.createTable(['Function', 'Files']);
    for (const [name, files] of Object.entries(snapshot.functions)) {
      table.push([name, files.map((f) => this.toRelativePath(f)).join('\n')]);
    }
    console.log(table.toString());
    console.log(`Headers: ${snapshot.headers.join(', ') || '(none)'}`);
    console.log(`Types: ${snapshot.types.join(', ') || '(none)'}`);
  }
}
