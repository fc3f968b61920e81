import * as path from 'path';
import { IndexSnapshot, ScanSummary } from '../domain/entities';
import { extractFunctions, extractIncludes, extractTypeNames } from '../domain/extractors';
import { IFileRepository } from './ports/IFileRepository';
import { IProjectScanner } from './ports/IProjectScanner';
import { ISymbolSource } from './ports/ISymbolSource';

interface IndexState {
  root: string | null;
  functions: Map<string, Set<string>>;
  headers: Set<string>;
  types: Set<string>;
}

function emptyState(root: string | null = null): IndexState {
  return { root, functions: new Map(), headers: new Set(), types: new Set() };
}

/**
 * Project-wide cache of function names, included headers and type names,
 * harvested from every C source and header under a root directory.
 *
 * A scan builds a complete new state off to the side and swaps it in with a
 * single assignment once every file has been read, so queries running while
 * a scan is in flight keep seeing the previous state.
 */
export class SymbolIndex implements ISymbolSource {
  private state: IndexState = emptyState();

  // Scans run one after another; a second request waits for the first.
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly scanner: IProjectScanner,
    private readonly fileRepo: IFileRepository,
  ) {}

  scan(projectRoot: string): Promise<ScanSummary> {
    const run = this.queue.then(() => this.runScan(projectRoot));
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async runScan(projectRoot: string): Promise<ScanSummary> {
    const startedAt = Date.now();
    const root = path.resolve(projectRoot);

    let files: string[] = [];
    try {
      files = await this.scanner.scan(root);
    } catch (e) {
      console.warn(`Failed to list source files under ${root}:`, e);
    }

    const next = emptyState(root);
    let skipped = 0;

    for (const filePath of [...files].sort()) {
      let content: string;
      try {
        content = await this.fileRepo.readFile(filePath);
      } catch (e) {
        console.warn(`Skipping unreadable file ${filePath}: ${e}`);
        skipped++;
        continue;
      }
      this.harvest(next, filePath, content);
    }

    this.state = next;

    return {
      root,
      filesVisited: files.length,
      filesSkipped: skipped,
      functions: next.functions.size,
      headers: next.headers.size,
      types: next.types.size,
      elapsedMs: Date.now() - startedAt,
    };
  }

  functionNames(): string[] {
    return [...this.state.functions.keys()];
  }

  filesDefining(name: string): string[] {
    return [...(this.state.functions.get(name) ?? [])].sort();
  }

  headerNames(): string[] {
    return [...this.state.headers];
  }

  typeNames(): string[] {
    return [...this.state.types];
  }

  snapshot(): IndexSnapshot {
    const functions: Record<string, string[]> = {};
    for (const name of [...this.state.functions.keys()].sort()) {
      functions[name] = this.filesDefining(name);
    }
    return {
      root: this.state.root,
      functions,
      headers: [...this.state.headers].sort(),
      types: [...this.state.types].sort(),
    };
  }

  private harvest(state: IndexState, filePath: string, content: string): void {
    for (const header of extractIncludes(content)) {
      state.headers.add(header);
    }
    for (const name of extractFunctions(content)) {
      let files = state.functions.get(name);
      if (!files) {
        files = new Set();
        state.functions.set(name, files);
      }
      files.add(filePath);
    }
    for (const type of extractTypeNames(content)) {
      state.types.add(type);
    }
  }
}
