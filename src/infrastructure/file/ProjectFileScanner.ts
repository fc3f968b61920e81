import { Stats } from 'fs';
import * as fs from 'fs/promises';
import { glob } from 'glob';
import ignore from 'ignore';
import * as path from 'path';
import { DEFAULT_CONFIG, ScanOptions } from '../../config';
import { IProjectScanner } from '../../usecases/ports/IProjectScanner';

type Ignore = ReturnType<typeof ignore>;

export class ProjectFileScanner implements IProjectScanner {
  constructor(private readonly options: ScanOptions = DEFAULT_CONFIG) {}

  async scan(rootPath: string): Promise<string[]> {
    const ig = this.options.respectGitignore ? await this.loadGitignore(rootPath) : undefined;
    const results: string[] = [];
    await this.findSourceFiles(rootPath, rootPath, results, new Set(), ig);
    return results;
  }

  private async loadGitignore(rootPath: string): Promise<Ignore> {
    const ig = ignore();
    try {
      const gitignoreFiles = await glob('**/.gitignore', {
        cwd: rootPath,
        ignore: this.options.excludeDirs.map((dir) => `**/${dir}/**`),
      });

      // Root first, so nested files can refine its rules
      gitignoreFiles.sort((a, b) => a.length - b.length);

      for (const gitignoreFile of gitignoreFiles) {
        const content = await fs.readFile(path.join(rootPath, gitignoreFile), 'utf-8');
        const gitignoreDir = path.dirname(gitignoreFile);

        if (gitignoreDir === '.') {
          ig.add(content);
        } else {
          ig.add(content.split(/\r?\n/).map((line) => this.scopePattern(line, gitignoreDir)));
        }
      }
    } catch (e) {
      console.warn('Failed to process .gitignore files:', e);
    }
    return ig;
  }

  // Rewrites a nested .gitignore line so it applies relative to the root.
  private scopePattern(line: string, gitignoreDir: string): string {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) return line;

    const isNegated = trimmed.startsWith('!');
    const pattern = isNegated ? trimmed.slice(1) : trimmed;
    const cleanPattern = pattern.startsWith('/') ? pattern.slice(1) : pattern;

    // ignore expects forward slashes
    const prefixed = path.posix.join(gitignoreDir.split(path.sep).join('/'), cleanPattern);
    return isNegated ? `!${prefixed}` : prefixed;
  }

  private isFull(results: string[]): boolean {
    return this.options.maxFiles !== null && results.length >= this.options.maxFiles;
  }

  private async findSourceFiles(
    dir: string,
    rootPath: string,
    results: string[],
    visited: Set<string>,
    ig?: Ignore,
  ): Promise<void> {
    // Symlinked directories are followed, each real directory once.
    let realDir: string;
    try {
      realDir = await fs.realpath(dir);
    } catch (e) {
      console.warn(`Failed to resolve directory ${dir}: ${e}`);
      return;
    }
    if (visited.has(realDir)) return;
    visited.add(realDir);

    let list: string[];
    try {
      list = await fs.readdir(dir);
    } catch (e) {
      console.warn(`Failed to read directory ${dir}: ${e}`);
      return;
    }

    for (const file of list.sort()) {
      if (this.isFull(results)) return;

      const filePath = path.join(dir, file);
      if (ig) {
        const relativePath = path.relative(rootPath, filePath);
        if (relativePath && ig.ignores(relativePath)) {
          continue;
        }
      }

      let stat: Stats;
      try {
        stat = await fs.stat(filePath);
      } catch (e) {
        console.warn(`Failed to stat ${filePath}: ${e}`);
        continue;
      }

      if (stat.isDirectory()) {
        if (!this.options.excludeDirs.includes(file)) {
          await this.findSourceFiles(filePath, rootPath, results, visited, ig);
        }
      } else if (this.options.extensions.includes(path.extname(file))) {
        const { maxFileSizeKb } = this.options;
        if (maxFileSizeKb !== null && stat.size > maxFileSizeKb * 1024) {
          console.warn(`Skipping ${filePath}: larger than ${maxFileSizeKb} KB`);
          continue;
        }
        results.push(filePath);
      }
    }
  }
}
