import { IFileRepository } from './ports/IFileRepository';
import { IProjectScanner } from './ports/IProjectScanner';
import { SymbolIndex } from './SymbolIndex';

const PROJECT: Record<string, string> = {
  '/proj/src/main.c': [
    '#include <stdio.h>',
    '#include "util.h"',
    '',
    'int main(void) {',
    '    return util_add(1, 2);',
    '}',
  ].join('\n'),
  '/proj/src/util.c': ['#include "util.h"', '', 'int util_add(int a, int b) {', '    return a + b;', '}'].join(
    '\n',
  ),
  '/proj/include/util.h': [
    '#ifndef UTIL_H',
    '#define UTIL_H',
    'typedef struct { int x; } vec_t;',
    'int util_add(int a, int b);',
    '#endif',
  ].join('\n'),
};

describe('SymbolIndex', () => {
  let scanner: jest.Mocked<IProjectScanner>;
  let fileRepo: jest.Mocked<IFileRepository>;
  let index: SymbolIndex;

  beforeEach(() => {
    scanner = { scan: jest.fn().mockResolvedValue([...Object.keys(PROJECT), '/proj/src/locked.c']) };
    fileRepo = {
      readFile: jest.fn(async (filePath: string) => {
        const content = PROJECT[filePath];
        if (content === undefined) {
          throw new Error(`EACCES: permission denied, open '${filePath}'`);
        }
        return content;
      }),
    };
    index = new SymbolIndex(scanner, fileRepo);
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should start empty', () => {
    expect(index.snapshot()).toEqual({ root: null, functions: {}, headers: [], types: [] });
  });

  it('should harvest functions, headers and types from every file', async () => {
    const summary = await index.scan('/proj');

    expect(scanner.scan).toHaveBeenCalledWith('/proj');
    expect(index.snapshot()).toEqual({
      root: '/proj',
      functions: {
        main: ['/proj/src/main.c'],
        util_add: ['/proj/include/util.h', '/proj/src/util.c'],
      },
      headers: ['stdio.h', 'util.h'],
      types: ['vec_t'],
    });
    expect(summary).toMatchObject({
      root: '/proj',
      filesVisited: 4,
      filesSkipped: 1,
      functions: 2,
      headers: 2,
      types: 1,
    });
  });

  it('should skip unreadable files and keep scanning', async () => {
    await index.scan('/proj');

    expect(fileRepo.readFile).toHaveBeenCalledTimes(4);
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining('Skipping unreadable file /proj/src/locked.c'),
    );
    expect(index.filesDefining('util_add')).toEqual(['/proj/include/util.h', '/proj/src/util.c']);
  });

  it('should produce an identical state when scanning an unchanged tree twice', async () => {
    await index.scan('/proj');
    const first = index.snapshot();
    await index.scan('/proj');
    expect(index.snapshot()).toEqual(first);
  });

  it('should replace the whole state on re-scan', async () => {
    await index.scan('/proj');
    scanner.scan.mockResolvedValue(['/proj/src/util.c']);

    await index.scan('/proj');

    expect(index.functionNames()).toEqual(['util_add']);
    expect(index.filesDefining('util_add')).toEqual(['/proj/src/util.c']);
    expect(index.filesDefining('main')).toEqual([]);
    expect(index.headerNames()).toEqual(['util.h']);
    expect(index.typeNames()).toEqual([]);
  });

  it('should keep serving the previous state while a scan is in flight', async () => {
    await index.scan('/proj');

    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    scanner.scan.mockResolvedValue(['/proj/src/util.c']);
    fileRepo.readFile.mockImplementation(async (filePath: string) => {
      await gate;
      return PROJECT[filePath];
    });

    const pending = index.scan('/proj');
    await Promise.resolve();
    expect(index.functionNames().sort()).toEqual(['main', 'util_add']);

    release();
    await pending;
    expect(index.functionNames()).toEqual(['util_add']);
  });

  it('should run overlapping scans one after another', async () => {
    scanner.scan
      .mockResolvedValueOnce(['/proj/src/main.c'])
      .mockResolvedValueOnce(['/proj/src/util.c']);

    const first = index.scan('/proj');
    const second = index.scan('/proj');
    expect(scanner.scan).toHaveBeenCalledTimes(0);

    expect((await first).functions).toBe(1);
    expect((await second).functions).toBe(1);
    expect(index.functionNames()).toEqual(['util_add']);
  });

  it('should not throw when the tree cannot be listed', async () => {
    scanner.scan.mockRejectedValue(new Error('ENOENT'));

    const summary = await index.scan('/missing');

    expect(summary.filesVisited).toBe(0);
    expect(index.snapshot()).toEqual({ root: '/missing', functions: {}, headers: [], types: [] });
  });
});
