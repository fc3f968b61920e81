import * as fs from 'fs/promises';
import { glob } from 'glob';
import * as path from 'path';
import { DEFAULT_CONFIG } from '../../config';
import { ProjectFileScanner } from './ProjectFileScanner';

jest.mock('fs/promises');
jest.mock('glob');

const file = (size = 100) => ({ isDirectory: () => false, size });
const dir = () => ({ isDirectory: () => true, size: 0 });

describe('ProjectFileScanner', () => {
  let scanner: ProjectFileScanner;
  const rootPath = '/root';

  beforeEach(() => {
    scanner = new ProjectFileScanner();
    jest.clearAllMocks();
    (fs.realpath as unknown as jest.Mock).mockImplementation(async (p: string) => p);
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('scan', () => {
    it('should keep only C sources and headers', async () => {
      (fs.readdir as jest.Mock).mockResolvedValue(['main.c', 'util.h', 'README.md', 'build.sh']);
      (fs.stat as jest.Mock).mockResolvedValue(file());

      const result = await scanner.scan(rootPath);

      expect(result).toEqual([path.join(rootPath, 'main.c'), path.join(rootPath, 'util.h')]);
      expect(glob).not.toHaveBeenCalled();
    });

    it('should recursively scan directories without a depth limit', async () => {
      (fs.readdir as jest.Mock).mockImplementation(async (d: string) => {
        if (d === rootPath) return ['src', 'root.c'];
        if (d === path.join(rootPath, 'src')) return ['deep'];
        if (d === path.join(rootPath, 'src', 'deep')) return ['deeper'];
        if (d === path.join(rootPath, 'src', 'deep', 'deeper')) return ['leaf.c'];
        return [];
      });
      (fs.stat as jest.Mock).mockImplementation(async (p: string) =>
        p.endsWith('.c') ? file() : dir(),
      );

      const result = await scanner.scan(rootPath);

      expect(result).toEqual([
        path.join(rootPath, 'root.c'),
        path.join(rootPath, 'src', 'deep', 'deeper', 'leaf.c'),
      ]);
    });

    it('should visit a symlinked directory cycle once', async () => {
      const src = path.join(rootPath, 'src');
      const up = path.join(src, 'up');
      (fs.readdir as jest.Mock).mockImplementation(async (d: string) => {
        if (d === rootPath) return ['src'];
        if (d === src) return ['a.c', 'up'];
        if (d === up) return ['src'];
        return [];
      });
      (fs.realpath as unknown as jest.Mock).mockImplementation(async (p: string) =>
        p === up ? rootPath : p,
      );
      (fs.stat as jest.Mock).mockImplementation(async (p: string) =>
        p.endsWith('.c') ? file() : dir(),
      );

      const result = await scanner.scan(rootPath);

      expect(result).toEqual([path.join(src, 'a.c')]);
      expect(fs.readdir).toHaveBeenCalledTimes(2);
    });

    it('should ignore node_modules and .git', async () => {
      (fs.readdir as jest.Mock).mockResolvedValue(['node_modules', '.git', 'file.c']);
      (fs.stat as jest.Mock).mockImplementation(async (p: string) =>
        p.endsWith('.c') ? file() : dir(),
      );

      const result = await scanner.scan(rootPath);

      expect(result).toEqual([path.join(rootPath, 'file.c')]);
      expect(fs.readdir).toHaveBeenCalledTimes(1);
    });

    it('should skip entries that cannot be read and keep going', async () => {
      (fs.readdir as jest.Mock).mockImplementation(async (d: string) => {
        if (d === rootPath) return ['locked', 'a.c', 'b.c'];
        throw new Error('EACCES');
      });
      (fs.stat as jest.Mock).mockImplementation(async (p: string) => {
        if (p.endsWith('a.c')) throw new Error('ENOENT');
        return p.endsWith('.c') ? file() : dir();
      });

      const result = await scanner.scan(rootPath);

      expect(result).toEqual([path.join(rootPath, 'b.c')]);
      expect(console.warn).toHaveBeenCalledTimes(2);
    });

    it('should honour the file size and file count bounds', async () => {
      scanner = new ProjectFileScanner({ ...DEFAULT_CONFIG, maxFileSizeKb: 1, maxFiles: 3 });
      (fs.readdir as jest.Mock).mockResolvedValue(['a.c', 'big.c', 'b.c', 'c.c', 'd.c']);
      (fs.stat as jest.Mock).mockImplementation(async (p: string) =>
        file(p.endsWith('big.c') ? 4096 : 10),
      );

      const result = await scanner.scan(rootPath);

      expect(result).toEqual([
        path.join(rootPath, 'a.c'),
        path.join(rootPath, 'b.c'),
        path.join(rootPath, 'c.c'),
      ]);
      expect(console.warn).toHaveBeenCalledWith(
        `Skipping ${path.join(rootPath, 'big.c')}: larger than 1 KB`,
      );
    });

    it('should apply gitignore files when enabled', async () => {
      scanner = new ProjectFileScanner({ ...DEFAULT_CONFIG, respectGitignore: true });
      (glob as unknown as jest.Mock).mockResolvedValue(['.gitignore']);
      (fs.readFile as jest.Mock).mockResolvedValue('generated.c');
      (fs.readdir as jest.Mock).mockResolvedValue(['main.c', 'generated.c']);
      (fs.stat as jest.Mock).mockResolvedValue(file());

      const result = await scanner.scan(rootPath);

      expect(result).toEqual([path.join(rootPath, 'main.c')]);
    });

    it('should scope nested gitignore files to their directory', async () => {
      scanner = new ProjectFileScanner({ ...DEFAULT_CONFIG, respectGitignore: true });
      (glob as unknown as jest.Mock).mockResolvedValue(['src/.gitignore']);
      (fs.readFile as jest.Mock).mockResolvedValue('# generated\n/gen.c');
      (fs.readdir as jest.Mock).mockImplementation(async (d: string) => {
        if (d === rootPath) return ['gen.c', 'src'];
        if (d === path.join(rootPath, 'src')) return ['gen.c', 'main.c'];
        return [];
      });
      (fs.stat as jest.Mock).mockImplementation(async (p: string) =>
        p.endsWith('.c') ? file() : dir(),
      );

      const result = await scanner.scan(rootPath);

      expect(result).toEqual([path.join(rootPath, 'gen.c'), path.join(rootPath, 'src', 'main.c')]);
    });
  });
});
