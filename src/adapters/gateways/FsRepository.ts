import * as fs from 'fs/promises';
import { IFileRepository } from '../../usecases/ports/IFileRepository';

export class FsRepository implements IFileRepository {
  async readFile(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf-8');
  }

  /** Like `readFile`, but a missing file yields `null` instead of ENOENT. */
  async readFileIfExists(filePath: string): Promise<string | null> {
    try {
      return await fs.readFile(filePath, 'utf-8');
    } catch (e) {
      if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
        return null;
      }
      throw e;
    }
  }
}
