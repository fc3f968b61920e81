import * as crypto from 'crypto';
import * as os from 'os';
import * as path from 'path';

export interface DaemonInfo {
  port: number;
  pid: number;
}

export function getDaemonFilePath(projectRoot: string): string {
  const hash = crypto.createHash('md5').update(path.resolve(projectRoot)).digest('hex');
  return path.join(os.tmpdir(), `c-complete-daemon-${hash}.json`);
}

/** Returns null for anything that is not a `{port, pid}` record. */
export function parseDaemonInfo(content: string): DaemonInfo | null {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    return null;
  }
  if (typeof raw !== 'object' || raw === null) return null;

  const port: unknown = Reflect.get(raw, 'port');
  const pid: unknown = Reflect.get(raw, 'pid');
  if (typeof port !== 'number' || typeof pid !== 'number') return null;
  return { port, pid };
}
