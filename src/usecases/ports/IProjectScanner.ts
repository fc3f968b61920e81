export interface IProjectScanner {
  /** Absolute paths of every source file under `rootPath`. */
  scan(rootPath: string): Promise<string[]>;
}
