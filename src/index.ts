export { FsRepository } from './adapters/gateways/FsRepository';
export { CONFIG_FILE, CompleterConfig, DEFAULT_CONFIG, loadConfig, parseConfig, ScanOptions } from './config';
export * from './domain/entities';
export * from './domain/errors';
export { SourcePosition } from './domain/SourcePosition';
export {
  createThemeState,
  cycleTheme,
  DEFAULT_THEME_NAME,
  setTheme,
  TerminalColor,
  Theme,
  THEMES,
  ThemeState,
} from './domain/theme';
export { ProjectFileScanner } from './infrastructure/file/ProjectFileScanner';
export { CompletionEngine, CompletionOptions, DEFAULT_COMPLETION_OPTIONS } from './usecases/CompletionEngine';
export { IFileRepository } from './usecases/ports/IFileRepository';
export { IProjectScanner } from './usecases/ports/IProjectScanner';
export { ISymbolSource } from './usecases/ports/ISymbolSource';
export { SymbolIndex } from './usecases/SymbolIndex';
export { MatchMode } from './utils/sorter';
