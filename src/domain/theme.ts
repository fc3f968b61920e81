import { SymbolKind } from './entities';
import { UnknownThemeError } from './errors';

// Color names understood by cli-table3's styling.
export type TerminalColor =
  | 'black'
  | 'red'
  | 'green'
  | 'yellow'
  | 'blue'
  | 'magenta'
  | 'cyan'
  | 'white'
  | 'gray';

export interface Theme {
  name: string;
  head: TerminalColor[];
  border: TerminalColor[];
  kinds: Record<SymbolKind, TerminalColor>;
}

export const THEMES: readonly Theme[] = [
  {
    name: 'vscode_dark',
    head: ['cyan'],
    border: ['gray'],
    kinds: {
      keyword: 'blue',
      type: 'cyan',
      function: 'yellow',
      variable: 'cyan',
      preprocessor: 'magenta',
      header: 'green',
      snippet: 'white',
    },
  },
  {
    name: 'xcode_dark',
    head: ['magenta'],
    border: ['gray'],
    kinds: {
      keyword: 'magenta',
      type: 'cyan',
      function: 'blue',
      variable: 'cyan',
      preprocessor: 'yellow',
      header: 'red',
      snippet: 'white',
    },
  },
  {
    name: 'light',
    head: ['blue'],
    border: ['black'],
    kinds: {
      keyword: 'blue',
      type: 'green',
      function: 'magenta',
      variable: 'black',
      preprocessor: 'red',
      header: 'red',
      snippet: 'black',
    },
  },
];

export const DEFAULT_THEME_NAME = 'vscode_dark';

export interface ThemeState {
  readonly current: Theme;
}

function findTheme(name: string): Theme {
  const theme = THEMES.find((t) => t.name === name);
  if (!theme) {
    throw new UnknownThemeError(
      name,
      THEMES.map((t) => t.name),
    );
  }
  return theme;
}

export function createThemeState(name: string = DEFAULT_THEME_NAME): ThemeState {
  return { current: findTheme(name) };
}

/** Returns a new state; `state` is left untouched. */
export function setTheme(state: ThemeState, name: string): ThemeState {
  if (state.current.name === name) {
    return state;
  }
  return { current: findTheme(name) };
}

export function cycleTheme(state: ThemeState): ThemeState {
  const index = THEMES.findIndex((t) => t.name === state.current.name);
  return { current: THEMES[(index + 1) % THEMES.length] };
}
