#!/usr/bin/env node
import axios from 'axios';
import cac from 'cac';
import { spawn } from 'child_process';
import * as fs from 'fs/promises';
import * as net from 'net';
import * as path from 'path';
import { CliPresenter, PresentOptions } from './adapters/presenters/CliPresenter';
import { loadConfig } from './config';
import {
  AppliedCompletion,
  CompletionList,
  ContextKind,
  IndexSnapshot,
  ScanSummary,
  SYMBOL_KINDS,
  SymbolKind,
} from './domain/entities';
import { SourcePosition } from './domain/SourcePosition';
import { createThemeState } from './domain/theme';
import { CursorOptions, resolveCursor } from './utils/cursor';
import { DaemonInfo, getDaemonFilePath, parseDaemonInfo } from './utils/daemon';

type OutputOptions = PresentOptions & { theme?: string };
type DocumentOptions = OutputOptions & CursorOptions;

const cli = cac('c-complete');

async function getPresenter(options: OutputOptions): Promise<CliPresenter> {
  const config = await loadConfig(process.cwd());
  return new CliPresenter(createThemeState(options.theme ?? config.theme).current);
}

async function getDaemonInfo(): Promise<DaemonInfo | null> {
  try {
    const daemonFilePath = getDaemonFilePath(process.cwd());
    const content = await fs.readFile(daemonFilePath, 'utf-8');
    return parseDaemonInfo(content);
  } catch {
    return null;
  }
}

async function isServerRunning(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = new net.Socket();
    socket.setTimeout(500);
    socket.on('connect', () => {
      socket.destroy();
      resolve(true);
    });
    socket.on('timeout', () => {
      socket.destroy();
      resolve(false);
    });
    socket.on('error', () => {
      resolve(false);
    });
    socket.connect(port, '127.0.0.1');
  });
}

async function waitForServer(retries = 20, delay = 500): Promise<number> {
  for (let i = 0; i < retries; i++) {
    const info = await getDaemonInfo();
    if (info) {
      try {
        await axios.get(`http://localhost:${info.port}/health`);
        return info.port;
      } catch {
        // Server might be starting up
      }
    }
    await new Promise((r) => setTimeout(r, delay));
  }
  throw new Error('Server failed to start within timeout');
}

async function ensureServerRunning(): Promise<number> {
  const info = await getDaemonInfo();
  if (info) {
    if (await isServerRunning(info.port)) {
      return info.port;
    }
    // Stale file
    await fs.rm(getDaemonFilePath(process.cwd()), { force: true });
  }

  console.error('Server not running. Starting server...');

  const isTs = __filename.endsWith('.ts');
  const scriptPath = isTs ? path.join(__dirname, 'main.ts') : path.join(__dirname, 'main.js');

  const command = isTs ? 'npx' : 'node';
  const args = isTs ? ['ts-node', scriptPath] : [scriptPath];

  const child = spawn(command, args, {
    detached: true,
    stdio: 'ignore',
    cwd: process.cwd(),
  });

  child.unref();

  // The first scan runs before the daemon file is written
  const port = await waitForServer(120);
  console.error(`Server started on port ${port}.`);
  return port;
}

function handleError(error: unknown) {
  if (axios.isAxiosError(error) && error.response) {
    console.error(`Error: ${error.response.status} - ${JSON.stringify(error.response.data)}`);
  } else if (error instanceof Error) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error('Unknown error occurred');
  }
  process.exit(1);
}

// Wrap action to ensure server is running
const withServer =
  <A extends unknown[]>(action: (baseUrl: string, ...args: A) => Promise<void>) =>
  async (...args: A) => {
    try {
      const port = await ensureServerRunning();
      const baseUrl = `http://localhost:${port}`;
      await action(baseUrl, ...args);
    } catch (error) {
      handleError(error);
    }
  };

function isSymbolKind(value: string): value is SymbolKind {
  return SYMBOL_KINDS.some((kind) => kind === value);
}

async function readDocument(file: string, options: CursorOptions) {
  const text = await fs.readFile(file, 'utf-8');
  return { text, offset: resolveCursor(text, options) };
}

cli
  .command('complete <file>', 'List completions at a position in a C file')
  .option('--offset <n>', '0-based character offset (default: end of file)')
  .option('--at <line:col>', '1-based line and column')
  .option('--table', 'Output in table format')
  .option('--theme <name>', 'Table theme (vscode_dark, xcode_dark, light)')
  .action(
    withServer(async (baseUrl: string, file: string, options: DocumentOptions) => {
      const presenter = await getPresenter(options);
      const document = await readDocument(file, options);
      const response = await axios.post<CompletionList>(`${baseUrl}/complete`, document);
      presenter.presentCompletions(response.data, options);
    }),
  );

cli
  .command('classify <file>', 'Show the lexical context at a position')
  .option('--offset <n>', '0-based character offset (default: end of file)')
  .option('--at <line:col>', '1-based line and column')
  .option('--table', 'Output in plain text')
  .action(
    withServer(async (baseUrl: string, file: string, options: DocumentOptions) => {
      const presenter = await getPresenter(options);
      const document = await readDocument(file, options);
      const response = await axios.post<{ context: ContextKind }>(`${baseUrl}/classify`, document);
      presenter.presentContext(response.data.context, options);
    }),
  );

cli
  .command('apply <file> <kind> <text>', 'Insert a completion candidate at a position')
  .option('--offset <n>', '0-based character offset (default: end of file)')
  .option('--at <line:col>', '1-based line and column')
  .option('--write', 'Rewrite the file in place')
  .option('--table', 'Output in table format')
  .option('--theme <name>', 'Table theme (vscode_dark, xcode_dark, light)')
  .action(
    withServer(
      async (
        baseUrl: string,
        file: string,
        kind: string,
        text: string,
        options: DocumentOptions & { write?: boolean },
      ) => {
        if (!isSymbolKind(kind)) {
          throw new Error(`Unknown kind: ${kind} (expected one of ${SYMBOL_KINDS.join(', ')})`);
        }
        const presenter = await getPresenter(options);
        const document = await readDocument(file, options);
        const response = await axios.post<AppliedCompletion>(`${baseUrl}/apply`, {
          ...document,
          candidate: { kind, text: String(text) },
        });

        if (options.write) {
          const { newText, newCursorOffset } = response.data;
          await fs.writeFile(file, newText);
          const cursor = SourcePosition.fromOffset(newText, newCursorOffset);
          console.log(`Updated ${file}; cursor at ${cursor.toString()}`);
          return;
        }
        presenter.presentApplied(document.text, response.data, options);
      },
    ),
  );

cli
  .command('scan [root]', 'Re-scan the project (or another root)')
  .option('--table', 'Output in table format')
  .option('--theme <name>', 'Table theme (vscode_dark, xcode_dark, light)')
  .action(
    withServer(async (baseUrl: string, root: string | undefined, options: OutputOptions) => {
      const presenter = await getPresenter(options);
      const body = root === undefined ? {} : { root: path.resolve(root) };
      const response = await axios.post<ScanSummary>(`${baseUrl}/scan`, body);
      presenter.presentScan(response.data, options);
    }),
  );

cli
  .command('where <name>', 'List the files defining or declaring a function')
  .option('--table', 'Output in table format')
  .option('--theme <name>', 'Table theme (vscode_dark, xcode_dark, light)')
  .action(
    withServer(async (baseUrl: string, name: string, options: OutputOptions) => {
      const presenter = await getPresenter(options);
      const response = await axios.get<{ name: string; files: string[] }>(`${baseUrl}/symbols`, {
        params: { name },
      });
      presenter.presentFiles(response.data.name, response.data.files, options);
    }),
  );

cli
  .command('index', 'Dump the project index')
  .option('--table', 'Output in table format')
  .option('--theme <name>', 'Table theme (vscode_dark, xcode_dark, light)')
  .action(
    withServer(async (baseUrl: string, options: OutputOptions) => {
      const presenter = await getPresenter(options);
      const response = await axios.get<IndexSnapshot>(`${baseUrl}/index`);
      presenter.presentIndex(response.data, options);
    }),
  );

cli.command('stop', 'Stop the background server').action(async () => {
  try {
    const info = await getDaemonInfo();
    if (!info) {
      console.log('Server is not running (no daemon file).');
      return;
    }
    const baseUrl = `http://localhost:${info.port}`;
    await axios.post(`${baseUrl}/shutdown`, {});
    console.log('Server stopping...');
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.log('Server is not running or failed to stop.', msg);
  }
});

cli.help();
cli.version('0.1.0');

cli.parse();
