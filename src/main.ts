import * as fs from 'fs/promises';
import * as portfinder from 'portfinder';
import { CompletionController } from './adapters/controllers/CompletionController';
import { FsRepository } from './adapters/gateways/FsRepository';
import { loadConfig } from './config';
import { ProjectFileScanner } from './infrastructure/file/ProjectFileScanner';
import { createServer } from './infrastructure/server/server';
import { CompletionEngine } from './usecases/CompletionEngine';
import { SymbolIndex } from './usecases/SymbolIndex';
import { DaemonInfo, getDaemonFilePath } from './utils/daemon';

async function bootstrap() {
  const projectRoot = process.cwd();
  const daemonFile = getDaemonFilePath(projectRoot);

  try {
    const fsRepo = new FsRepository();
    const config = await loadConfig(projectRoot, fsRepo);

    // 1. Infrastructure (Drivers)
    const scanner = new ProjectFileScanner(config);

    // 2. UseCases (Application Business Rules)
    const index = new SymbolIndex(scanner, fsRepo);
    const engine = new CompletionEngine(index, {
      matchMode: config.matchMode,
      maxResults: config.maxResults,
    });

    // 3. Controllers
    const controller = new CompletionController(index, engine, projectRoot);

    console.log(`Indexing ${projectRoot}...`);
    const summary = await index.scan(projectRoot);
    console.log(
      `Indexed ${summary.filesVisited} files (${summary.functions} functions) in ${summary.elapsedMs}ms.`,
    );

    // 4. Server
    const server = createServer(controller);

    // Find a free port
    const port = await portfinder.getPortPromise({ port: 31000 });

    await server.listen({ port, host: '127.0.0.1' });
    console.log(`Server listening on http://localhost:${port}`);

    const daemonInfo: DaemonInfo = { port, pid: process.pid };
    await fs.writeFile(daemonFile, JSON.stringify(daemonInfo));

    const shutdown = async () => {
      console.log('Shutting down...');
      await fs.rm(daemonFile, { force: true });
      await server.close();
      process.exit(0);
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

void bootstrap();
