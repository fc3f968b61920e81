import { FastifyReply, FastifyRequest } from 'fastify';
import { CompletionCandidate } from '../../domain/entities';
import { InvalidCursorError, UnknownSnippetError } from '../../domain/errors';
import { CompletionEngine } from '../../usecases/CompletionEngine';
import { SymbolIndex } from '../../usecases/SymbolIndex';

export interface ScanBody {
  root?: string;
}

export interface DocumentBody {
  text: string;
  offset: number;
}

export interface ApplyBody extends DocumentBody {
  candidate: CompletionCandidate;
}

export class CompletionController {
  constructor(
    private readonly index: SymbolIndex,
    private readonly engine: CompletionEngine,
    private readonly projectRoot: string,
  ) {}

  async scan(req: FastifyRequest<{ Body: ScanBody }>, reply: FastifyReply) {
    const root = req.body.root ?? this.projectRoot;
    try {
      const summary = await this.index.scan(root);
      return reply.send(summary);
    } catch (error) {
      return this.handleError(error, reply);
    }
  }

  async complete(req: FastifyRequest<{ Body: DocumentBody }>, reply: FastifyReply) {
    const { text, offset } = req.body;
    try {
      return reply.send(this.engine.complete(text, offset));
    } catch (error) {
      return this.handleError(error, reply);
    }
  }

  async classify(req: FastifyRequest<{ Body: DocumentBody }>, reply: FastifyReply) {
    const { text, offset } = req.body;
    try {
      return reply.send({ context: this.engine.classify(text, offset) });
    } catch (error) {
      return this.handleError(error, reply);
    }
  }

  async apply(req: FastifyRequest<{ Body: ApplyBody }>, reply: FastifyReply) {
    const { text, offset, candidate } = req.body;
    try {
      return reply.send(this.engine.applyCompletion(text, offset, candidate));
    } catch (error) {
      return this.handleError(error, reply);
    }
  }

  async symbols(req: FastifyRequest<{ Querystring: { name: string } }>, reply: FastifyReply) {
    const { name } = req.query;
    return reply.send({ name, files: this.index.filesDefining(name) });
  }

  async snapshot(_req: FastifyRequest, reply: FastifyReply) {
    return reply.send(this.index.snapshot());
  }

  private handleError(error: unknown, reply: FastifyReply) {
    console.error(error);
    if (error instanceof InvalidCursorError || error instanceof UnknownSnippetError) {
      return reply.status(400).send({ error: error.message });
    }
    return reply.status(500).send({ error: 'Internal Server Error' });
  }
}
