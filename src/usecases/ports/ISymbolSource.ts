import { IndexSnapshot } from '../../domain/entities';

/** Read-only view of the project symbol index used while answering queries. */
export interface ISymbolSource {
  functionNames(): string[];
  filesDefining(name: string): string[];
  headerNames(): string[];
  typeNames(): string[];
  snapshot(): IndexSnapshot;
}
