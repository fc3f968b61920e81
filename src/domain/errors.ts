export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class InvalidCursorError extends DomainError {
  constructor(
    public readonly offset: number,
    public readonly length: number,
  ) {
    super(`Cursor offset ${offset} is outside the document [0, ${length}]`);
  }
}

export class InvalidPositionError extends DomainError {
  constructor(public readonly position: string) {
    super(`Invalid position: ${position}`);
  }
}

export class UnknownSnippetError extends DomainError {
  constructor(public readonly snippet: string) {
    super(`Unknown snippet: ${snippet}`);
  }
}

export class UnknownThemeError extends DomainError {
  constructor(
    public readonly theme: string,
    public readonly available: string[],
  ) {
    super(`Unknown theme: ${theme} (available: ${available.join(', ')})`);
  }
}
