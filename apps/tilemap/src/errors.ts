export class TileMapError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TileMapError';
  }
}

export interface ParseLocation {
  line?: number; // 1-based
  column?: number;
  field?: string;
}

/** Malformed tile map line, bad KML document or invalid tile identifier. */
export class ParseError extends TileMapError {
  readonly line?: number;
  readonly column?: number;
  readonly field?: string;

  constructor(message: string, location: ParseLocation = {}, options?: { cause?: unknown }) {
    const where = location.line !== undefined
      ? ` (line ${location.line}${location.column !== undefined ? `, column ${location.column}` : ''}${location.field ? `, field ${location.field}` : ''})`
      : location.field ? ` (field ${location.field})` : '';
    super(`${message}${where}`, options);
    this.name = 'ParseError';
    this.line = location.line;
    this.column = location.column;
    this.field = location.field;
  }
}

/** Failure opening, reading, writing or closing a stream or file. */
export class IOError extends TileMapError {
  readonly path?: string;

  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super(path ? `${message}: ${path}` : message, options);
    this.name = 'IOError';
    this.path = path;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
