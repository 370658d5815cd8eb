export interface GrammarErrorLocation {
  line?: number;
  column?: number;
  origin?: string;
}

export class GrammarError extends Error {
  readonly line?: number;
  readonly column?: number;
  readonly origin?: string;

  constructor(message: string, location: GrammarErrorLocation = {}) {
    super(message);
    this.name = "GrammarError";
    // End-of-input tokens carry NaN positions.
    this.line = finite(location.line);
    this.column = finite(location.column);
    this.origin = location.origin;
  }
}

function finite(value: number | undefined): number | undefined {
  return value !== undefined && Number.isFinite(value) ? value : undefined;
}
