/**
 * Error taxonomy for the session model.
 * Bookkeeping fails open; anything the operator is about to judge fails loud.
 */

export class InputNotFoundError extends Error {
  constructor(readonly path: string) {
    super(`Input file not found: ${path}`);
    this.name = "InputNotFoundError";
  }
}

export class ParseError extends Error {
  constructor(message: string, readonly source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = "ParseError";
  }
}

export class InvalidValueError extends Error {
  constructor(
    readonly itemId: string,
    readonly value: unknown,
    readonly allowed: readonly (string | number)[]
  ) {
    super(
      `Invalid judgment ${JSON.stringify(value) ?? String(value)} for ${itemId}; expected one of ${allowed.join(", ")}`
    );
    this.name = "InvalidValueError";
  }
}

export class UnresolvedReferenceError extends Error {
  constructor(readonly model: string, readonly index: number) {
    super(`Prompt not found for ${model}[${index}] in CSV.`);
    this.name = "UnresolvedReferenceError";
  }
}

export class UnknownItemError extends Error {
  constructor(readonly itemId: string) {
    super(`Unknown item: ${itemId}`);
    this.name = "UnknownItemError";
  }
}

export class UnsupportedEventError extends Error {
  constructor(readonly eventType: string, readonly scale: string) {
    super(`Event ${eventType} is not supported by ${scale} sessions`);
    this.name = "UnsupportedEventError";
  }
}

export class RatingCountError extends Error {
  constructor(readonly expected: number, readonly actual: number) {
    super(`Expected ratings for ${expected} sentences, got ${actual}`);
    this.name = "RatingCountError";
  }
}
