export type ScrapeErrorKind =
  | "network-error"
  | "not-found"
  | "parse-error"
  | "missing-argument"
  | "unsupported-format"
  | "session";

/**
 * Base class for every failure surfaced by the scraper. Callers switch on
 * `kind` rather than on the subclass.
 */
export class ScrapeError extends Error {
  constructor(
    message: string,
    public readonly kind: ScrapeErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ScrapeError";
  }
}

export class NetworkError extends ScrapeError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, "network-error", options);
    this.name = "NetworkError";
  }
}

export class CategoryNotFoundError extends ScrapeError {
  constructor(
    public readonly category: string,
    public readonly available: string[]
  ) {
    super(`Category not found: ${category}`, "not-found");
    this.name = "CategoryNotFoundError";
  }
}

export class ParseError extends ScrapeError {
  constructor(message: string, public readonly url: string) {
    super(`${message} (${url})`, "parse-error");
    this.name = "ParseError";
  }
}

export class MissingArgumentError extends ScrapeError {
  constructor(public readonly argument: string, reason: string) {
    super(`Missing argument "${argument}": ${reason}`, "missing-argument");
    this.name = "MissingArgumentError";
  }
}

export class UnsupportedFormatError extends ScrapeError {
  constructor(public readonly format: string) {
    super(`Unsupported format: ${format}`, "unsupported-format");
    this.name = "UnsupportedFormatError";
  }
}

export class SessionNotOpenError extends ScrapeError {
  constructor() {
    super("Scraper session is not open; call open() or use withBookScraper()", "session");
    this.name = "SessionNotOpenError";
  }
}

export class SessionClosedError extends ScrapeError {
  constructor() {
    super("Scraper session has been closed; create a new BookScraper", "session");
    this.name = "SessionClosedError";
  }
}
