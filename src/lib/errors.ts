export class StoreError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The underlying medium could not be read or written. Not retried. */
export class PersistenceError extends StoreError {}

export class NotFoundError extends StoreError {
  readonly id: number;

  constructor(id: number) {
    super(`item ${id} not found`);
    this.id = id;
  }
}

/** Illegal batch nesting or operation sequencing. */
export class InvalidStateError extends StoreError {}

export class FeedAlreadyExistsError extends Error {
  constructor(readonly url: string) {
    super(`feed already exists: ${url}`);
    this.name = "FeedAlreadyExistsError";
  }
}

/** Bad command-line arguments; the CLI prints usage and exits with 2. */
export class UsageError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "UsageError";
  }
}
