export class RagPaceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing credential or a config value that fails validation. */
export class ConfigurationError extends RagPaceError {}

export class SourceDirectoryError extends RagPaceError {
  readonly directory: string;

  constructor(directory: string) {
    super(`Source directory does not exist: ${directory}`);
    this.directory = directory;
  }
}

export class DirectoryOutsideDataRootError extends RagPaceError {
  constructor(directory: string, root: string) {
    super(`Directory ${directory} is outside the data directory ${root}`);
  }
}

export class EmptyInputError extends RagPaceError {
  constructor(message = "Nothing to ingest: the chunk sequence is empty") {
    super(message);
  }
}

/**
 * The provider answered, but with something the index cannot hold:
 * an empty probe vector, a short batch, or a vector of the wrong length.
 */
export class EmbeddingProviderError extends RagPaceError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
