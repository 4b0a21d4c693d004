/**
 * Raised when an operation needs a backend (LLM, embeddings) that the
 * current configuration does not provide. Paths that do not need that
 * backend keep working.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
