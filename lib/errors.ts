/**
 * A missing or invalid setting the caller must fix (no API key, no Chrome
 * executable, a malformed page budget). Distinct from operational failures,
 * which degrade instead of throwing.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** A request the caller must correct: a malformed body or a missing resume. */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}
