/**
 * Malformed source rows or missing connection prerequisites.
 * Raised before any output is written.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/**
 * The database could not be reached or rejected the project query.
 */
export class ConnectivityError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConnectivityError";
  }
}

/**
 * The output directory already exists. Reports are never written over an earlier run.
 */
export class OutputConflictError extends Error {
  readonly outdir: string;

  constructor(outdir: string, options?: ErrorOptions) {
    super(`Output directory already exists: ${outdir}`, options);
    this.name = "OutputConflictError";
    this.outdir = outdir;
  }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
