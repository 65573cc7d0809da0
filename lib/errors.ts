export class ConfigurationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `- ${i}`).join("\n")}`);
    this.name = "ConfigurationError";
  }
}

export type MissingInputKind = "pdf" | "directory" | "file";

const MISSING_INPUT_LABELS: Record<MissingInputKind, string> = {
  pdf: "PDF file",
  directory: "Directory",
  file: "File",
};

export class MissingInputError extends Error {
  constructor(
    public readonly kind: MissingInputKind,
    public readonly inputPath: string
  ) {
    super(`${MISSING_INPUT_LABELS[kind]} not found: ${inputPath}`);
    this.name = "MissingInputError";
  }
}

/**
 * Errors a user can fix by changing their input, as opposed to
 * unexpected failures.
 */
export function isUserFacingError(
  err: unknown
): err is ConfigurationError | MissingInputError {
  return err instanceof ConfigurationError || err instanceof MissingInputError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
