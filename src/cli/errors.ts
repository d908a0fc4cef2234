export interface CliErrorOptions extends ErrorOptions {
  /** User errors are printed as-is, without the "Error:" prefix. */
  isUserError?: boolean;
}

export class CliError extends Error {
  readonly isUserError: boolean;

  constructor(message: string, options: CliErrorOptions = {}) {
    super(message, options);
    this.name = "CliError";
    this.isUserError = options.isUserError ?? true;
  }
}

/** Ends the run without printing anything. */
export class SilentError extends CliError {
  constructor(message = "", options: CliErrorOptions = {}) {
    super(message, { isUserError: false, ...options });
    this.name = "SilentError";
  }
}

export class ValidationError extends CliError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, { ...options, isUserError: true });
    this.name = "ValidationError";
  }
}

export class NotARepositoryError extends CliError {
  readonly cwd: string;

  constructor(cwd: string, options?: ErrorOptions) {
    super("Not a Git repository", { ...options, isUserError: true });
    this.name = "NotARepositoryError";
    this.cwd = cwd;
  }
}

export class BareRepositoryError extends CliError {
  readonly gitDir: string;

  constructor(gitDir: string) {
    super("Not supported on bare repositories", { isUserError: true });
    this.name = "BareRepositoryError";
    this.gitDir = gitDir;
  }
}
