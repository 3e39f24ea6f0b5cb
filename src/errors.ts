export class BenchmeshError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or unexpected message on either wire protocol. */
export class ProtocolError extends BenchmeshError {}

export class RegistrationError extends BenchmeshError {}

/** A finish report with nothing open to attach it to. */
export class UnmatchedFinishError extends BenchmeshError {
  constructor(
    readonly nodeId: string,
    message: string
  ) {
    super("unmatched_finish", message);
  }
}

export class ExecutionError extends BenchmeshError {
  constructor(
    readonly taskType: string,
    code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(code, message, options);
  }
}

export class TransportError extends BenchmeshError {}

export class ConfigError extends BenchmeshError {
  constructor(message: string) {
    super("invalid_config", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
