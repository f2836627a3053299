/// # errors
///
/// only two things can stop a build: the IR file isn't where we looked
/// for it, or it is there but isn't an IR. everything past loading
/// degrades to an inline error node instead of throwing.

export class ApiRefError extends Error {
  public code: string;
  public override cause?: unknown;

  constructor(code: string, message: string, cause?: unknown) {
    super(message);
    this.code = code;
    this.cause = cause;
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      cause: this.cause,
    };
  }
}

/// `searched` lists every path that was tried, in order.
export class IrNotFoundError extends ApiRefError {
  public searched: string[];

  constructor(searched: string[]) {
    super("IR_NOT_FOUND", `API reference IR not found (searched: ${searched.join(", ")})`);
    this.searched = searched;
  }
}

export class IrFormatError extends ApiRefError {
  constructor(path: string, detail: string, cause?: unknown) {
    super("IR_FORMAT", `Invalid API reference IR in ${path}: ${detail}`, cause);
  }
}

export class ConfigError extends ApiRefError {
  constructor(path: string, detail: string, cause?: unknown) {
    super("CONFIG_INVALID", `Invalid configuration in ${path}: ${detail}`, cause);
  }
}
