// Error taxonomy for the archive/print pipeline

export type AutoprintErrorCode =
  | 'LOCK_TIMEOUT'
  | 'DESTINATION_EXISTS'
  | 'MOVE_RETRY_EXHAUSTED'
  | 'PRINT_SUBMIT'
  | 'PRINTER_SWITCH'
  | 'CONFIG_MISSING'
  | 'CONFIG_INVALID';

export class AutoprintError extends Error {
  public readonly code: AutoprintErrorCode;

  constructor(code: AutoprintErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class LockTimeoutError extends AutoprintError {
  constructor(
    public readonly filePath: string,
    public readonly attempts: number
  ) {
    super('LOCK_TIMEOUT', `File still locked after ${attempts} attempts: ${filePath}`);
  }
}

export class DestinationExistsError extends AutoprintError {
  constructor(public readonly destinationPath: string) {
    super('DESTINATION_EXISTS', `File already exists at destination: ${destinationPath}`);
  }
}

export class MoveRetryExhaustedError extends AutoprintError {
  constructor(
    public readonly sourcePath: string,
    public readonly destinationPath: string,
    public readonly attempts: number,
    cause: unknown
  ) {
    super(
      'MOVE_RETRY_EXHAUSTED',
      `Failed to move ${sourcePath} after ${attempts} attempts: ${describeError(cause)}`,
      { cause }
    );
  }
}

export class PrintSubmitError extends AutoprintError {
  constructor(
    public readonly filePath: string,
    public readonly printer: string,
    cause: unknown
  ) {
    super('PRINT_SUBMIT', `Print submission to ${printer} failed: ${describeError(cause)}`, {
      cause,
    });
  }
}

export class PrinterSwitchError extends AutoprintError {
  constructor(
    public readonly printer: string,
    cause: unknown
  ) {
    super('PRINTER_SWITCH', `Could not set default printer to ${printer}: ${describeError(cause)}`, {
      cause,
    });
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
