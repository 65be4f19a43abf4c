/** Machine-readable failure codes returned to callers of the runner. */
export type RunnerErrorType =
  | 'empty_params'
  | 'invalid_argument'
  | 'argument_mismatch'
  | 'slot_mismatch'
  | 'slot_length_mismatch'
  | 'missing_slot'
  | 'malformed_metadata'
  | 'unsupported_container'
  | 'method_not_found'
  | 'runner_request_failed'
  | 'configuration_error';

interface RunnerErrorOptions {
  type: RunnerErrorType;
  message: string;
  status: number;
  details?: Record<string, unknown>;
}

/**
 * Base class for every error raised by the batching core, the wire codec and
 * the runner surface. `status` is the HTTP status the runner answers with.
 */
export class RunnerError extends Error {
  public readonly type: RunnerErrorType;
  public readonly status: number;
  public readonly details?: Record<string, unknown>;

  constructor(options: RunnerErrorOptions) {
    super(options.message);
    this.name = 'RunnerError';
    this.type = options.type;
    this.status = options.status;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      status: this.status,
      details: this.details,
    };
  }
}

/** `sample` / `allEqual` on a container without slots. */
export class EmptyParamsError extends RunnerError {
  constructor(message = 'params container has no slots') {
    super({ type: 'empty_params', message, status: 400 });
    this.name = 'EmptyParamsError';
  }
}

export class InvalidArgumentError extends RunnerError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    type: RunnerErrorType = 'invalid_argument',
  ) {
    super({ type, message, status: 400, details });
    this.name = 'InvalidArgumentError';
  }
}

/** Per-slot index lists disagree after aggregation. */
export class ArgumentMismatchError extends InvalidArgumentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, 'argument_mismatch');
    this.name = 'ArgumentMismatchError';
  }
}

/** Containers handed to one aggregation do not share slot addressing. */
export class SlotMismatchError extends InvalidArgumentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, 'slot_mismatch');
    this.name = 'SlotMismatchError';
  }
}

export class SlotLengthMismatchError extends InvalidArgumentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, 'slot_length_mismatch');
    this.name = 'SlotLengthMismatchError';
  }
}

export class MissingSlotError extends RunnerError {
  public readonly index: number;

  constructor(index: number, maxIndex: number) {
    super({
      type: 'missing_slot',
      message: `positional slot ${index} is missing (highest index seen: ${maxIndex})`,
      status: 400,
      details: { index, maxIndex },
    });
    this.name = 'MissingSlotError';
    this.index = index;
  }
}

export class MalformedMetadataError extends RunnerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ type: 'malformed_metadata', message, status: 400, details });
    this.name = 'MalformedMetadataError';
  }
}

export class UnsupportedContainerError extends RunnerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ type: 'unsupported_container', message, status: 400, details });
    this.name = 'UnsupportedContainerError';
  }
}

export class MethodNotFoundError extends RunnerError {
  constructor(method: string) {
    super({
      type: 'method_not_found',
      message: `runnable method not found: ${method}`,
      status: 404,
      details: { method },
    });
    this.name = 'MethodNotFoundError';
  }
}

/** Non-2xx answer from a remote runner, raised by the client SDK. */
export class RunnerRequestError extends RunnerError {
  constructor(status: number, message: string, details?: Record<string, unknown>) {
    super({ type: 'runner_request_failed', message, status, details });
    this.name = 'RunnerRequestError';
  }
}

export class ConfigurationError extends RunnerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ type: 'configuration_error', message, status: 500, details });
    this.name = 'ConfigurationError';
  }
}
