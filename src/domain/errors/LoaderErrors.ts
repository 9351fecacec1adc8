/**
 * Base class for every error the loader raises on purpose.
 *
 * All of them are fatal for the load call that raised them: per-record
 * persistence failures are reported through events and logs, never thrown.
 */
export abstract class LoaderError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The caller broke an input contract (odd line count, dangling key line, bad batch size). */
export class InputContractError extends LoaderError {
  constructor(message: string) {
    super(message, 'INPUT_CONTRACT');
  }
}

/** A bulk exchange failed at the HTTP level. */
export class TransportError extends LoaderError {
  constructor(
    message: string,
    public readonly status?: number,
    code = 'TRANSPORT',
  ) {
    super(message, code);
  }
}

export class UnknownHostError extends TransportError {
  constructor(public readonly host: string) {
    super(`Unknown host ${host}`, undefined, 'UNKNOWN_HOST');
  }
}

/** Loader settings or the credentials file are invalid. */
export class ConfigurationError extends LoaderError {
  constructor(message: string) {
    super(message, 'CONFIGURATION');
  }
}
