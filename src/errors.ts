/**
 * Error family for the guest-session client.
 *
 * Every failure is terminal for the call that raised it. Nothing here retries;
 * callers decide whether to retry, stop paginating, or surface the error.
 */

export class RoostError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** An expected pattern was missing from the web-app HTML or its main script. */
export class BootstrapParseError extends RoostError {}

export class UnexpectedStatusError extends RoostError {
  constructor(
    readonly status: number,
    readonly url: string
  ) {
    super(`Unexpected HTTP ${status} from ${url}`);
  }
}

/** A tweet (or user) node lacked a required field. `path` points at the field. */
export class TweetDecodeError extends RoostError {
  constructor(
    readonly path: string,
    detail = "missing or malformed field"
  ) {
    super(`${detail} at ${path}`);
  }
}

export class TimelineDecodeError extends RoostError {
  constructor(readonly reason: string) {
    super(`Timeline decode failed: ${reason}`);
  }
}

export class SessionNotReadyError extends RoostError {
  constructor() {
    super("Session is not open. Call open() first.");
  }
}

export class ConfigError extends RoostError {
  constructor(readonly keys: string[]) {
    super(`Invalid configuration: ${keys.join(", ")}`);
  }
}
