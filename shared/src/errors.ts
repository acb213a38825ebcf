/**
 * Failure taxonomy shared by both endpoints.
 *
 * Every failure is scoped: a FrameError costs one message, a TransportError one
 * connection (command channel) or one frame (media channel). Only `quit` ends
 * the process.
 */

export const RelayErrorCode = {
  FRAME: 'frame',
  PROTOCOL: 'protocol',
  TRANSPORT: 'transport',
  REGISTRATION: 'registration',
  RESOURCE_UNAVAILABLE: 'resource_unavailable',
  LISTENER_CLOSED: 'listener_closed',
  CONFIG: 'config',
} as const;

export type RelayErrorCode = (typeof RelayErrorCode)[keyof typeof RelayErrorCode];

export class RelayError extends Error {
  readonly code: RelayErrorCode;

  constructor(code: RelayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RelayError';
    this.code = code;
  }
}

/** A delimited unit whose content could not be parsed. The stream stays usable. */
export class FrameError extends RelayError {
  /** The offending line, truncated for logging. */
  readonly raw: string;
  /** The parsed JSON when the line was valid JSON but not a tagged message. */
  readonly value: unknown;

  constructor(message: string, raw: string, options?: { cause?: unknown; value?: unknown }) {
    super(RelayErrorCode.FRAME, message, options);
    this.name = 'FrameError';
    this.raw = raw.length > 120 ? `${raw.slice(0, 120)}…` : raw;
    this.value = options?.value;
  }
}

/** Unknown `cmd`, or a known `cmd` missing a required field. */
export class ProtocolError extends RelayError {
  readonly cmd: string;

  constructor(cmd: string, message: string) {
    super(RelayErrorCode.PROTOCOL, message);
    this.name = 'ProtocolError';
    this.cmd = cmd;
  }
}

export class TransportError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(RelayErrorCode.TRANSPORT, message, options);
    this.name = 'TransportError';
  }
}

export class RegistrationError extends RelayError {
  readonly port: unknown;

  constructor(port: unknown) {
    super(RelayErrorCode.REGISTRATION, `video_port out of range: ${String(port)}`);
    this.name = 'RegistrationError';
    this.port = port;
  }
}

/** Capture device, display or motor board missing. Only that feature degrades. */
export class ResourceUnavailableError extends RelayError {
  readonly resource: string;

  constructor(resource: string, message: string, options?: { cause?: unknown }) {
    super(RelayErrorCode.RESOURCE_UNAVAILABLE, message, options);
    this.name = 'ResourceUnavailableError';
    this.resource = resource;
  }
}

/** Raised in place of a listener fault once we closed the listener ourselves. */
export class ListenerClosedError extends RelayError {
  constructor(options?: { cause?: unknown }) {
    super(RelayErrorCode.LISTENER_CLOSED, 'listener closed by shutdown', options);
    this.name = 'ListenerClosedError';
  }
}

export class ConfigError extends RelayError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(RelayErrorCode.CONFIG, `invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
