export type LiveErrorCode = 'TRANSPORT_UNAVAILABLE' | 'MESSAGE_PARSE' | 'CONFIG';

/** Base class for errors raised by the live-update channel. */
export class LiveError extends Error {
  readonly code: LiveErrorCode;

  constructor(code: LiveErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The transport could not be constructed (bad URL, no WebSocket support). */
export class TransportUnavailableError extends LiveError {
  readonly url: string;

  constructor(url: string, cause?: unknown) {
    super('TRANSPORT_UNAVAILABLE', `cannot open transport to ${url}: ${describeError(cause)}`, { cause });
    this.url = url;
  }
}

/** An inbound frame was not a well-formed server message. */
export class MessageParseError extends LiveError {
  readonly raw: string;

  constructor(reason: string, raw: string, cause?: unknown) {
    super('MESSAGE_PARSE', reason, { cause });
    // Keep enough of the frame for a log line, not the whole payload
    this.raw = raw.length > 200 ? raw.substring(0, 197) + '...' : raw;
  }
}

export class ConfigError extends LiveError {
  readonly key: string;

  constructor(key: string, message: string) {
    super('CONFIG', `${key}: ${message}`);
    this.key = key;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (err === undefined) return 'unknown error';
  return String(err);
}
