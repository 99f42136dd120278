/**
 * Error taxonomy for an EPG run
 */

export class EPGError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or malformed settings. Raised before any request is made. */
export class ConfigurationError extends EPGError {}

/** A channel's schedule could not be retrieved. */
export class FetchError extends EPGError {
  readonly channelId: string;

  constructor(channelId: string, message: string, options?: { cause?: unknown }) {
    super(`${channelId}: ${message}`, options);
    this.channelId = channelId;
  }
}

/** Nothing to publish; the previous guide is kept. */
export class EmptyResultError extends EPGError {}

export class SerializationError extends EPGError {}
