/** Invalid or missing settings at startup. Fatal: the process exits with code 1. */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';
}

/** The channel to the Geyser endpoint could not be built or never became ready. */
export class ConnectError extends Error {
  override readonly name = 'ConnectError';
}

/** Transport failure while a subscribe stream was active. */
export class StreamError extends Error {
  override readonly name = 'StreamError';
}

/**
 * Raised by the supervisor when a session finished without a transport
 * error (server closed the stream, or the dispatcher asked to stop) so the
 * retry loop treats it like any other failure.
 */
export class StreamEndedError extends Error {
  override readonly name = 'StreamEndedError';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
