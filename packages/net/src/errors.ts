/**
 * Raised when a channel cannot acquire its socket at startup.
 * Startup treats this as fatal; steady-state transport errors are logged
 * instead.
 */
export class ChannelBindError extends Error {
  readonly port: number;

  constructor(port: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to bind port ${port}: ${reason}`, { cause });
    this.name = "ChannelBindError";
    this.port = port;
  }
}
