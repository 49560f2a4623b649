/**
 * Raised when the ephemeris cannot produce a position for the requested
 * instant (out of range, native failure, binding missing).
 *
 * Never defaulted: every downstream classification depends on real positions.
 */
export class EphemerisUnavailableError extends Error {
  readonly code = "ephemeris_unavailable";

  constructor(
    message: string,
    public readonly instant_utc?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "EphemerisUnavailableError";
  }
}
