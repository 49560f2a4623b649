/**
 * Error model.
 *
 * Input and region errors are raised before any ephemeris work and are
 * recoverable by resubmitting. Ephemeris errors abort the request.
 * Generation errors never reach the caller: the report assembler downgrades
 * them to the deterministic renderer.
 */

export { EphemerisUnavailableError } from "../astro/ephemeris/errors.js";

export class InvalidInputError extends Error {
  readonly code = "invalid_input";

  constructor(public readonly issues: string[]) {
    super(`Invalid birth input: ${issues.join("; ")}`);
    this.name = "InvalidInputError";
  }
}

export class UnsupportedRegionError extends Error {
  readonly code = "unsupported_region";

  constructor(public readonly region: string) {
    super(`Unsupported region: ${region}`);
    this.name = "UnsupportedRegionError";
  }
}

export class GenerationTimeoutError extends Error {
  readonly code = "generation_timeout";

  constructor(public readonly timeout_ms: number) {
    super(`Text generation timed out after ${timeout_ms}ms`);
    this.name = "GenerationTimeoutError";
  }
}

export class GenerationServiceError extends Error {
  readonly code = "generation_service_error";

  constructor(
    message: string,
    public readonly error_type: "provider_error" | "invalid_response" | "unknown" = "unknown",
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "GenerationServiceError";
  }
}

export class ConfigError extends Error {
  readonly code = "config_error";

  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}
