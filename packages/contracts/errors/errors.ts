/**
 * Engine error taxonomy.
 *
 * Errors carry a `kind` so reports can name them without instanceof checks
 * across package boundaries.
 */

export type LumitoneErrorKind =
  | "malformed_timeline"
  | "invalid_configuration"
  | "queue_overflow"
  | "device_disconnected"
  | "cache_miss"
  | "cache_corrupt";

export abstract class LumitoneError extends Error {
  abstract readonly kind: LumitoneErrorKind;
}

/** Bad tick ordering or resolution. Fatal to loading. */
export class MalformedTimelineError extends LumitoneError {
  readonly kind = "malformed_timeline";

  constructor(message: string) {
    super(message);
    this.name = "MalformedTimelineError";
  }
}

/** Rejected tempo scale, window parameter or similar setting. */
export class InvalidConfigurationError extends LumitoneError {
  readonly kind = "invalid_configuration";
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "InvalidConfigurationError";
    this.field = field;
  }
}

/** Live queue saturated; oldest events were dropped. */
export class QueueOverflowError extends LumitoneError {
  readonly kind = "queue_overflow";
  readonly dropped: number;

  constructor(dropped: number, capacity: number) {
    super(`Live input queue overflowed (capacity ${capacity}), dropped ${dropped} event(s)`);
    this.name = "QueueOverflowError";
    this.dropped = dropped;
  }
}

/** The live input device went away. */
export class DeviceDisconnectedError extends LumitoneError {
  readonly kind = "device_disconnected";
  readonly inputId: string;

  constructor(inputId: string) {
    super(`MIDI input disconnected: ${inputId}`);
    this.name = "DeviceDisconnectedError";
    this.inputId = inputId;
  }
}

export class CacheMissError extends LumitoneError {
  readonly kind = "cache_miss";

  constructor(path: string, reason: string) {
    super(`Timeline cache miss for ${path}: ${reason}`);
    this.name = "CacheMissError";
  }
}

export class CacheCorruptError extends LumitoneError {
  readonly kind = "cache_corrupt";

  constructor(path: string, detail: string) {
    super(`Timeline cache record for ${path} is corrupt: ${detail}`);
    this.name = "CacheCorruptError";
  }
}

export function isLumitoneError(error: unknown): error is LumitoneError {
  return error instanceof LumitoneError;
}
