export class FleetmonError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'FleetmonError';
    this.code = code;
  }
}

export class InvalidAddressError extends FleetmonError {
  public readonly address: string;

  constructor(address: string) {
    super(`Invalid IPv4 address: ${address}`, 'INVALID_ADDRESS');
    this.name = 'InvalidAddressError';
    this.address = address;
  }
}

export class NotFoundError extends FleetmonError {
  public readonly key: string;

  constructor(key: string) {
    super(`Not found: ${key}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
    this.key = key;
  }
}

export class SerializationError extends FleetmonError {
  constructor(entity: string, cause: string) {
    super(`Failed to serialize ${entity}: ${cause}`, 'SERIALIZATION_ERROR');
    this.name = 'SerializationError';
  }
}

export class DeserializationError extends FleetmonError {
  public readonly key: string;

  constructor(key: string, cause: string) {
    super(`Failed to deserialize ${key}: ${cause}`, 'DESERIALIZATION_ERROR');
    this.name = 'DeserializationError';
    this.key = key;
  }
}

export class TelemetryValidationError extends FleetmonError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Telemetry validation failed:\n${issues.join('\n')}`, 'TELEMETRY_VALIDATION_ERROR');
    this.name = 'TelemetryValidationError';
    this.issues = issues;
  }
}

export class ConfigValidationError extends FleetmonError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed:\n${errors.join('\n')}`, 'CONFIG_VALIDATION_ERROR');
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

export class StreamClosedError extends FleetmonError {
  constructor(stream: string) {
    super(`Stream is closed: ${stream}`, 'STREAM_CLOSED');
    this.name = 'StreamClosedError';
  }
}

export class CounterOverflowError extends FleetmonError {
  public readonly field: string;
  public readonly groupId: string;

  constructor(field: string, groupId: string) {
    super(
      `Sum of ${field} in ${groupId} exceeds ${Number.MAX_SAFE_INTEGER}`,
      'COUNTER_OVERFLOW',
    );
    this.name = 'CounterOverflowError';
    this.field = field;
    this.groupId = groupId;
  }
}
