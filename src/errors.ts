export class AppError extends Error {
  constructor(message: string, public readonly code: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = 'AppError';
  }
}

export class ConfigurationError extends AppError {
  constructor(variable: string, reason: string) {
    super(`${variable} ${reason}`, 'CONFIGURATION_INVALID', { variable });
    this.name = 'ConfigurationError';
  }
}

export class DeviceError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'DEVICE_UNAVAILABLE', cause === undefined ? undefined : { cause: describeError(cause) });
    this.name = 'DeviceError';
  }
}

export class TranscriptionError extends AppError {
  constructor(cause: unknown) {
    super(
      `Transcription failed: ${describeError(cause)}`,
      'TRANSCRIPTION_FAILED',
      { cause: describeError(cause) }
    );
    this.name = 'TranscriptionError';
  }
}

export class NotificationError extends AppError {
  constructor(message: string, public readonly status?: number) {
    super(message, 'NOTIFICATION_FAILED', status === undefined ? undefined : { status });
    this.name = 'NotificationError';
  }
}

export class SmsDeliveryError extends AppError {
  constructor(cause: unknown) {
    super(describeError(cause), 'SMS_DELIVERY_FAILED');
    this.name = 'SmsDeliveryError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
