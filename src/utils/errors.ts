export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 404, 'NOT_FOUND');
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, 'CONFLICT');
  }
}

/** Malformed trigger or cadence configuration. Aborts the whole dispatch. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 422, 'CONFIGURATION_ERROR');
  }
}

/** A context field reference that names no known entity kind or field. */
export class ResolutionError extends AppError {
  constructor(public readonly reference: string, reason: string) {
    super(`Cannot resolve context reference "${reference}": ${reason}`, 422, 'RESOLUTION_ERROR');
  }
}

export class RenderError extends AppError {
  constructor(message: string) {
    super(message, 500, 'RENDER_ERROR');
  }
}

export class ChannelError extends AppError {
  constructor(public readonly channel: string, message: string) {
    super(message, 502, 'CHANNEL_ERROR');
  }
}

export interface DeliveryFailure {
  channel: string;
  recipientId?: string;
  address?: string;
  code: string;
  message: string;
}

/** Aggregate of per-recipient failures from one dispatch call. */
export class DispatchError extends AppError {
  constructor(scheduleId: string, public readonly failures: DeliveryFailure[]) {
    super(
      `Schedule ${scheduleId} had ${failures.length} failed deliveries`,
      502,
      'DISPATCH_FAILED',
      failures
    );
  }
}
