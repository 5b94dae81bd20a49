/**
 * Monitor Errors - typed errors with error_class and error_code
 *
 * Configuration errors fail the check they belong to, never the process.
 * Transport failures are data in delivery outcomes; NotificationFailureError is only
 * raised when the caller asks for it.
 */

import type { NotificationBackend, NotificationResponses } from './NotificationTypes';

export class MonitorError extends Error {
  constructor(
    message: string,
    public readonly error_class: 'CONFIGURATION' | 'VALIDATION' | 'NOTIFICATION',
    public readonly error_code: string
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class ConfigurationError extends MonitorError {
  constructor(message: string, errorCode?: string) {
    super(message, 'CONFIGURATION', errorCode || 'CONFIGURATION_ERROR');
  }
}

/**
 * Max sending volume of zero (or negative / non-finite) makes utilization meaningless.
 */
export class InvalidQuotaConfigurationError extends ConfigurationError {
  constructor(maxVolume: number) {
    super(
      `Invalid SES sending quota: max_volume must be a positive number, received ${maxVolume}`,
      'INVALID_QUOTA_CONFIGURATION'
    );
  }
}

export class MissingRequiredFieldError extends MonitorError {
  constructor(public readonly field: string, context: string) {
    super(`Missing required field: ${field} (${context})`, 'VALIDATION', 'MISSING_REQUIRED_FIELD');
  }
}

export class PayloadTooLargeError extends MonitorError {
  constructor(size: number, limit: number) {
    super(`Payload size ${size} bytes exceeds limit of ${limit} bytes`, 'VALIDATION', 'PAYLOAD_TOO_LARGE');
  }
}

export class NotificationFailureError extends MonitorError {
  constructor(
    public readonly backend: NotificationBackend,
    public readonly identifier: string,
    public readonly status_code: number | undefined,
    public readonly responses: NotificationResponses
  ) {
    const target = backend === 'pager_duty' ? 'event' : 'channel';
    const status = status_code === undefined ? 'no response' : String(status_code);
    super(
      `Failed to post to ${backend} ${target}: ${identifier}, status: ${status}`,
      'NOTIFICATION',
      'NOTIFICATION_FAILURE'
    );
  }
}
