export class MonitorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MonitorError';
  }
}

export class ConfigurationError extends MonitorError {
  constructor(public readonly issues: string[]) {
    super(
      `Configuration validation failed:\n${issues.map(issue => `  - ${issue}`).join('\n')}`,
      'CONFIGURATION_ERROR',
      { issues }
    );
    this.name = 'ConfigurationError';
  }
}

export class LogDirectoryMissingError extends MonitorError {
  constructor(logDir: string) {
    super(
      `Application log directory not found: ${logDir}`,
      'LOG_DIRECTORY_MISSING',
      { logDir }
    );
    this.name = 'LogDirectoryMissingError';
  }
}

export class InstanceAlreadyRunningError extends MonitorError {
  constructor(pid: number, script: string) {
    super(
      'Another monitor instance is already running',
      'INSTANCE_ALREADY_RUNNING',
      { pid, script }
    );
    this.name = 'InstanceAlreadyRunningError';
  }
}

export class NotificationDeliveryError extends MonitorError {
  constructor(title: string, cause?: Error) {
    super(
      `Failed to deliver notification: ${title}`,
      'NOTIFICATION_DELIVERY_ERROR',
      { title, cause: cause?.message }
    );
    this.name = 'NotificationDeliveryError';
  }
}

export class ChatStartupError extends MonitorError {
  constructor(cause?: Error) {
    super(
      'Chat transport rejected the monitor at startup',
      'CHAT_STARTUP_REJECTED',
      { cause: cause?.message }
    );
    this.name = 'ChatStartupError';
  }
}

export class UnauthorizedError extends MonitorError {
  constructor(userId: string) {
    super(
      'User is not authorized to control this monitor',
      'UNAUTHORIZED',
      { userId }
    );
    this.name = 'UnauthorizedError';
  }
}

export class ProcessTableError extends MonitorError {
  constructor(operation: string, cause?: Error) {
    super(
      `Process table operation failed: ${operation}`,
      'PROCESS_TABLE_ERROR',
      { operation, cause: cause?.message }
    );
    this.name = 'ProcessTableError';
  }
}

export class StorageError extends MonitorError {
  constructor(operation: string, cause?: Error) {
    super(
      `Storage operation failed: ${operation}`,
      'STORAGE_ERROR',
      { operation, cause: cause?.message }
    );
    this.name = 'StorageError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
