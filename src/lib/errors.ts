export class ConversionError extends Error {
  constructor(
    message: string,
    public readonly url: string,
  ) {
    super(message);
    this.name = 'ConversionError';
  }
}

export class TimeoutExceededError extends Error {
  constructor(public readonly deadlineMs: number) {
    super(`Timeout after ${formatDeadline(deadlineMs)}`);
    this.name = 'TimeoutExceededError';
  }
}

export class NotificationError extends Error {
  constructor(
    message: string,
    public readonly endpoint: string,
  ) {
    super(message);
    this.name = 'NotificationError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

function formatDeadline(deadlineMs: number): string {
  const seconds = Math.round((deadlineMs / 1000) * 100) / 100;
  return seconds === 1 ? '1 second' : `${seconds} seconds`;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error) || 'Unknown error';
}
