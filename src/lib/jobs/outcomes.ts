import { TimeoutExceededError } from '../errors.js';
import type { Outcome } from '../types.js';
import { formatDuration, roundSeconds } from '../utils.js';

export function successOutcome(url: string, elapsedSeconds: number): Outcome {
  const elapsed = roundSeconds(elapsedSeconds);
  const outcome: Outcome = {
    url,
    status: 'success',
    elapsedSeconds: elapsed,
    elapsedFormatted: formatDuration(elapsed),
    error: null,
  };
  return Object.freeze(outcome);
}

export function errorOutcome(
  url: string,
  elapsedSeconds: number | null,
  error: string,
): Outcome {
  const elapsed = elapsedSeconds === null ? null : roundSeconds(elapsedSeconds);
  const outcome: Outcome = {
    url,
    status: 'error',
    elapsedSeconds: elapsed,
    elapsedFormatted:
      elapsed === null ? 'Error occurred' : formatDuration(elapsed),
    error: error || 'Unknown error',
  };
  return Object.freeze(outcome);
}

export function timeoutOutcome(url: string, deadlineMs: number): Outcome {
  const { message } = new TimeoutExceededError(deadlineMs);
  const outcome: Outcome = {
    url,
    status: 'timeout',
    elapsedSeconds: null,
    elapsedFormatted: message,
    error: message,
  };
  return Object.freeze(outcome);
}
