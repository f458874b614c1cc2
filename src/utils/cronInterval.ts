import { ValidationError } from '@/types/errors';

/**
 * `*\/N` only fires at a fixed period when N divides the next unit up, so
 * intervals are limited to divisors of a minute (in seconds) or whole minutes
 * dividing an hour.
 */
export function isFixedCronInterval(seconds: number): boolean {
  if (!Number.isInteger(seconds) || seconds < 1) return false;
  if (seconds < 60) return 60 % seconds === 0;
  return seconds < 3600 && seconds % 60 === 0 && 60 % (seconds / 60) === 0;
}

/**
 * @throws ValidationError when the interval has no fixed-period cron form
 */
export function convertSecondsToInterval(seconds: number): string {
  if (!isFixedCronInterval(seconds)) {
    throw new ValidationError(`Poll interval of ${seconds}s cannot be scheduled at a fixed period`);
  }
  if (seconds >= 60) {
    return `*/${seconds / 60} * * * *`;
  }
  return `*/${seconds} * * * * *`;
}
