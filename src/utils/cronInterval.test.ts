import { convertSecondsToInterval, isFixedCronInterval } from './cronInterval';
import { ValidationError } from '@/types/errors';

describe('convertSecondsToInterval', () => {
  it('uses a seconds field below a minute', () => {
    expect(convertSecondsToInterval(10)).toBe('*/10 * * * * *');
    expect(convertSecondsToInterval(1)).toBe('*/1 * * * * *');
  });

  it('uses a minutes field for whole minutes', () => {
    expect(convertSecondsToInterval(60)).toBe('*/1 * * * *');
    expect(convertSecondsToInterval(300)).toBe('*/5 * * * *');
  });

  it.each([7, 45, 90, 420, 0, 2.5])('rejects %s seconds', (seconds) => {
    expect(() => convertSecondsToInterval(seconds))
      .toThrow(new ValidationError(`Poll interval of ${seconds}s cannot be scheduled at a fixed period`));
  });
});

describe('isFixedCronInterval', () => {
  it('accepts divisors of a minute and of an hour', () => {
    expect([5, 10, 15, 30, 60, 120, 600, 1800].every(isFixedCronInterval)).toBe(true);
  });

  it('rejects periods that drift across the wrap', () => {
    expect(isFixedCronInterval(7)).toBe(false);
    expect(isFixedCronInterval(45)).toBe(false);
    expect(isFixedCronInterval(2520)).toBe(false);
    expect(isFixedCronInterval(3600)).toBe(false);
  });
});
