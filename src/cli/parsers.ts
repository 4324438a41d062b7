import { InvalidArgumentError } from 'commander';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseTemperature(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed) || parsed < 0 || parsed > 2) {
    throw new InvalidArgumentError('Expected a number between 0 and 2.');
  }
  return parsed;
}

export function collectValues(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}
