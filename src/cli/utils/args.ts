import { InvalidArgumentError } from 'commander';
import { isValid, parse } from 'date-fns';
import {
  APPLICATION_STATUSES,
  MARITAL_STATUSES,
  REGISTRATION_STATUSES,
  type ApplicationStatus,
  type FlatType,
  type MaritalStatus,
  type RegistrationStatus,
} from '../../core/ports';
import { normalizeNric } from '../../core/domain/identity';
import { PROJECT_SORT_KEYS, type ProjectSortKey } from '../../core/domain/projectCatalog';
import { parseFlatTypeLabel } from '../../infra/persistence/csvTables';

// Commander argument parsers
// Each one throws InvalidArgumentError, which commander reports and exits with

export function parseNric(value: string): string {
  const result = normalizeNric(value);
  if (!result.ok) {
    throw new InvalidArgumentError(result.error.message);
  }
  return result.value;
}

export function parseFlatType(value: string): FlatType {
  const type = parseFlatTypeLabel(value);
  if (!type) {
    throw new InvalidArgumentError('Expected 2-Room or 3-Room.');
  }
  return type;
}

export function parseDay(value: string): Date {
  const date = parse(value.trim(), 'dd/MM/yyyy', new Date(0));
  if (!isValid(date)) {
    throw new InvalidArgumentError('Expected a date as dd/MM/yyyy.');
  }
  return date;
}

export function parseCount(value: string): number {
  // parseInt converts string to integer; the regex rejects "3.5" and "3abc"
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a non-negative whole number.');
  }
  return parseInt(value, 10);
}

// Build a parser that accepts one of a fixed list of values, case-insensitively
function oneOf<T extends string>(allowed: readonly T[]): (value: string) => T {
  return (value: string): T => {
    const match = allowed.find((candidate) => candidate.toLowerCase() === value.trim().toLowerCase());
    if (!match) {
      throw new InvalidArgumentError(`Expected one of: ${allowed.join(', ')}.`);
    }
    return match;
  };
}

export const parseApplicationStatus: (value: string) => ApplicationStatus = oneOf(APPLICATION_STATUSES);
export const parseRegistrationStatus: (value: string) => RegistrationStatus = oneOf(REGISTRATION_STATUSES);
export const parseMaritalStatus: (value: string) => MaritalStatus = oneOf(MARITAL_STATUSES);
export const parseSortKey: (value: string) => ProjectSortKey = oneOf(PROJECT_SORT_KEYS);

// approve -> true, reject -> false
export function parseDecision(value: string): boolean {
  const decision = value.trim().toLowerCase();
  if (decision !== 'approve' && decision !== 'reject') {
    throw new InvalidArgumentError('Expected approve or reject.');
  }
  return decision === 'approve';
}
