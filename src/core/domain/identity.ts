import { fail, ok, type Result } from './result';

// One letter, seven digits, one letter (e.g. S1234567A)
const NRIC_PATTERN = /^[STFG]\d{7}[A-Z]$/;

export const isValidNric = (value: string): boolean => NRIC_PATTERN.test(value.trim().toUpperCase());

// Trims and uppercases the input, rejecting anything that does not match the NRIC format
export const normalizeNric = (value: string): Result<string> => {
  const normalized = value.trim().toUpperCase();
  if (!NRIC_PATTERN.test(normalized)) {
    return fail('ValidationFailed', `"${value}" is not a valid NRIC`, { input: value });
  }
  return ok(normalized);
};
