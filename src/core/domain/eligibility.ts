import type { EligibilityConfig, FlatType, ProjectRecord, UserRecord } from '../ports';
import { InventoryLedger } from './inventory';

export const DEFAULT_ELIGIBILITY: EligibilityConfig = {
  singleMinAge: 35,
  marriedMinAge: 21,
};

export interface EligibilityOptions {
  rules?: EligibilityConfig;
  // false when the applicant already holds a reserved unit (booking time)
  requireAvailability?: boolean;
}

type Demographics = Pick<UserRecord, 'age' | 'maritalStatus'>;

// Flat types the applicant's age and marital status permit, regardless of project
export const permittedFlatTypes = (
  applicant: Demographics,
  rules: EligibilityConfig = DEFAULT_ELIGIBILITY,
): FlatType[] => {
  if (applicant.maritalStatus === 'SINGLE') {
    return applicant.age >= rules.singleMinAge ? ['TWO_ROOM'] : [];
  }
  return applicant.age >= rules.marriedMinAge ? ['TWO_ROOM', 'THREE_ROOM'] : [];
};

/**
 * Flat types the applicant may apply for in this project: the permitted types
 * intersected with what the project offers and, by default, still has available.
 */
export const eligibleFlatTypes = (
  applicant: Demographics,
  project: Pick<ProjectRecord, 'inventory'>,
  options: EligibilityOptions = {},
): FlatType[] => {
  const { rules = DEFAULT_ELIGIBILITY, requireAvailability = true } = options;
  const ledger = InventoryLedger.from(project.inventory);

  return permittedFlatTypes(applicant, rules).filter(
    (type) => ledger.offers(type) && (!requireAvailability || ledger.availableCount(type) > 0),
  );
};

export const isEligibleFor = (
  applicant: Demographics,
  project: Pick<ProjectRecord, 'inventory'>,
  type: FlatType,
  options: EligibilityOptions = {},
): boolean => eligibleFlatTypes(applicant, project, options).includes(type);

// Larger flat first when the applicant did not ask for a specific type
export const preferredFlatType = (types: FlatType[]): FlatType | undefined => {
  if (types.includes('THREE_ROOM')) return 'THREE_ROOM';
  if (types.includes('TWO_ROOM')) return 'TWO_ROOM';
  return undefined;
};
