import type {
  ApplicationRecord,
  ApplicationStatus,
  EligibilityConfig,
  FlatInventory,
  FlatRecord,
  FlatType,
  ProjectRecord,
  ReservationPoint,
  UserRecord,
} from '../ports';
import { eligibleFlatTypes, preferredFlatType } from './eligibility';
import { InventoryLedger, formatFlatType } from './inventory';
import { isOpenForApplication } from './projectCatalog';
import { fail, ok, type Result } from './result';

/**
 * Application lifecycle:
 *
 *   PENDING ──approve──▶ SUCCESSFUL ──book──▶ BOOKED
 *      │  └──reject───▶ UNSUCCESSFUL            │
 *      │                     │                   │
 *      └──────────▶ WITHDRAWAL_REQUESTED ◀───────┘
 *                      │approve      │reject
 *                      ▼             ▼
 *                UNSUCCESSFUL   prior status
 *
 * Every function here is pure: it returns the next application record and,
 * where units move, the project's next inventory. The caller commits both.
 */

export const ACTIVE_STATUSES: readonly ApplicationStatus[] = [
  'PENDING',
  'SUCCESSFUL',
  'BOOKED',
  'WITHDRAWAL_REQUESTED',
];

const WITHDRAWABLE_STATUSES: readonly ApplicationStatus[] = ['PENDING', 'SUCCESSFUL', 'BOOKED'];

export const isActive = (status: ApplicationStatus): boolean => ACTIVE_STATUSES.includes(status);

const invalidTransition = (application: ApplicationRecord, action: string): Result<never> =>
  fail('InvalidTransition', `Cannot ${action} application ${application.id} in status ${application.status}`, {
    applicationId: application.id,
    status: application.status,
    action,
  });

// F-{projectId}-{2R|3R}-{sequence}
export const formatFlatId = (projectId: string, type: FlatType, sequence: number): string =>
  `F-${projectId}-${type === 'TWO_ROOM' ? '2R' : '3R'}-${sequence}`;

// ==================== Submit ====================

export interface SubmitInput {
  id: string;
  applicant: UserRecord;
  project: ProjectRecord;
  existingApplications: ApplicationRecord[];
  registeredAsOfficer: boolean;
  requestedType?: FlatType;
  now: Date;
  rules?: EligibilityConfig;
}

export const submitApplication = (input: SubmitInput): Result<ApplicationRecord> => {
  const { applicant, project, now } = input;

  const active = input.existingApplications.find((application) => isActive(application.status));
  if (active) {
    return fail('AlreadyHasActiveApplication', `Applicant ${applicant.nric} already has application ${active.id}`, {
      applicationId: active.id,
      status: active.status,
    });
  }

  if (input.registeredAsOfficer) {
    return fail(
      'ConflictingRole',
      `Applicant ${applicant.nric} is registered as an officer for project ${project.id}`,
      { projectId: project.id },
    );
  }

  // Availability is settled at decision time; an exhausted type still takes applications
  const eligible = eligibleFlatTypes(applicant, project, { rules: input.rules, requireAvailability: false });
  const withUnits = eligibleFlatTypes(applicant, project, { rules: input.rules });
  const flatType = input.requestedType ?? preferredFlatType(withUnits) ?? preferredFlatType(eligible);
  if (!flatType || !eligible.includes(flatType)) {
    return fail('NotEligible', describeIneligibility(applicant, project, input.requestedType), {
      eligibleFlatTypes: eligible,
      requestedType: input.requestedType,
    });
  }

  if (!isOpenForApplication(project, now)) {
    return fail('ProjectNotOpen', `Project ${project.id} is not open for applications`, {
      openDate: project.openDate,
      closeDate: project.closeDate,
    });
  }

  if (!project.visible) {
    return fail('ProjectNotVisible', `Project ${project.id} is not visible to applicants`);
  }

  return ok({
    id: input.id,
    applicantId: applicant.nric,
    projectId: project.id,
    flatType,
    status: 'PENDING',
    appliedAt: now,
    statusUpdatedAt: now,
  });
};

const describeIneligibility = (applicant: UserRecord, project: ProjectRecord, requestedType?: FlatType): string =>
  requestedType
    ? `Applicant ${applicant.nric} is not eligible for a ${formatFlatType(requestedType)} flat in ${project.id}`
    : `Applicant ${applicant.nric} is not eligible for any flat type in ${project.id}`;

// ==================== Decide ====================

export type DecisionOutcome = 'approved' | 'rejected' | 'exhausted';

export interface InventoryTransition {
  application: ApplicationRecord;
  inventory: FlatInventory;
}

export interface DecisionTransition extends InventoryTransition {
  outcome: DecisionOutcome;
}

export const decideApplication = (
  application: ApplicationRecord,
  project: ProjectRecord,
  approve: boolean,
  now: Date,
  reservationPoint: ReservationPoint,
): Result<DecisionTransition> => {
  if (application.status !== 'PENDING') {
    return invalidTransition(application, approve ? 'approve' : 'reject');
  }

  const ledger = InventoryLedger.from(project.inventory);
  const unsuccessful = (outcome: DecisionOutcome): Result<DecisionTransition> =>
    ok({
      application: { ...application, status: 'UNSUCCESSFUL', statusUpdatedAt: now },
      inventory: ledger.toInventory(),
      outcome,
    });

  if (!approve) {
    return unsuccessful('rejected');
  }

  if (reservationPoint === 'booking') {
    // Units are only taken at booking; approval just requires one to exist
    if (ledger.availableCount(application.flatType) <= 0) {
      return unsuccessful('exhausted');
    }
    return ok({
      application: { ...application, status: 'SUCCESSFUL', statusUpdatedAt: now },
      inventory: ledger.toInventory(),
      outcome: 'approved',
    });
  }

  // Exhausted inventory overrides the approval
  const reserved = ledger.reserve(application.flatType);
  if (!reserved.ok) {
    return unsuccessful('exhausted');
  }

  return ok({
    application: { ...application, status: 'SUCCESSFUL', statusUpdatedAt: now },
    inventory: reserved.value.toInventory(),
    outcome: 'approved',
  });
};

// ==================== Book ====================

export interface BookingTransition extends InventoryTransition {
  flat: FlatRecord;
}

export interface BookInput {
  application: ApplicationRecord;
  applicant: UserRecord;
  project: ProjectRecord;
  chosenType: FlatType;
  // 1-based sequence of the new flat within its project and type
  flatSequence: number;
  now: Date;
  reservationPoint: ReservationPoint;
  rules?: EligibilityConfig;
}

export const bookFlat = (input: BookInput): Result<BookingTransition> => {
  const { application, applicant, project, chosenType, now } = input;

  if (application.status !== 'SUCCESSFUL' || application.bookedFlatId) {
    return invalidTransition(application, 'book');
  }

  const permitted = eligibleFlatTypes(applicant, project, { rules: input.rules, requireAvailability: false });
  if (!permitted.includes(chosenType)) {
    return fail(
      'NotEligible',
      `Applicant ${applicant.nric} is not eligible for a ${formatFlatType(chosenType)} flat in ${project.id}`,
      { eligibleFlatTypes: permitted, chosenType },
    );
  }

  const ledger = InventoryLedger.from(project.inventory);
  const settled = settleBookingInventory(ledger, application.flatType, chosenType, input.reservationPoint);
  if (!settled.ok) return settled;

  const flat: FlatRecord = {
    id: formatFlatId(project.id, chosenType, input.flatSequence),
    projectId: project.id,
    flatType: chosenType,
    applicationId: application.id,
  };

  return ok({
    application: {
      ...application,
      flatType: chosenType,
      status: 'BOOKED',
      bookedFlatId: flat.id,
      statusUpdatedAt: now,
    },
    inventory: settled.value.toInventory(),
    flat,
  });
};

const settleBookingInventory = (
  ledger: InventoryLedger,
  reservedType: FlatType,
  chosenType: FlatType,
  reservationPoint: ReservationPoint,
): Result<InventoryLedger> => {
  if (reservationPoint === 'booking') {
    return ledger.reserve(chosenType);
  }

  if (chosenType === reservedType) {
    // The unit was taken at approval; it must still be on the books as held
    if (ledger.heldCount(chosenType) <= 0) {
      return fail('NoUnitsAvailable', `No reserved ${formatFlatType(chosenType)} unit to book`, {
        flatType: chosenType,
      });
    }
    return ok(ledger);
  }

  // Switching type: take the new unit before giving back the old reservation
  const reserved = ledger.reserve(chosenType);
  if (!reserved.ok) return reserved;
  return ok(reserved.value.release(reservedType));
};

// ==================== Withdraw ====================

export const requestWithdrawal = (application: ApplicationRecord, now: Date): Result<ApplicationRecord> => {
  if (!WITHDRAWABLE_STATUSES.includes(application.status)) {
    return invalidTransition(application, 'withdraw');
  }

  return ok({
    ...application,
    status: 'WITHDRAWAL_REQUESTED',
    statusBeforeWithdrawal: application.status,
    statusUpdatedAt: now,
  });
};

export interface WithdrawalTransition extends InventoryTransition {
  // The booked flat with its application link removed, when one was booked
  releasedFlat: FlatRecord | null;
}

// Falls back to booked-flat presence for records that predate the stored prior status
export const statusBeforeWithdrawal = (application: ApplicationRecord): ApplicationStatus =>
  application.statusBeforeWithdrawal ?? (application.bookedFlatId ? 'BOOKED' : 'SUCCESSFUL');

export const resolveWithdrawal = (
  application: ApplicationRecord,
  project: ProjectRecord,
  bookedFlat: FlatRecord | null,
  approve: boolean,
  now: Date,
  reservationPoint: ReservationPoint,
): Result<WithdrawalTransition> => {
  if (application.status !== 'WITHDRAWAL_REQUESTED') {
    return invalidTransition(application, approve ? 'approve withdrawal of' : 'reject withdrawal of');
  }

  const prior = statusBeforeWithdrawal(application);
  let ledger = InventoryLedger.from(project.inventory);

  if (!approve) {
    const { statusBeforeWithdrawal: _cleared, ...rest } = application;
    return ok({
      application: { ...rest, status: prior, statusUpdatedAt: now },
      inventory: ledger.toInventory(),
      releasedFlat: null,
    });
  }

  let releasedFlat: FlatRecord | null = null;
  if (application.bookedFlatId) {
    ledger = ledger.release(bookedFlat?.flatType ?? application.flatType);
    if (bookedFlat) {
      const { applicationId: _unlinked, ...flat } = bookedFlat;
      releasedFlat = flat;
    }
  } else if (prior === 'SUCCESSFUL' && reservationPoint === 'approval') {
    ledger = ledger.release(application.flatType);
  }

  const { statusBeforeWithdrawal: _cleared, bookedFlatId: _booked, ...rest } = application;
  return ok({
    application: { ...rest, status: 'UNSUCCESSFUL', statusUpdatedAt: now },
    inventory: ledger.toInventory(),
    releasedFlat,
  });
};
