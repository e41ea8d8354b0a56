export type AllocationErrorKind =
  | 'AlreadyHasActiveApplication'
  | 'NotEligible'
  | 'ProjectNotOpen'
  | 'ProjectNotVisible'
  | 'NoUnitsAvailable'
  | 'InvalidTransition'
  | 'AlreadyRegistered'
  | 'NoOfficerSlots'
  | 'OverlappingAssignment'
  | 'ConflictingRole'
  | 'NotFound'
  | 'ValidationFailed'
  | 'InvalidInventory'
  | 'PersistenceFailed';

export interface AllocationError {
  kind: AllocationErrorKind;
  message: string;
  details?: Record<string, unknown>;
}

export type Result<T, E = AllocationError> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const fail = (
  kind: AllocationErrorKind,
  message: string,
  details?: Record<string, unknown>,
): Result<never> => ({
  ok: false,
  error: details ? { kind, message, details } : { kind, message },
});

export const notFound = (entity: string, id: string): Result<never> =>
  fail('NotFound', `${entity} ${id} not found`, { entity, id });
