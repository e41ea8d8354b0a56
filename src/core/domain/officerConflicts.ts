import type { ApplicationRecord, OfficerRegistrationRecord, ProjectRecord, UserRecord } from '../ports';
import { availableOfficerSlots, windowsOverlap } from './projectCatalog';
import { fail, ok, type Result } from './result';

export interface RegistrationContext {
  // Every registration the officer holds, across all projects
  registrations: OfficerRegistrationRecord[];
  // Every application the officer has submitted as an applicant
  applications: ApplicationRecord[];
  projects: Map<string, ProjectRecord>;
}

/**
 * Decides whether `user` may register to handle `project`.
 * Checks run in a fixed order so callers see the most specific reason first.
 */
export const canRegister = (
  user: UserRecord,
  project: ProjectRecord,
  context: RegistrationContext,
): Result<void> => {
  const existing = context.registrations.find((registration) => registration.projectId === project.id);
  if (existing) {
    return fail('AlreadyRegistered', `Officer ${user.nric} already registered for project ${project.id}`, {
      status: existing.status,
    });
  }

  if (availableOfficerSlots(project) <= 0) {
    return fail('NoOfficerSlots', `Project ${project.id} has no officer slots left`, {
      officerSlots: project.officerSlots,
    });
  }

  const overlap = findOverlappingAssignment(project, context);
  if (overlap) {
    return fail(
      'OverlappingAssignment',
      `Officer ${user.nric} already handles ${overlap.id}, whose window overlaps ${project.id}`,
      { projectId: overlap.id },
    );
  }

  if (context.applications.some((application) => application.projectId === project.id)) {
    return fail('ConflictingRole', `Officer ${user.nric} has applied for project ${project.id}`, {
      projectId: project.id,
    });
  }

  return ok(undefined);
};

export const createRegistration = (officerId: string, projectId: string, now: Date): OfficerRegistrationRecord => ({
  officerId,
  projectId,
  status: 'PENDING',
  registeredAt: now,
});

export interface RegistrationDecision {
  registration: OfficerRegistrationRecord;
  project: ProjectRecord;
}

/**
 * Approval re-checks slots and overlap against the officer's other approved
 * registrations, since both may have changed while the request was pending.
 */
export const decideRegistration = (
  registration: OfficerRegistrationRecord,
  project: ProjectRecord,
  approve: boolean,
  context: Omit<RegistrationContext, 'applications'>,
): Result<RegistrationDecision> => {
  if (registration.status !== 'PENDING') {
    return fail(
      'InvalidTransition',
      `Registration of ${registration.officerId} for ${registration.projectId} is already ${registration.status}`,
      { status: registration.status },
    );
  }

  if (!approve) {
    return ok({ registration: { ...registration, status: 'REJECTED' }, project });
  }

  if (availableOfficerSlots(project) <= 0) {
    return fail('NoOfficerSlots', `Project ${project.id} has no officer slots left`, {
      officerSlots: project.officerSlots,
    });
  }

  const overlap = findOverlappingAssignment(project, context);
  if (overlap) {
    return fail(
      'OverlappingAssignment',
      `Officer ${registration.officerId} already handles ${overlap.id}, whose window overlaps ${project.id}`,
      { projectId: overlap.id },
    );
  }

  const officerIds = project.officerIds.includes(registration.officerId)
    ? project.officerIds
    : [...project.officerIds, registration.officerId];

  return ok({
    registration: { ...registration, status: 'APPROVED' },
    project: { ...project, officerIds },
  });
};

/**
 * After a project's window moves, every rostered officer must still be free of
 * overlap with their other approved projects. `registrations` may span officers.
 */
export const checkRosterWindows = (
  project: ProjectRecord,
  context: Pick<RegistrationContext, 'registrations' | 'projects'>,
): Result<void> => {
  for (const officerId of project.officerIds) {
    const overlap = findOverlappingAssignment(project, {
      registrations: context.registrations.filter((registration) => registration.officerId === officerId),
      projects: context.projects,
    });
    if (overlap) {
      return fail(
        'OverlappingAssignment',
        `Officer ${officerId} already handles ${overlap.id}, whose window would overlap ${project.id}`,
        { officerId, projectId: overlap.id },
      );
    }
  }
  return ok(undefined);
};

const findOverlappingAssignment = (
  project: ProjectRecord,
  context: Pick<RegistrationContext, 'registrations' | 'projects'>,
): ProjectRecord | undefined => {
  for (const registration of context.registrations) {
    if (registration.status !== 'APPROVED' || registration.projectId === project.id) continue;
    const other = context.projects.get(registration.projectId);
    if (other && windowsOverlap(other, project)) {
      return other;
    }
  }
  return undefined;
};
