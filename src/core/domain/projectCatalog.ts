import { endOfDay, startOfDay } from 'date-fns';
import type {
  ApplicationRecord,
  ApplicationStatus,
  FlatType,
  MaritalStatus,
  ProjectRecord,
  UserRecord,
} from '../ports';
import { FLAT_TYPES } from '../ports';
import { InventoryLedger } from './inventory';
import { fail, ok, type Result } from './result';

type Window = Pick<ProjectRecord, 'openDate' | 'closeDate'>;

// Windows are inclusive at both ends
export const windowsOverlap = (existing: Window, candidate: Window): boolean =>
  !(existing.closeDate < candidate.openDate || existing.openDate > candidate.closeDate);

// The closing date counts as a full day
export const isOpenForApplication = (project: Window, now: Date): boolean =>
  now >= startOfDay(project.openDate) && now <= endOfDay(project.closeDate);

export const availableOfficerSlots = (project: Pick<ProjectRecord, 'officerSlots' | 'officerIds'>): number =>
  Math.max(0, project.officerSlots - project.officerIds.length);

/**
 * First three letters of the name, uppercased, plus the next free
 * three-digit sequence for that prefix (e.g. SUN001, SUN002).
 */
export const generateProjectId = (name: string, existingIds: string[]): string => {
  const prefix = name.replace(/[^A-Za-z0-9]/g, '').slice(0, 3).toUpperCase() || 'PRJ';
  const maxSequence = existingIds
    .filter((id) => id.startsWith(prefix))
    .map((id) => Number.parseInt(id.slice(prefix.length), 10))
    .filter((sequence) => Number.isInteger(sequence))
    .reduce((max, sequence) => Math.max(max, sequence), 0);

  return `${prefix}${String(maxSequence + 1).padStart(3, '0')}`;
};

// ==================== Create / Edit ====================

export interface ProjectDraft {
  name: string;
  neighborhood: string;
  openDate: Date;
  closeDate: Date;
  officerSlots: number;
  units: Partial<Record<FlatType, number>>;
  visible?: boolean;
}

export type ProjectChanges = Partial<Omit<ProjectDraft, 'units' | 'visible'>> & {
  units?: Partial<Record<FlatType, number>>;
};

export interface CatalogRules {
  maxOfficerSlots: number;
}

export const createProjectRecord = (
  draft: ProjectDraft,
  managerId: string,
  existingProjects: ProjectRecord[],
  rules: CatalogRules,
): Result<ProjectRecord> => {
  const validation = validateDetails(draft, rules);
  if (!validation.ok) return validation;

  for (const type of FLAT_TYPES) {
    const count = draft.units[type] ?? 0;
    if (!Number.isInteger(count) || count < 0) {
      return fail('InvalidInventory', `Unit count for ${type} must be a non-negative integer`, { flatType: type });
    }
  }
  const ledger = InventoryLedger.fromTotals(draft.units);
  if (ledger.offeredTypes().length === 0) {
    return fail('InvalidInventory', 'A project must offer at least one flat unit');
  }

  const clash = findManagerOverlap(managerId, draft, existingProjects);
  if (clash) {
    return fail(
      'OverlappingAssignment',
      `Manager ${managerId} already manages ${clash.id} during this application window`,
      { projectId: clash.id },
    );
  }

  return ok({
    id: generateProjectId(
      draft.name,
      existingProjects.map((project) => project.id),
    ),
    name: draft.name.trim(),
    neighborhood: draft.neighborhood.trim(),
    openDate: draft.openDate,
    closeDate: draft.closeDate,
    managerId,
    officerSlots: draft.officerSlots,
    officerIds: [],
    inventory: ledger.toInventory(),
    visible: draft.visible ?? true,
  });
};

export const applyProjectChanges = (
  project: ProjectRecord,
  changes: ProjectChanges,
  existingProjects: ProjectRecord[],
  rules: CatalogRules,
): Result<ProjectRecord> => {
  const next: ProjectRecord = {
    ...project,
    name: changes.name?.trim() ?? project.name,
    neighborhood: changes.neighborhood?.trim() ?? project.neighborhood,
    openDate: changes.openDate ?? project.openDate,
    closeDate: changes.closeDate ?? project.closeDate,
    officerSlots: changes.officerSlots ?? project.officerSlots,
  };

  const validation = validateDetails(next, rules);
  if (!validation.ok) return validation;

  if (next.officerSlots < project.officerIds.length) {
    return fail(
      'ValidationFailed',
      `Officer slots cannot drop below the ${project.officerIds.length} officers already assigned`,
      { officerSlots: next.officerSlots },
    );
  }

  if (changes.openDate || changes.closeDate) {
    const others = existingProjects.filter((other) => other.id !== project.id);
    const clash = findManagerOverlap(project.managerId, next, others);
    if (clash) {
      return fail(
        'OverlappingAssignment',
        `Manager ${project.managerId} already manages ${clash.id} during this application window`,
        { projectId: clash.id },
      );
    }
  }

  let ledger = InventoryLedger.from(project.inventory);
  for (const type of FLAT_TYPES) {
    const total = changes.units?.[type];
    if (total === undefined) continue;
    const resized = ledger.resize(type, total);
    if (!resized.ok) return resized;
    ledger = resized.value;
  }
  next.inventory = ledger.toInventory();

  return ok(next);
};

const validateDetails = (
  details: Pick<ProjectDraft, 'name' | 'neighborhood' | 'openDate' | 'closeDate' | 'officerSlots'>,
  rules: CatalogRules,
): Result<void> => {
  if (!details.name.trim()) {
    return fail('ValidationFailed', 'Project name is required');
  }
  if (!details.neighborhood.trim()) {
    return fail('ValidationFailed', 'Neighborhood is required');
  }
  if (Number.isNaN(details.openDate.getTime()) || Number.isNaN(details.closeDate.getTime())) {
    return fail('ValidationFailed', 'Application window dates are invalid');
  }
  if (details.closeDate < details.openDate) {
    return fail('ValidationFailed', 'Closing date must not be before opening date');
  }
  if (
    !Number.isInteger(details.officerSlots) ||
    details.officerSlots < 1 ||
    details.officerSlots > rules.maxOfficerSlots
  ) {
    return fail('ValidationFailed', `Officer slots must be between 1 and ${rules.maxOfficerSlots}`, {
      officerSlots: details.officerSlots,
    });
  }
  return ok(undefined);
};

const findManagerOverlap = (
  managerId: string,
  window: Window,
  projects: ProjectRecord[],
): ProjectRecord | undefined =>
  projects.find((project) => project.managerId === managerId && windowsOverlap(project, window));

// ==================== Discovery ====================

export const PROJECT_SORT_KEYS = [
  'name',
  'neighborhood',
  'openDate',
  'closeDate',
  'availability',
  'availabilityDesc',
  'flatType',
] as const;
export type ProjectSortKey = (typeof PROJECT_SORT_KEYS)[number];

export interface ProjectFilters {
  neighborhood?: string;
  flatType?: FlatType;
  openFrom?: Date;
  closeBy?: Date;
  minAvailability?: number;
  managerId?: string;
  sortBy?: ProjectSortKey;
}

const totalAvailable = (project: ProjectRecord): number =>
  InventoryLedger.from(project.inventory).totalAvailable();

export const filterProjects = (projects: ProjectRecord[], filters: ProjectFilters = {}): ProjectRecord[] => {
  const { neighborhood, flatType, openFrom, closeBy, minAvailability, managerId } = filters;

  const filtered = projects.filter((project) => {
    if (neighborhood && project.neighborhood.toLowerCase() !== neighborhood.trim().toLowerCase()) return false;
    if (flatType && !InventoryLedger.from(project.inventory).offers(flatType)) return false;
    if (openFrom && project.openDate < openFrom) return false;
    if (closeBy && project.closeDate > closeBy) return false;
    if (minAvailability !== undefined && minAvailability > 0 && totalAvailable(project) < minAvailability) {
      return false;
    }
    if (managerId && project.managerId !== managerId) return false;
    return true;
  });

  return sortProjects(filtered, filters.sortBy ?? 'name');
};

export const sortProjects = (projects: ProjectRecord[], sortBy: ProjectSortKey): ProjectRecord[] => {
  const comparators: Record<ProjectSortKey, (a: ProjectRecord, b: ProjectRecord) => number> = {
    name: (a, b) => a.name.localeCompare(b.name),
    neighborhood: (a, b) => a.neighborhood.localeCompare(b.neighborhood),
    openDate: (a, b) => a.openDate.getTime() - b.openDate.getTime(),
    closeDate: (a, b) => a.closeDate.getTime() - b.closeDate.getTime(),
    availability: (a, b) => totalAvailable(a) - totalAvailable(b),
    availabilityDesc: (a, b) => totalAvailable(b) - totalAvailable(a),
    flatType: (a, b) =>
      InventoryLedger.from(a.inventory).offeredTypes().length -
      InventoryLedger.from(b.inventory).offeredTypes().length,
  };

  return [...projects].sort(comparators[sortBy]);
};

export interface ApplicationFilters {
  projectId?: string;
  applicantId?: string;
  status?: ApplicationStatus;
  maritalStatus?: MaritalStatus;
  flatType?: FlatType;
}

export const filterApplications = (
  applications: ApplicationRecord[],
  applicants: Map<string, UserRecord>,
  filters: ApplicationFilters = {},
): ApplicationRecord[] =>
  applications.filter((application) => {
    if (filters.projectId && application.projectId !== filters.projectId) return false;
    if (filters.applicantId && application.applicantId !== filters.applicantId) return false;
    if (filters.status && application.status !== filters.status) return false;
    if (filters.flatType && application.flatType !== filters.flatType) return false;
    if (filters.maritalStatus) {
      const applicant = applicants.get(application.applicantId);
      if (!applicant || applicant.maritalStatus !== filters.maritalStatus) return false;
    }
    return true;
  });
