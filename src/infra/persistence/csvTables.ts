import { format, isValid, parse } from 'date-fns';
import { z } from 'zod';
import {
  APPLICATION_STATUSES,
  FLAT_TYPES,
  MARITAL_STATUSES,
  REGISTRATION_STATUSES,
  type ApplicationRecord,
  type AuditEntry,
  type FlatInventory,
  type FlatRecord,
  type FlatType,
  type OfficerRegistrationRecord,
  type ProjectRecord,
  type UserRecord,
  type UserRole,
} from '../../core/ports';
import { isValidNric } from '../../core/domain/identity';
import { formatFlatType } from '../../core/domain/inventory';

// One CSV file: its header row, how a positional row becomes a record, and back
export interface CsvTable<T> {
  fileName: string;
  headers: readonly string[];
  fromRow(row: string[]): T;
  toRow(record: T): string[];
}

// Cells are addressed by position; several legacy headers repeat (e.g. "Type 1")
const cell = (row: string[], index: number): string => (row[index] ?? '').trim();

// ==================== Field schemas ====================

const nricField = z
  .string()
  .trim()
  .toUpperCase()
  .refine(isValidNric, { message: 'Invalid NRIC' });

const requiredText = z.string().trim().min(1);

const optionalText = z
  .string()
  .trim()
  .transform((value) => value || undefined);

const epochField = z
  .string()
  .trim()
  .regex(/^\d+$/, 'Expected epoch milliseconds')
  .transform((value) => new Date(Number(value)));

const countField = z.coerce.number().int().nonnegative();

const flatTypeField = z
  .string()
  .trim()
  .transform((value, ctx): FlatType => {
    const type = parseFlatTypeLabel(value);
    if (!type) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown flat type "${value}"` });
      return z.NEVER;
    }
    return type;
  });

// Older files spell the withdrawal state WITHDRAW
const applicationStatusField = z
  .string()
  .trim()
  .toUpperCase()
  .transform((value) => (value === 'WITHDRAW' ? 'WITHDRAWAL_REQUESTED' : value))
  .pipe(z.enum(APPLICATION_STATUSES));

const optionalApplicationStatusField = z
  .string()
  .trim()
  .toUpperCase()
  .transform((value) => (value === 'WITHDRAW' ? 'WITHDRAWAL_REQUESTED' : value))
  .pipe(z.union([z.enum(APPLICATION_STATUSES), z.literal('')]))
  .transform((value) => value || undefined);

export const parseFlatTypeLabel = (label: string): FlatType | null => {
  const normalized = label.trim().toUpperCase().replace(/[\s-]/g, '_');
  if (normalized === '2_ROOM' || normalized === 'TWO_ROOM') return 'TWO_ROOM';
  if (normalized === '3_ROOM' || normalized === 'THREE_ROOM') return 'THREE_ROOM';
  return null;
};

const dateField = (dateFormat: string) =>
  z
    .string()
    .trim()
    .transform((value, ctx) => {
      const date = parse(value, dateFormat, new Date(0));
      if (!isValid(date)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a date in ${dateFormat}, got "${value}"` });
        return z.NEVER;
      }
      return date;
    });

// ==================== Users ====================

const UserRowSchema = z.object({
  name: requiredText,
  nric: nricField,
  age: z.coerce.number().int().positive(),
  maritalStatus: z.string().trim().toUpperCase().pipe(z.enum(MARITAL_STATUSES)),
});

const USER_FILES: Record<UserRole, string> = {
  applicant: 'ApplicantList.csv',
  officer: 'OfficerList.csv',
  manager: 'ManagerList.csv',
};

const titleCase = (value: string): string => value.charAt(0) + value.slice(1).toLowerCase();

export const userTable = (role: UserRole): CsvTable<UserRecord> => ({
  fileName: USER_FILES[role],
  headers: ['Name', 'NRIC', 'Age', 'Marital Status'],
  fromRow: (row) => ({
    ...UserRowSchema.parse({
      name: cell(row, 0),
      nric: cell(row, 1),
      age: cell(row, 2),
      maritalStatus: cell(row, 3),
    }),
    role,
  }),
  toRow: (user) => [user.name, user.nric, String(user.age), titleCase(user.maritalStatus)],
});

// ==================== Projects ====================

const inventoryColumns = (inventory: FlatInventory): string[] =>
  FLAT_TYPES.flatMap((type) => {
    const entry = inventory[type];
    return entry ? [[formatFlatType(type), String(entry.total), String(entry.available)]] : [];
  })
    .concat([
      ['', '', ''],
      ['', '', ''],
    ])
    .slice(0, 2)
    .flat();

export const projectTable = (dateFormat: string): CsvTable<ProjectRecord> => {
  const slot = z.object({
    type: z.union([flatTypeField, z.literal('').transform(() => undefined)]),
    total: z.union([z.literal('').transform(() => 0), countField]),
    // Missing available count means nothing has been reserved yet
    available: z.union([z.literal('').transform(() => undefined), countField]),
  });

  const ProjectRowSchema = z.object({
    id: requiredText,
    name: requiredText,
    neighborhood: requiredText,
    slots: z.tuple([slot, slot]),
    openDate: dateField(dateFormat),
    closeDate: dateField(dateFormat),
    managerId: nricField,
    officerSlots: countField,
    officerIds: z
      .string()
      .transform((value) => value.split(';').map((id) => id.trim().toUpperCase()).filter(Boolean)),
    visible: z
      .string()
      .trim()
      .toLowerCase()
      .transform((value) => value !== 'false'),
  });

  return {
    fileName: 'ProjectList.csv',
    headers: [
      'ProjectID',
      'Project Name',
      'Neighborhood',
      'Type 1',
      'Number of units for Type 1',
      'Available units for Type 1',
      'Type 2',
      'Number of units for Type 2',
      'Available units for Type 2',
      'Application opening date',
      'Application closing date',
      'Manager',
      'Officer Slot',
      'Officer',
      'Visible',
    ],
    fromRow: (row) => {
      const parsed = ProjectRowSchema.parse({
        id: cell(row, 0),
        name: cell(row, 1),
        neighborhood: cell(row, 2),
        slots: [
          { type: cell(row, 3), total: cell(row, 4), available: cell(row, 5) },
          { type: cell(row, 6), total: cell(row, 7), available: cell(row, 8) },
        ],
        openDate: cell(row, 9),
        closeDate: cell(row, 10),
        managerId: cell(row, 11),
        officerSlots: cell(row, 12),
        officerIds: cell(row, 13),
        visible: cell(row, 14),
      });

      const inventory: FlatInventory = {};
      for (const { type, total, available } of parsed.slots) {
        if (type && total > 0) {
          inventory[type] = { total, available: Math.min(available ?? total, total) };
        }
      }

      const { slots: _slots, ...project } = parsed;
      return { ...project, inventory };
    },
    toRow: (project) => [
      project.id,
      project.name,
      project.neighborhood,
      ...inventoryColumns(project.inventory),
      format(project.openDate, dateFormat),
      format(project.closeDate, dateFormat),
      project.managerId,
      String(project.officerSlots),
      project.officerIds.join(';'),
      String(project.visible),
    ],
  };
};

// ==================== Applications ====================

const ApplicationRowSchema = z.object({
  id: requiredText,
  applicantId: nricField,
  projectId: requiredText,
  status: applicationStatusField,
  appliedAt: epochField,
  statusUpdatedAt: epochField,
  bookedFlatId: optionalText,
  flatType: z.union([flatTypeField, z.literal('').transform(() => undefined)]),
  statusBeforeWithdrawal: optionalApplicationStatusField,
});

export const applicationTable: CsvTable<ApplicationRecord> = {
  fileName: 'ApplicationList.csv',
  headers: [
    'ApplicationID',
    'ApplicantNRIC',
    'ProjectID',
    'Status',
    'ApplicationDate',
    'StatusUpdateDate',
    'BookedFlatID',
    'FlatType',
    'PriorStatus',
  ],
  fromRow: (row) => {
    const { flatType, ...parsed } = ApplicationRowSchema.parse({
      id: cell(row, 0),
      applicantId: cell(row, 1),
      projectId: cell(row, 2),
      status: cell(row, 3),
      appliedAt: cell(row, 4),
      statusUpdatedAt: cell(row, 5),
      bookedFlatId: cell(row, 6),
      flatType: cell(row, 7),
      statusBeforeWithdrawal: cell(row, 8),
    });
    // Rows written before the flat type column existed fall back to the booked flat's id
    return { ...parsed, flatType: flatType ?? (parsed.bookedFlatId?.includes('-3R-') ? 'THREE_ROOM' : 'TWO_ROOM') };
  },
  toRow: (application) => [
    application.id,
    application.applicantId,
    application.projectId,
    application.status,
    String(application.appliedAt.getTime()),
    String(application.statusUpdatedAt.getTime()),
    application.bookedFlatId ?? '',
    application.flatType,
    application.statusBeforeWithdrawal ?? '',
  ],
};

// ==================== Flats ====================

const FlatRowSchema = z.object({
  id: requiredText,
  projectId: requiredText,
  flatType: flatTypeField,
  applicationId: optionalText,
});

export const flatTable: CsvTable<FlatRecord> = {
  fileName: 'FlatList.csv',
  headers: ['FlatID', 'ProjectID', 'FlatType', 'ApplicationID'],
  fromRow: (row) =>
    FlatRowSchema.parse({
      id: cell(row, 0),
      projectId: cell(row, 1),
      flatType: cell(row, 2),
      applicationId: cell(row, 3),
    }),
  toRow: (flat) => [flat.id, flat.projectId, flat.flatType, flat.applicationId ?? ''],
};

// ==================== Officer registrations ====================

const RegistrationRowSchema = z.object({
  officerId: nricField,
  projectId: requiredText,
  status: z.string().trim().toUpperCase().pipe(z.enum(REGISTRATION_STATUSES)),
  registeredAt: epochField,
});

export const registrationTable: CsvTable<OfficerRegistrationRecord> = {
  fileName: 'OfficerRegistrations.csv',
  headers: ['OfficerNRIC', 'ProjectID', 'Status', 'RegistrationDate'],
  fromRow: (row) =>
    RegistrationRowSchema.parse({
      officerId: cell(row, 0),
      projectId: cell(row, 1),
      status: cell(row, 2),
      registeredAt: cell(row, 3),
    }),
  toRow: (registration) => [
    registration.officerId,
    registration.projectId,
    registration.status,
    String(registration.registeredAt.getTime()),
  ],
};

// ==================== Audit log ====================

const AuditRowSchema = z.object({
  timestamp: z.string().trim().pipe(z.coerce.date()),
  entityId: requiredText,
  action: requiredText,
  fromState: optionalText,
  toState: optionalText,
  actorType: z.enum(['applicant', 'officer', 'manager', 'system']),
  actorId: optionalText,
  payload: z
    .string()
    .trim()
    .transform((value, ctx): Record<string, unknown> | undefined => {
      if (!value) return undefined;
      try {
        return z.record(z.unknown()).parse(JSON.parse(value));
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Payload is not a JSON object' });
        return z.NEVER;
      }
    }),
});

export const auditTable: CsvTable<AuditEntry> = {
  fileName: 'AuditLog.csv',
  headers: ['Timestamp', 'EntityID', 'Action', 'FromState', 'ToState', 'ActorType', 'ActorID', 'Payload'],
  fromRow: (row) =>
    AuditRowSchema.parse({
      timestamp: cell(row, 0),
      entityId: cell(row, 1),
      action: cell(row, 2),
      fromState: cell(row, 3),
      toState: cell(row, 4),
      actorType: cell(row, 5),
      actorId: cell(row, 6),
      payload: row[7] ?? '',
    }),
  toRow: (entry) => [
    entry.timestamp.toISOString(),
    entry.entityId,
    entry.action,
    entry.fromState ?? '',
    entry.toState ?? '',
    entry.actorType,
    entry.actorId ?? '',
    entry.payload ? JSON.stringify(entry.payload) : '',
  ],
};
