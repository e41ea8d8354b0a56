/**
 * Consolidated domain types and port interfaces for the allocation engine.
 * Infrastructure (CSV files, CLI, logging) plugs in behind these ports.
 */

// ==================== Domain Types ====================

export const FLAT_TYPES = ['TWO_ROOM', 'THREE_ROOM'] as const;
export type FlatType = (typeof FLAT_TYPES)[number];

export const MARITAL_STATUSES = ['SINGLE', 'MARRIED'] as const;
export type MaritalStatus = (typeof MARITAL_STATUSES)[number];

export type UserRole = 'applicant' | 'officer' | 'manager';

export const APPLICATION_STATUSES = [
  'PENDING',
  'SUCCESSFUL',
  'UNSUCCESSFUL',
  'BOOKED',
  'WITHDRAWAL_REQUESTED',
] as const;
export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];

export const REGISTRATION_STATUSES = ['PENDING', 'APPROVED', 'REJECTED'] as const;
export type RegistrationStatus = (typeof REGISTRATION_STATUSES)[number];

export type ReservationPoint = 'approval' | 'booking';

export interface UserRecord {
  nric: string;
  name: string;
  age: number;
  maritalStatus: MaritalStatus;
  role: UserRole;
}

export interface UnitCount {
  total: number;
  available: number;
}

export type FlatInventory = Partial<Record<FlatType, UnitCount>>;

export interface ProjectRecord {
  id: string;
  name: string;
  neighborhood: string;
  openDate: Date;
  closeDate: Date;
  managerId: string;
  officerSlots: number;
  officerIds: string[];
  inventory: FlatInventory;
  visible: boolean;
}

export interface ApplicationRecord {
  id: string;
  applicantId: string;
  projectId: string;
  flatType: FlatType;
  status: ApplicationStatus;
  appliedAt: Date;
  statusUpdatedAt: Date;
  bookedFlatId?: string;
  // Status held before a withdrawal request; restored if the request is rejected
  statusBeforeWithdrawal?: ApplicationStatus;
}

export interface FlatRecord {
  id: string;
  projectId: string;
  flatType: FlatType;
  applicationId?: string;
}

export interface OfficerRegistrationRecord {
  officerId: string;
  projectId: string;
  status: RegistrationStatus;
  registeredAt: Date;
}

export type ActorType = 'applicant' | 'officer' | 'manager' | 'system';

export interface AuditEntry {
  entityId: string;
  action: string;
  fromState?: string;
  toState?: string;
  actorType: ActorType;
  actorId?: string;
  payload?: Record<string, unknown>;
  timestamp: Date;
}

export interface Receipt {
  id: string;
  applicationId: string;
  applicantId: string;
  projectId: string;
  flatId: string;
  flatType: FlatType;
  officerId?: string;
  generatedAt: Date;
}

// ==================== Configuration ====================

export interface EligibilityConfig {
  singleMinAge: number;
  marriedMinAge: number;
}

export interface AllocationConfig {
  reservationPoint: ReservationPoint;
}

export interface ProjectLimitsConfig {
  maxOfficerSlots: number;
}

export interface StorageConfig {
  dateFormat: string;
}

/**
 * Synchronous configuration service.
 * Loaded once at startup from policy.json.
 */
export interface Config {
  eligibility(): EligibilityConfig;
  allocation(): AllocationConfig;
  projectLimits(): ProjectLimitsConfig;
  storage(): StorageConfig;
}

// ==================== Data Repositories ====================

export interface UserRepository {
  findById(nric: string): Promise<UserRecord | null>;
  list(): Promise<UserRecord[]>;
  save(user: UserRecord): Promise<void>;
}

export interface ProjectRepository {
  findById(projectId: string): Promise<ProjectRecord | null>;
  list(): Promise<ProjectRecord[]>;
  save(project: ProjectRecord): Promise<void>;
}

export interface ApplicationRepository {
  findById(applicationId: string): Promise<ApplicationRecord | null>;
  list(): Promise<ApplicationRecord[]>;
  listByApplicant(applicantId: string): Promise<ApplicationRecord[]>;
  listByProject(projectId: string): Promise<ApplicationRecord[]>;
  save(application: ApplicationRecord): Promise<void>;
}

export interface FlatRepository {
  findById(flatId: string): Promise<FlatRecord | null>;
  list(): Promise<FlatRecord[]>;
  listByProject(projectId: string): Promise<FlatRecord[]>;
  save(flat: FlatRecord): Promise<void>;
}

export interface RegistrationRepository {
  find(officerId: string, projectId: string): Promise<OfficerRegistrationRecord | null>;
  list(): Promise<OfficerRegistrationRecord[]>;
  listByOfficer(officerId: string): Promise<OfficerRegistrationRecord[]>;
  listByProject(projectId: string): Promise<OfficerRegistrationRecord[]>;
  save(registration: OfficerRegistrationRecord): Promise<void>;
}

/**
 * Append-only trail of every state change the engine commits.
 */
export interface AuditRepository {
  record(entry: Omit<AuditEntry, 'timestamp'> & { timestamp?: Date }): Promise<void>;
  listFor(entityId: string): Promise<AuditEntry[]>;
  list(): Promise<AuditEntry[]>;
}

/**
 * Bulk load/save of every collection. The engine calls saveAll after each
 * committed transition; a failure leaves the in-memory state untouched.
 */
export interface PersistencePort {
  loadAll(): Promise<void>;
  saveAll(): Promise<void>;
}

// ==================== Runtime ====================

export interface Clock {
  now(): Date;
}

/**
 * Logger abstraction for infrastructure-independent logging.
 */
export interface Logger {
  debug(obj: Record<string, unknown>, msg?: string): void;
  debug(msg: string): void;
  info(obj: Record<string, unknown>, msg?: string): void;
  info(msg: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  warn(msg: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  error(msg: string): void;
}
