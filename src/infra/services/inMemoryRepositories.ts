import type {
  ApplicationRecord,
  ApplicationRepository,
  AuditEntry,
  AuditRepository,
  FlatRecord,
  FlatRepository,
  OfficerRegistrationRecord,
  ProjectRecord,
  ProjectRepository,
  RegistrationRepository,
  UserRecord,
  UserRepository,
} from '../../core/ports';

// Keyed in-memory collection backing every repository below
// Records are cloned on the way in and out so callers never share references with the store
class Collection<T> {
  private readonly records = new Map<string, T>();

  constructor(private readonly keyOf: (record: T) => string) {}

  get(key: string): T | null {
    const record = this.records.get(key);
    return record ? structuredClone(record) : null;
  }

  values(): T[] {
    return [...this.records.values()].map((record) => structuredClone(record));
  }

  put(record: T): void {
    this.records.set(this.keyOf(record), structuredClone(record));
  }

  replaceAll(records: T[]): void {
    this.records.clear();
    records.forEach((record) => this.put(record));
  }
}

// Bulk access used by the persistence adapter to hydrate and dump a repository
export interface Snapshotable<T> {
  snapshot(): T[];
  replaceAll(records: T[]): void;
}

export class InMemoryUserRepository implements UserRepository, Snapshotable<UserRecord> {
  private readonly store = new Collection<UserRecord>((user) => user.nric);

  async findById(nric: string): Promise<UserRecord | null> {
    return this.store.get(nric);
  }

  async list(): Promise<UserRecord[]> {
    return this.store.values();
  }

  async save(user: UserRecord): Promise<void> {
    this.store.put(user);
  }

  snapshot(): UserRecord[] {
    return this.store.values();
  }

  replaceAll(users: UserRecord[]): void {
    this.store.replaceAll(users);
  }
}

export class InMemoryProjectRepository implements ProjectRepository, Snapshotable<ProjectRecord> {
  private readonly store = new Collection<ProjectRecord>((project) => project.id);

  async findById(projectId: string): Promise<ProjectRecord | null> {
    return this.store.get(projectId);
  }

  async list(): Promise<ProjectRecord[]> {
    return this.store.values();
  }

  async save(project: ProjectRecord): Promise<void> {
    this.store.put(project);
  }

  snapshot(): ProjectRecord[] {
    return this.store.values();
  }

  replaceAll(projects: ProjectRecord[]): void {
    this.store.replaceAll(projects);
  }
}

export class InMemoryApplicationRepository implements ApplicationRepository, Snapshotable<ApplicationRecord> {
  private readonly store = new Collection<ApplicationRecord>((application) => application.id);

  async findById(applicationId: string): Promise<ApplicationRecord | null> {
    return this.store.get(applicationId);
  }

  async list(): Promise<ApplicationRecord[]> {
    return this.store.values();
  }

  async listByApplicant(applicantId: string): Promise<ApplicationRecord[]> {
    return this.store.values().filter((application) => application.applicantId === applicantId);
  }

  async listByProject(projectId: string): Promise<ApplicationRecord[]> {
    return this.store.values().filter((application) => application.projectId === projectId);
  }

  async save(application: ApplicationRecord): Promise<void> {
    this.store.put(application);
  }

  snapshot(): ApplicationRecord[] {
    return this.store.values();
  }

  replaceAll(applications: ApplicationRecord[]): void {
    this.store.replaceAll(applications);
  }
}

export class InMemoryFlatRepository implements FlatRepository, Snapshotable<FlatRecord> {
  private readonly store = new Collection<FlatRecord>((flat) => flat.id);

  async findById(flatId: string): Promise<FlatRecord | null> {
    return this.store.get(flatId);
  }

  async list(): Promise<FlatRecord[]> {
    return this.store.values();
  }

  async listByProject(projectId: string): Promise<FlatRecord[]> {
    return this.store.values().filter((flat) => flat.projectId === projectId);
  }

  async save(flat: FlatRecord): Promise<void> {
    this.store.put(flat);
  }

  snapshot(): FlatRecord[] {
    return this.store.values();
  }

  replaceAll(flats: FlatRecord[]): void {
    this.store.replaceAll(flats);
  }
}

export class InMemoryRegistrationRepository
  implements RegistrationRepository, Snapshotable<OfficerRegistrationRecord>
{
  // One registration per (officer, project) pair
  private readonly store = new Collection<OfficerRegistrationRecord>(
    (registration) => `${registration.officerId}/${registration.projectId}`,
  );

  async find(officerId: string, projectId: string): Promise<OfficerRegistrationRecord | null> {
    return this.store.get(`${officerId}/${projectId}`);
  }

  async list(): Promise<OfficerRegistrationRecord[]> {
    return this.store.values();
  }

  async listByOfficer(officerId: string): Promise<OfficerRegistrationRecord[]> {
    return this.store.values().filter((registration) => registration.officerId === officerId);
  }

  async listByProject(projectId: string): Promise<OfficerRegistrationRecord[]> {
    return this.store.values().filter((registration) => registration.projectId === projectId);
  }

  async save(registration: OfficerRegistrationRecord): Promise<void> {
    this.store.put(registration);
  }

  snapshot(): OfficerRegistrationRecord[] {
    return this.store.values();
  }

  replaceAll(registrations: OfficerRegistrationRecord[]): void {
    this.store.replaceAll(registrations);
  }
}

// Append-only; entries keep insertion order
export class InMemoryAuditRepository implements AuditRepository, Snapshotable<AuditEntry> {
  private entries: AuditEntry[] = [];

  async record(entry: Omit<AuditEntry, 'timestamp'> & { timestamp?: Date }): Promise<void> {
    this.entries.push(structuredClone({ ...entry, timestamp: entry.timestamp ?? new Date() }));
  }

  async listFor(entityId: string): Promise<AuditEntry[]> {
    return this.snapshot().filter((entry) => entry.entityId === entityId);
  }

  async list(): Promise<AuditEntry[]> {
    return this.snapshot();
  }

  snapshot(): AuditEntry[] {
    return this.entries.map((entry) => structuredClone(entry));
  }

  replaceAll(entries: AuditEntry[]): void {
    this.entries = entries.map((entry) => structuredClone(entry));
  }
}

export interface InMemoryRepositories {
  users: InMemoryUserRepository;
  projects: InMemoryProjectRepository;
  applications: InMemoryApplicationRepository;
  flats: InMemoryFlatRepository;
  registrations: InMemoryRegistrationRepository;
  audit: InMemoryAuditRepository;
}

export const createInMemoryRepositories = (): InMemoryRepositories => ({
  users: new InMemoryUserRepository(),
  projects: new InMemoryProjectRepository(),
  applications: new InMemoryApplicationRepository(),
  flats: new InMemoryFlatRepository(),
  registrations: new InMemoryRegistrationRepository(),
  audit: new InMemoryAuditRepository(),
});
