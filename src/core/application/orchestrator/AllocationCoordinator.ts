import crypto from 'node:crypto';
import type {
  ActorType,
  ApplicationRecord,
  ApplicationRepository,
  AuditEntry,
  AuditRepository,
  Clock,
  Config,
  FlatRecord,
  FlatRepository,
  FlatType,
  Logger,
  OfficerRegistrationRecord,
  PersistencePort,
  ProjectRecord,
  ProjectRepository,
  Receipt,
  RegistrationRepository,
  RegistrationStatus,
  UserRecord,
  UserRepository,
} from '../../ports';
import {
  bookFlat,
  decideApplication,
  isActive,
  requestWithdrawal,
  resolveWithdrawal,
  submitApplication,
} from '../../domain/applicationStateMachine';
import { eligibleFlatTypes } from '../../domain/eligibility';
import {
  canRegister,
  checkRosterWindows,
  createRegistration,
  decideRegistration,
} from '../../domain/officerConflicts';
import {
  applyProjectChanges,
  createProjectRecord,
  filterApplications,
  filterProjects,
  type ApplicationFilters,
  type ProjectChanges,
  type ProjectDraft,
  type ProjectFilters,
} from '../../domain/projectCatalog';
import { fail, notFound, ok, type Result } from '../../domain/result';
import { KeyedLock } from '../KeyedLock';

export interface AllocationCoordinatorDeps {
  users: UserRepository;
  projects: ProjectRepository;
  applications: ApplicationRepository;
  flats: FlatRepository;
  registrations: RegistrationRepository;
  audit: AuditRepository;
  persistence: PersistencePort;
  config: Config;
  logger: Logger;
  clock?: Clock;
  lock?: KeyedLock;
  idGenerator?: () => string;
}

export interface ApplicantOverview {
  applicant: UserRecord;
  activeApplication: ApplicationRecord | null;
  bookedFlat: FlatRecord | null;
  applications: ApplicationRecord[];
}

export interface RegistrationFilters {
  officerId?: string;
  projectId?: string;
  status?: RegistrationStatus;
}

const systemClock: Clock = { now: () => new Date() };

const projectKey = (projectId: string): string => `project:${projectId}`;
const userKey = (nric: string): string => `user:${nric}`;

/**
 * Sequences the allocation workflows over the repositories.
 *
 * Every mutating operation runs under the project's lock, re-reads what it
 * needs inside the lock, commits inventory and status together, records an
 * audit entry, then saves everything through the persistence port.
 */
export class AllocationCoordinator {
  private readonly users: UserRepository;
  private readonly projects: ProjectRepository;
  private readonly applications: ApplicationRepository;
  private readonly flats: FlatRepository;
  private readonly registrations: RegistrationRepository;
  private readonly audit: AuditRepository;
  private readonly persistence: PersistencePort;
  private readonly config: Config;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly lock: KeyedLock;
  private readonly nextId: () => string;

  constructor(deps: AllocationCoordinatorDeps) {
    this.users = deps.users;
    this.projects = deps.projects;
    this.applications = deps.applications;
    this.flats = deps.flats;
    this.registrations = deps.registrations;
    this.audit = deps.audit;
    this.persistence = deps.persistence;
    this.config = deps.config;
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
    this.lock = deps.lock ?? new KeyedLock();
    this.nextId = deps.idGenerator ?? (() => crypto.randomUUID());
  }

  // ==================== Applications ====================

  async apply(applicantId: string, projectId: string, requestedType?: FlatType): Promise<Result<ApplicationRecord>> {
    // The applicant key guards the one-active-application rule, which spans projects
    return this.lock.run([projectKey(projectId), userKey(applicantId)], async () => {
      const applicant = await this.users.findById(applicantId);
      if (!applicant) return notFound('User', applicantId);
      const project = await this.projects.findById(projectId);
      if (!project) return notFound('Project', projectId);

      if (applicant.role === 'manager') {
        return fail('ConflictingRole', `Manager ${applicantId} cannot apply for a flat`, { role: applicant.role });
      }

      const registration = await this.registrations.find(applicantId, projectId);
      const submitted = submitApplication({
        id: this.nextId(),
        applicant,
        project,
        existingApplications: await this.applications.listByApplicant(applicantId),
        registeredAsOfficer: registration !== null && registration.status !== 'REJECTED',
        requestedType,
        now: this.clock.now(),
        rules: this.config.eligibility(),
      });
      if (!submitted.ok) {
        this.logRejected('apply', submitted.error.kind, { applicantId, projectId });
        return submitted;
      }

      const application = submitted.value;
      await this.applications.save(application);
      await this.recordAudit({
        entityId: application.id,
        action: 'application_submitted',
        toState: application.status,
        actorType: 'applicant',
        actorId: applicantId,
        payload: { projectId, flatType: application.flatType },
      });
      this.logger.info(
        { applicationId: application.id, applicantId, projectId, flatType: application.flatType },
        'Application submitted',
      );

      return this.persist(application, { applicationId: application.id });
    });
  }

  async decideApplication(
    applicationId: string,
    approve: boolean,
    managerId?: string,
  ): Promise<Result<ApplicationRecord>> {
    return this.withApplicationProject(applicationId, async (application, project) => {
      const decided = decideApplication(
        application,
        project,
        approve,
        this.clock.now(),
        this.config.allocation().reservationPoint,
      );
      if (!decided.ok) {
        this.logRejected('decideApplication', decided.error.kind, { applicationId });
        return decided;
      }

      const { outcome } = decided.value;
      await this.commitInventory(project, decided.value.inventory);
      await this.applications.save(decided.value.application);
      await this.recordAudit({
        entityId: applicationId,
        action: `application_${outcome}`,
        fromState: application.status,
        toState: decided.value.application.status,
        actorType: 'manager',
        actorId: managerId,
        payload: { projectId: project.id, flatType: application.flatType },
      });

      if (outcome === 'exhausted') {
        this.logger.warn(
          { applicationId, projectId: project.id, flatType: application.flatType },
          'Approval overridden: no units available',
        );
      } else {
        this.logger.info({ applicationId, projectId: project.id, outcome }, 'Application decided');
      }

      return this.persist(decided.value.application, { applicationId });
    });
  }

  async bookFlat(applicationId: string, chosenType?: FlatType, officerId?: string): Promise<Result<Receipt>> {
    return this.withApplicationProject(applicationId, async (application, project) => {
      const applicant = await this.users.findById(application.applicantId);
      if (!applicant) return notFound('User', application.applicantId);

      if (officerId) {
        const officer = await this.users.findById(officerId);
        if (!officer) return notFound('User', officerId);
        if (!project.officerIds.includes(officerId)) {
          this.logRejected('bookFlat', 'ConflictingRole', { applicationId, officerId });
          return fail('ConflictingRole', `Officer ${officerId} does not handle project ${project.id}`, {
            officerId,
            projectId: project.id,
          });
        }
      }

      const flatType = chosenType ?? application.flatType;
      const existingFlats = await this.flats.listByProject(project.id);
      const now = this.clock.now();

      const booked = bookFlat({
        application,
        applicant,
        project,
        chosenType: flatType,
        flatSequence: existingFlats.filter((flat) => flat.flatType === flatType).length + 1,
        now,
        reservationPoint: this.config.allocation().reservationPoint,
        rules: this.config.eligibility(),
      });
      if (!booked.ok) {
        this.logRejected('bookFlat', booked.error.kind, { applicationId, flatType });
        return booked;
      }

      const { flat } = booked.value;
      await this.commitInventory(project, booked.value.inventory);
      await this.flats.save(flat);
      await this.applications.save(booked.value.application);
      await this.recordAudit({
        entityId: applicationId,
        action: 'flat_booked',
        fromState: application.status,
        toState: booked.value.application.status,
        actorType: officerId ? 'officer' : 'system',
        actorId: officerId,
        payload: { projectId: project.id, flatId: flat.id, flatType: flat.flatType },
      });
      this.logger.info({ applicationId, flatId: flat.id, officerId }, 'Flat booked');

      const receipt: Receipt = {
        id: `REC-${applicationId}`,
        applicationId,
        applicantId: application.applicantId,
        projectId: project.id,
        flatId: flat.id,
        flatType: flat.flatType,
        officerId,
        generatedAt: now,
      };
      return this.persist(receipt, { applicationId });
    });
  }

  async requestWithdrawal(applicationId: string): Promise<Result<ApplicationRecord>> {
    return this.withApplicationProject(applicationId, async (application) => {
      const requested = requestWithdrawal(application, this.clock.now());
      if (!requested.ok) {
        this.logRejected('requestWithdrawal', requested.error.kind, { applicationId });
        return requested;
      }

      await this.applications.save(requested.value);
      await this.recordAudit({
        entityId: applicationId,
        action: 'withdrawal_requested',
        fromState: application.status,
        toState: requested.value.status,
        actorType: 'applicant',
        actorId: application.applicantId,
      });
      this.logger.info({ applicationId, fromState: application.status }, 'Withdrawal requested');

      return this.persist(requested.value, { applicationId });
    });
  }

  async resolveWithdrawal(
    applicationId: string,
    approve: boolean,
    managerId?: string,
  ): Promise<Result<ApplicationRecord>> {
    return this.withApplicationProject(applicationId, async (application, project) => {
      const bookedFlat = application.bookedFlatId ? await this.flats.findById(application.bookedFlatId) : null;
      if (application.bookedFlatId && !bookedFlat) {
        this.logger.warn(
          { applicationId, flatId: application.bookedFlatId },
          'Booked flat missing; releasing by application flat type',
        );
      }

      const resolved = resolveWithdrawal(
        application,
        project,
        bookedFlat,
        approve,
        this.clock.now(),
        this.config.allocation().reservationPoint,
      );
      if (!resolved.ok) {
        this.logRejected('resolveWithdrawal', resolved.error.kind, { applicationId });
        return resolved;
      }

      await this.commitInventory(project, resolved.value.inventory);
      if (resolved.value.releasedFlat) {
        await this.flats.save(resolved.value.releasedFlat);
      }
      await this.applications.save(resolved.value.application);
      await this.recordAudit({
        entityId: applicationId,
        action: approve ? 'withdrawal_approved' : 'withdrawal_rejected',
        fromState: application.status,
        toState: resolved.value.application.status,
        actorType: 'manager',
        actorId: managerId,
        payload: {
          projectId: project.id,
          releasedFlatId: resolved.value.releasedFlat?.id,
        },
      });
      this.logger.info(
        { applicationId, approve, toState: resolved.value.application.status },
        'Withdrawal resolved',
      );

      return this.persist(resolved.value.application, { applicationId });
    });
  }

  async listApplications(filters: ApplicationFilters = {}): Promise<Result<ApplicationRecord[]>> {
    const applications = filters.projectId
      ? await this.applications.listByProject(filters.projectId)
      : await this.applications.list();
    const applicants = new Map((await this.users.list()).map((user) => [user.nric, user]));
    return ok(filterApplications(applications, applicants, filters));
  }

  async getApplicantOverview(applicantId: string): Promise<Result<ApplicantOverview>> {
    const applicant = await this.users.findById(applicantId);
    if (!applicant) return notFound('User', applicantId);

    const applications = await this.applications.listByApplicant(applicantId);
    const activeApplication = applications.find((application) => isActive(application.status)) ?? null;
    const bookedFlat = activeApplication?.bookedFlatId
      ? await this.flats.findById(activeApplication.bookedFlatId)
      : null;

    return ok({ applicant, activeApplication, bookedFlat, applications });
  }

  // ==================== Officer registrations ====================

  async registerOfficer(officerId: string, projectId: string): Promise<Result<OfficerRegistrationRecord>> {
    return this.lock.run([projectKey(projectId), userKey(officerId)], async () => {
      const officer = await this.users.findById(officerId);
      if (!officer) return notFound('User', officerId);
      const project = await this.projects.findById(projectId);
      if (!project) return notFound('Project', projectId);

      if (officer.role === 'manager') {
        return fail('ConflictingRole', `Manager ${officerId} cannot register as an officer`, { role: officer.role });
      }

      const allowed = canRegister(officer, project, {
        registrations: await this.registrations.listByOfficer(officerId),
        applications: await this.applications.listByApplicant(officerId),
        projects: await this.projectMap(),
      });
      if (!allowed.ok) {
        this.logRejected('registerOfficer', allowed.error.kind, { officerId, projectId });
        return allowed;
      }

      const registration = createRegistration(officerId, projectId, this.clock.now());
      await this.registrations.save(registration);
      await this.recordAudit({
        entityId: registrationEntityId(registration),
        action: 'officer_registered',
        toState: registration.status,
        actorType: 'officer',
        actorId: officerId,
        payload: { projectId },
      });
      this.logger.info({ officerId, projectId }, 'Officer registration submitted');

      return this.persist(registration, { officerId, projectId });
    });
  }

  async decideRegistration(
    officerId: string,
    projectId: string,
    approve: boolean,
    managerId?: string,
  ): Promise<Result<OfficerRegistrationRecord>> {
    return this.lock.run([projectKey(projectId), userKey(officerId)], async () => {
      const registration = await this.registrations.find(officerId, projectId);
      if (!registration) return notFound('Registration', `${officerId}/${projectId}`);
      const project = await this.projects.findById(projectId);
      if (!project) return notFound('Project', projectId);

      const decided = decideRegistration(registration, project, approve, {
        registrations: await this.registrations.listByOfficer(officerId),
        projects: await this.projectMap(),
      });
      if (!decided.ok) {
        this.logRejected('decideRegistration', decided.error.kind, { officerId, projectId });
        return decided;
      }

      await this.projects.save(decided.value.project);
      await this.registrations.save(decided.value.registration);

      // An approved applicant takes on the officer role
      const officer = await this.users.findById(officerId);
      if (approve && officer && officer.role === 'applicant') {
        await this.users.save({ ...officer, role: 'officer' });
      }

      await this.recordAudit({
        entityId: registrationEntityId(registration),
        action: approve ? 'registration_approved' : 'registration_rejected',
        fromState: registration.status,
        toState: decided.value.registration.status,
        actorType: 'manager',
        actorId: managerId,
        payload: { projectId, officerCount: decided.value.project.officerIds.length },
      });
      this.logger.info({ officerId, projectId, approve }, 'Officer registration decided');

      return this.persist(decided.value.registration, { officerId, projectId });
    });
  }

  async listRegistrations(filters: RegistrationFilters = {}): Promise<Result<OfficerRegistrationRecord[]>> {
    const registrations = await this.registrations.list();
    return ok(
      registrations.filter(
        (registration) =>
          (!filters.officerId || registration.officerId === filters.officerId) &&
          (!filters.projectId || registration.projectId === filters.projectId) &&
          (!filters.status || registration.status === filters.status),
      ),
    );
  }

  // ==================== Projects ====================

  async createProject(managerId: string, draft: ProjectDraft): Promise<Result<ProjectRecord>> {
    // The manager key serialises the overlap check across that manager's projects
    return this.lock.run(userKey(managerId), async () => {
      const manager = await this.users.findById(managerId);
      if (!manager) return notFound('User', managerId);
      if (manager.role !== 'manager') {
        return fail('ValidationFailed', `User ${managerId} is not a manager`, { role: manager.role });
      }

      const created = createProjectRecord(draft, managerId, await this.projects.list(), this.config.projectLimits());
      if (!created.ok) {
        this.logRejected('createProject', created.error.kind, { managerId, name: draft.name });
        return created;
      }

      const project = created.value;
      await this.projects.save(project);
      await this.recordAudit({
        entityId: project.id,
        action: 'project_created',
        actorType: 'manager',
        actorId: managerId,
        payload: { name: project.name, inventory: project.inventory },
      });
      this.logger.info({ projectId: project.id, managerId }, 'Project created');

      return this.persist(project, { projectId: project.id });
    });
  }

  async updateProject(projectId: string, changes: ProjectChanges): Promise<Result<ProjectRecord>> {
    const current = await this.projects.findById(projectId);
    if (!current) return notFound('Project', projectId);

    return this.lock.run([projectKey(projectId), userKey(current.managerId)], async () => {
      const project = await this.projects.findById(projectId);
      if (!project) return notFound('Project', projectId);

      const updated = applyProjectChanges(project, changes, await this.projects.list(), this.config.projectLimits());
      if (!updated.ok) {
        this.logRejected('updateProject', updated.error.kind, { projectId });
        return updated;
      }

      const next = updated.value;
      if (changes.openDate || changes.closeDate) {
        const rosterRegistrations = (await this.registrations.list()).filter((registration) =>
          next.officerIds.includes(registration.officerId),
        );
        const roster = checkRosterWindows(next, {
          registrations: rosterRegistrations,
          projects: await this.projectMap(),
        });
        if (!roster.ok) {
          this.logRejected('updateProject', roster.error.kind, { projectId });
          return roster;
        }
      }

      await this.projects.save(next);
      await this.recordAudit({
        entityId: projectId,
        action: 'project_updated',
        actorType: 'manager',
        actorId: project.managerId,
        payload: { changes: describeChanges(changes) },
      });
      this.logger.info({ projectId }, 'Project updated');

      return this.persist(next, { projectId });
    });
  }

  async setProjectVisibility(projectId: string, visible: boolean): Promise<Result<ProjectRecord>> {
    return this.lock.run(projectKey(projectId), async () => {
      const project = await this.projects.findById(projectId);
      if (!project) return notFound('Project', projectId);

      const updated: ProjectRecord = { ...project, visible };
      await this.projects.save(updated);
      await this.recordAudit({
        entityId: projectId,
        action: visible ? 'project_shown' : 'project_hidden',
        fromState: project.visible ? 'visible' : 'hidden',
        toState: visible ? 'visible' : 'hidden',
        actorType: 'manager',
        actorId: project.managerId,
      });
      this.logger.info({ projectId, visible }, 'Project visibility changed');

      return this.persist(updated, { projectId });
    });
  }

  /**
   * Projects the user may see: managers see everything, officers also see the
   * projects they handle, and everyone sees visible projects they are eligible
   * for or have already applied to.
   */
  async listProjectsForUser(userId: string, filters: ProjectFilters = {}): Promise<Result<ProjectRecord[]>> {
    const user = await this.users.findById(userId);
    if (!user) return notFound('User', userId);

    const projects = await this.projects.list();
    if (user.role === 'manager') {
      return ok(filterProjects(projects, filters));
    }

    const rules = this.config.eligibility();
    const appliedTo = new Set((await this.applications.listByApplicant(userId)).map((a) => a.projectId));
    const visible = projects.filter(
      (project) =>
        (user.role === 'officer' && project.officerIds.includes(userId)) ||
        appliedTo.has(project.id) ||
        (project.visible && eligibleFlatTypes(user, project, { rules }).length > 0),
    );

    return ok(filterProjects(visible, filters));
  }

  // ==================== Audit / persistence ====================

  async auditTrail(entityId?: string): Promise<Result<AuditEntry[]>> {
    return ok(entityId ? await this.audit.listFor(entityId) : await this.audit.list());
  }

  // Retries a save that failed after an earlier commit
  async flush(): Promise<Result<void>> {
    return this.persist(undefined, { operation: 'flush' });
  }

  // ==================== Helpers ====================

  private async withApplicationProject<T>(
    applicationId: string,
    task: (application: ApplicationRecord, project: ProjectRecord) => Promise<Result<T>>,
  ): Promise<Result<T>> {
    const located = await this.applications.findById(applicationId);
    if (!located) return notFound('Application', applicationId);

    return this.lock.run(projectKey(located.projectId), async () => {
      // Re-read under the lock; another transition may have committed meanwhile
      const application = await this.applications.findById(applicationId);
      if (!application) return notFound('Application', applicationId);
      const project = await this.projects.findById(application.projectId);
      if (!project) return notFound('Project', application.projectId);
      return task(application, project);
    });
  }

  private async commitInventory(project: ProjectRecord, inventory: ProjectRecord['inventory']): Promise<void> {
    await this.projects.save({ ...project, inventory });
  }

  private async projectMap(): Promise<Map<string, ProjectRecord>> {
    return new Map((await this.projects.list()).map((project) => [project.id, project]));
  }

  private async recordAudit(entry: {
    entityId: string;
    action: string;
    fromState?: string;
    toState?: string;
    actorType: ActorType;
    actorId?: string;
    payload?: Record<string, unknown>;
  }): Promise<void> {
    await this.audit.record({ ...entry, timestamp: this.clock.now() });
  }

  private logRejected(operation: string, kind: string, context: Record<string, unknown>): void {
    this.logger.debug({ operation, kind, ...context }, 'Operation rejected');
  }

  private async persist<T>(value: T, context: Record<string, unknown>): Promise<Result<T>> {
    try {
      await this.persistence.saveAll();
      return ok(value);
    } catch (error) {
      this.logger.error({ err: error, ...context }, 'Failed to persist committed state');
      const message = error instanceof Error ? error.message : String(error);
      return fail('PersistenceFailed', `Change applied but not saved: ${message}`, context);
    }
  }
}

const registrationEntityId = (registration: OfficerRegistrationRecord): string =>
  `${registration.officerId}/${registration.projectId}`;

const describeChanges = (changes: ProjectChanges): Record<string, unknown> => ({
  ...changes,
  openDate: changes.openDate?.toISOString(),
  closeDate: changes.closeDate?.toISOString(),
});
