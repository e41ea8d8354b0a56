import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { AllocationCoordinator } from '../../core/application/orchestrator/AllocationCoordinator';
import type { PersistencePort, ReservationPoint } from '../../core/ports';
import { ConfigImpl } from '../../infra/services/Config';
import { createInMemoryRepositories, type InMemoryRepositories } from '../../infra/services/inMemoryRepositories';
import {
  NOW,
  buildApplication,
  buildProject,
  buildRegistration,
  buildUser,
  createMockLogger,
  type MockedLogger,
} from '../helpers/builders';

type MockedPersistence = {
  [K in keyof PersistencePort]: Mock;
};

const ALICE = 'S1234567A';
const BOB = 'T7654321B';
const OFFICER = 'T2109876D';
const MANAGER = 'T8765432F';

describe('AllocationCoordinator', () => {
  let repositories: InMemoryRepositories;
  let persistence: MockedPersistence;
  let logger: MockedLogger;
  let coordinator: AllocationCoordinator;

  const build = (reservationPoint: ReservationPoint = 'approval') => {
    let sequence = 0;
    coordinator = new AllocationCoordinator({
      ...repositories,
      persistence,
      config: ConfigImpl.fromInput({ allocation: { reservationPoint } }),
      logger,
      clock: { now: () => NOW },
      idGenerator: () => `app-${++sequence}`,
    });
  };

  const inventoryOf = async (projectId: string) => (await repositories.projects.findById(projectId))?.inventory;

  const assignOfficer = async (projectId: string, officerId: string) => {
    const project = await repositories.projects.findById(projectId);
    if (project) await repositories.projects.save({ ...project, officerIds: [...project.officerIds, officerId] });
  };

  beforeEach(async () => {
    repositories = createInMemoryRepositories();
    persistence = {
      loadAll: vi.fn().mockResolvedValue(undefined),
      saveAll: vi.fn().mockResolvedValue(undefined),
    };
    logger = createMockLogger();

    await repositories.users.save(buildUser({ nric: ALICE, name: 'Alice' }));
    await repositories.users.save(buildUser({ nric: BOB, name: 'Bob' }));
    await repositories.users.save(buildUser({ nric: 'S9876543C', name: 'Carol', age: 30, maritalStatus: 'MARRIED' }));
    await repositories.users.save(buildUser({ nric: OFFICER, name: 'Oliver', role: 'officer' }));
    await repositories.users.save(buildUser({ nric: MANAGER, name: 'Mandy', role: 'manager' }));
    await repositories.projects.save(buildProject({ inventory: { TWO_ROOM: { total: 1, available: 1 } } }));

    build();
  });

  describe('single unit contested by two applicants', () => {
    it('reserves at approval and returns the unit on withdrawal', async () => {
      await assignOfficer('ACA001', OFFICER);
      expect((await coordinator.apply(ALICE, 'ACA001')).ok).toBe(true);

      const first = await coordinator.decideApplication('app-1', true, MANAGER);
      expect(first.ok && first.value.status).toBe('SUCCESSFUL');
      expect(await inventoryOf('ACA001')).toEqual({ TWO_ROOM: { total: 1, available: 0 } });

      // The sold-out type still takes the late application; approval then overrides it
      const late = await coordinator.apply(BOB, 'ACA001');
      expect(late.ok && late.value).toMatchObject({ id: 'app-2', status: 'PENDING', flatType: 'TWO_ROOM' });

      const second = await coordinator.decideApplication('app-2', true, MANAGER);
      expect(second.ok && second.value.status).toBe('UNSUCCESSFUL');
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ applicationId: 'app-2' }),
        'Approval overridden: no units available',
      );

      const receipt = await coordinator.bookFlat('app-1', undefined, OFFICER);
      expect(receipt).toEqual({
        ok: true,
        value: {
          id: 'REC-app-1',
          applicationId: 'app-1',
          applicantId: ALICE,
          projectId: 'ACA001',
          flatId: 'F-ACA001-2R-1',
          flatType: 'TWO_ROOM',
          officerId: OFFICER,
          generatedAt: NOW,
        },
      });
      expect(await inventoryOf('ACA001')).toEqual({ TWO_ROOM: { total: 1, available: 0 } });

      expect((await coordinator.requestWithdrawal('app-1')).ok).toBe(true);
      const withdrawn = await coordinator.resolveWithdrawal('app-1', true, MANAGER);

      expect(withdrawn.ok && withdrawn.value.status).toBe('UNSUCCESSFUL');
      expect(await inventoryOf('ACA001')).toEqual({ TWO_ROOM: { total: 1, available: 1 } });
      expect(await repositories.flats.findById('F-ACA001-2R-1')).toEqual({
        id: 'F-ACA001-2R-1',
        projectId: 'ACA001',
        flatType: 'TWO_ROOM',
      });
    });

    it('reserves at booking when configured to', async () => {
      build('booking');
      await coordinator.apply(ALICE, 'ACA001');
      await coordinator.apply(BOB, 'ACA001');

      await coordinator.decideApplication('app-1', true, MANAGER);
      const second = await coordinator.decideApplication('app-2', true, MANAGER);
      expect(second.ok && second.value.status).toBe('SUCCESSFUL');
      expect(await inventoryOf('ACA001')).toEqual({ TWO_ROOM: { total: 1, available: 1 } });

      expect((await coordinator.bookFlat('app-1')).ok).toBe(true);
      expect(await inventoryOf('ACA001')).toEqual({ TWO_ROOM: { total: 1, available: 0 } });

      const late = await coordinator.bookFlat('app-2');
      expect(late.ok).toBe(false);
      if (late.ok) return;
      expect(late.error.kind).toBe('NoUnitsAvailable');
    });

    it('approves exactly one of two concurrent decisions', async () => {
      await coordinator.apply(ALICE, 'ACA001');
      await coordinator.apply(BOB, 'ACA001');

      const results = await Promise.all([
        coordinator.decideApplication('app-1', true),
        coordinator.decideApplication('app-2', true),
      ]);

      const statuses = results.map((result) => (result.ok ? result.value.status : result.error.kind)).sort();
      expect(statuses).toEqual(['SUCCESSFUL', 'UNSUCCESSFUL']);
      expect(await inventoryOf('ACA001')).toEqual({ TWO_ROOM: { total: 1, available: 0 } });
    });
  });

  describe('apply', () => {
    it('records an audit entry and saves', async () => {
      await coordinator.apply(ALICE, 'ACA001');

      const trail = await coordinator.auditTrail('app-1');
      expect(trail).toEqual({
        ok: true,
        value: [
          {
            timestamp: NOW,
            entityId: 'app-1',
            action: 'application_submitted',
            toState: 'PENDING',
            actorType: 'applicant',
            actorId: ALICE,
            payload: { projectId: 'ACA001', flatType: 'TWO_ROOM' },
          },
        ],
      });
      expect(persistence.saveAll).toHaveBeenCalledTimes(1);
    });

    it('returns NotFound for an unknown project', async () => {
      const result = await coordinator.apply(ALICE, 'NOPE01');

      expect(result).toEqual({
        ok: false,
        error: { kind: 'NotFound', message: 'Project NOPE01 not found', details: { entity: 'Project', id: 'NOPE01' } },
      });
      expect(persistence.saveAll).not.toHaveBeenCalled();
    });

    it('refuses managers', async () => {
      const result = await coordinator.apply(MANAGER, 'ACA001');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('ConflictingRole');
    });

    it('allows one active application across concurrent submissions', async () => {
      await repositories.projects.save(
        buildProject({ id: 'MAP001', name: 'Maple Heights', managerId: 'S5678901G' }),
      );

      const results = await Promise.all([coordinator.apply(ALICE, 'ACA001'), coordinator.apply(ALICE, 'MAP001')]);

      const kinds = results.map((result) => (result.ok ? 'ok' : result.error.kind)).sort();
      expect(kinds).toEqual(['AlreadyHasActiveApplication', 'ok']);
      expect(await repositories.applications.listByApplicant(ALICE)).toHaveLength(1);
    });

    it('keeps the change and reports PersistenceFailed when saving fails', async () => {
      persistence.saveAll.mockRejectedValueOnce(new Error('disk full'));

      const result = await coordinator.apply(ALICE, 'ACA001');

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'PersistenceFailed',
          message: 'Change applied but not saved: disk full',
          details: { applicationId: 'app-1' },
        },
      });
      expect((await repositories.applications.findById('app-1'))?.status).toBe('PENDING');
      expect(logger.error).toHaveBeenCalledTimes(1);

      expect(await coordinator.flush()).toEqual({ ok: true, value: undefined });
      expect(persistence.saveAll).toHaveBeenCalledTimes(2);
    });
  });

  describe('bookFlat', () => {
    beforeEach(async () => {
      await coordinator.apply(ALICE, 'ACA001');
      await coordinator.decideApplication('app-1', true, MANAGER);
    });

    it('refuses an unknown officer', async () => {
      const result = await coordinator.bookFlat('app-1', undefined, 'G0000000Z');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe('User G0000000Z not found');
      expect(await repositories.flats.list()).toEqual([]);
    });

    it('refuses an officer who does not handle the project', async () => {
      const result = await coordinator.bookFlat('app-1', undefined, OFFICER);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toEqual({
        kind: 'ConflictingRole',
        message: `Officer ${OFFICER} does not handle project ACA001`,
        details: { officerId: OFFICER, projectId: 'ACA001' },
      });
      expect((await repositories.applications.findById('app-1'))?.status).toBe('SUCCESSFUL');
    });

    it('books through an officer on the roster', async () => {
      await assignOfficer('ACA001', OFFICER);

      const result = await coordinator.bookFlat('app-1', undefined, OFFICER);

      expect(result.ok && result.value.officerId).toBe(OFFICER);
    });
  });

  describe('decisions and withdrawals', () => {
    it('returns NotFound for an unknown application', async () => {
      const result = await coordinator.decideApplication('missing', true);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe('Application missing not found');
    });

    it('restores the prior status when a withdrawal is rejected', async () => {
      await coordinator.apply(ALICE, 'ACA001');
      await coordinator.decideApplication('app-1', true, MANAGER);
      await coordinator.requestWithdrawal('app-1');

      const result = await coordinator.resolveWithdrawal('app-1', false, MANAGER);

      expect(result.ok && result.value.status).toBe('SUCCESSFUL');
      expect(await inventoryOf('ACA001')).toEqual({ TWO_ROOM: { total: 1, available: 0 } });
      const actions = (await repositories.audit.listFor('app-1')).map((entry) => entry.action);
      expect(actions).toEqual([
        'application_submitted',
        'application_approved',
        'withdrawal_requested',
        'withdrawal_rejected',
      ]);
    });

    it('releases the reservation when an unbooked withdrawal is approved', async () => {
      await coordinator.apply(ALICE, 'ACA001');
      await coordinator.decideApplication('app-1', true);
      await coordinator.requestWithdrawal('app-1');

      await coordinator.resolveWithdrawal('app-1', true);

      expect(await inventoryOf('ACA001')).toEqual({ TWO_ROOM: { total: 1, available: 1 } });
    });

    it('shows the active application and booked flat in the overview', async () => {
      await coordinator.apply(ALICE, 'ACA001');
      await coordinator.decideApplication('app-1', true);
      await coordinator.bookFlat('app-1');

      const overview = await coordinator.getApplicantOverview(ALICE);

      expect(overview.ok).toBe(true);
      if (!overview.ok) return;
      expect(overview.value.activeApplication?.status).toBe('BOOKED');
      expect(overview.value.bookedFlat?.id).toBe('F-ACA001-2R-1');
    });
  });

  describe('officer registration', () => {
    it('approves a registration and promotes the applicant', async () => {
      const registered = await coordinator.registerOfficer('S9876543C', 'ACA001');
      expect(registered.ok && registered.value.status).toBe('PENDING');

      const decided = await coordinator.decideRegistration('S9876543C', 'ACA001', true, MANAGER);

      expect(decided.ok && decided.value.status).toBe('APPROVED');
      expect((await repositories.projects.findById('ACA001'))?.officerIds).toEqual(['S9876543C']);
      expect((await repositories.users.findById('S9876543C'))?.role).toBe('officer');
      const actions = (await repositories.audit.listFor('S9876543C/ACA001')).map((entry) => entry.action);
      expect(actions).toEqual(['officer_registered', 'registration_approved']);
    });

    it('blocks applying to a project the user registered for', async () => {
      await coordinator.registerOfficer(OFFICER, 'ACA001');

      const result = await coordinator.apply(OFFICER, 'ACA001');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('ConflictingRole');
    });

    it('blocks registering for a project the user applied to', async () => {
      await coordinator.apply(OFFICER, 'ACA001');

      const result = await coordinator.registerOfficer(OFFICER, 'ACA001');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('ConflictingRole');
    });

    it('refuses managers', async () => {
      const result = await coordinator.registerOfficer(MANAGER, 'ACA001');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('ConflictingRole');
    });

    it('filters registrations by status', async () => {
      await coordinator.registerOfficer(OFFICER, 'ACA001');
      await coordinator.registerOfficer('S9876543C', 'ACA001');
      await coordinator.decideRegistration(OFFICER, 'ACA001', false);

      const pending = await coordinator.listRegistrations({ status: 'PENDING' });

      expect(pending.ok && pending.value.map((registration) => registration.officerId)).toEqual(['S9876543C']);
    });
  });

  describe('projects', () => {
    const draft = {
      name: 'Birch Park',
      neighborhood: 'Tampines',
      openDate: new Date(2027, 3, 1),
      closeDate: new Date(2027, 4, 31),
      officerSlots: 2,
      units: { THREE_ROOM: 4 },
    };

    it('creates a project for a manager', async () => {
      const result = await coordinator.createProject(MANAGER, draft);

      expect(result.ok && result.value.id).toBe('BIR001');
      expect((await repositories.audit.listFor('BIR001')).map((entry) => entry.action)).toEqual(['project_created']);
    });

    it('refuses project creation by a non-manager', async () => {
      const result = await coordinator.createProject(ALICE, draft);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('ValidationFailed');
    });

    it('refuses to shrink units below those held', async () => {
      await coordinator.apply(ALICE, 'ACA001');
      await coordinator.decideApplication('app-1', true);

      const result = await coordinator.updateProject('ACA001', { units: { TWO_ROOM: 0 } });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('InvalidInventory');
    });

    it('refuses to move dates onto another approved project of a rostered officer', async () => {
      await repositories.projects.save(
        buildProject({
          id: 'MAP001',
          name: 'Maple Heights',
          managerId: 'S5678901G',
          openDate: new Date(2027, 1, 1),
          closeDate: new Date(2027, 2, 31),
          officerIds: [OFFICER],
        }),
      );
      await repositories.registrations.save(buildRegistration({ officerId: OFFICER, projectId: 'MAP001', status: 'APPROVED' }));
      await repositories.registrations.save(buildRegistration({ officerId: OFFICER, projectId: 'ACA001', status: 'APPROVED' }));
      await assignOfficer('ACA001', OFFICER);

      const result = await coordinator.updateProject('ACA001', { closeDate: new Date(2027, 1, 15) });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('OverlappingAssignment');
      expect(result.error.details).toEqual({ officerId: OFFICER, projectId: 'MAP001' });
      expect((await repositories.projects.findById('ACA001'))?.closeDate).toEqual(new Date(2026, 11, 31));
    });

    it('allows moving dates that stay clear of rostered officers', async () => {
      await repositories.registrations.save(buildRegistration({ officerId: OFFICER, projectId: 'ACA001', status: 'APPROVED' }));
      await assignOfficer('ACA001', OFFICER);

      const result = await coordinator.updateProject('ACA001', { closeDate: new Date(2027, 0, 15) });

      expect(result.ok && result.value.closeDate).toEqual(new Date(2027, 0, 15));
    });

    it('hides a project and records the change', async () => {
      const result = await coordinator.setProjectVisibility('ACA001', false);

      expect(result.ok && result.value.visible).toBe(false);
      const trail = await coordinator.auditTrail('ACA001');
      expect(trail.ok && trail.value[0]).toMatchObject({
        action: 'project_hidden',
        fromState: 'visible',
        toState: 'hidden',
        actorId: MANAGER,
      });
    });
  });

  describe('listProjectsForUser', () => {
    beforeEach(async () => {
      await repositories.projects.save(buildProject({ id: 'HID001', name: 'Hidden Hill', visible: false }));
      await repositories.projects.save(
        buildProject({ id: 'THR001', name: 'Three Oaks', inventory: { THREE_ROOM: { total: 2, available: 2 } } }),
      );
    });

    it('shows managers every project', async () => {
      const result = await coordinator.listProjectsForUser(MANAGER);

      expect(result.ok && result.value.map((project) => project.id)).toEqual(['ACA001', 'HID001', 'THR001']);
    });

    it('shows applicants visible projects they are eligible for', async () => {
      const result = await coordinator.listProjectsForUser(ALICE);

      expect(result.ok && result.value.map((project) => project.id)).toEqual(['ACA001']);
    });

    it('keeps projects the applicant already applied to', async () => {
      await repositories.applications.save(buildApplication({ projectId: 'HID001' }));

      const result = await coordinator.listProjectsForUser(ALICE);

      expect(result.ok && result.value.map((project) => project.id)).toEqual(['ACA001', 'HID001']);
    });

    it('shows officers the projects they handle', async () => {
      const hidden = await repositories.projects.findById('HID001');
      if (hidden) await repositories.projects.save({ ...hidden, officerIds: [OFFICER] });

      const result = await coordinator.listProjectsForUser(OFFICER);

      expect(result.ok && result.value.map((project) => project.id)).toEqual(['ACA001', 'HID001']);
    });
  });
});
