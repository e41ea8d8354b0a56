import { describe, it, expect } from 'vitest';
import {
  bookFlat,
  decideApplication,
  formatFlatId,
  requestWithdrawal,
  resolveWithdrawal,
  submitApplication,
  type SubmitInput,
} from '../../core/domain/applicationStateMachine';
import { NOW, buildApplication, buildFlat, buildProject, buildUser } from '../helpers/builders';

const submitInput = (overrides: Partial<SubmitInput> = {}): SubmitInput => ({
  id: 'app-new',
  applicant: buildUser(),
  project: buildProject(),
  existingApplications: [],
  registeredAsOfficer: false,
  now: NOW,
  ...overrides,
});

describe('application state machine', () => {
  describe('submitApplication', () => {
    it('creates a PENDING application stamped with the current time', () => {
      const result = submitApplication(submitInput());

      expect(result).toEqual({
        ok: true,
        value: {
          id: 'app-new',
          applicantId: 'S1234567A',
          projectId: 'ACA001',
          flatType: 'TWO_ROOM',
          status: 'PENDING',
          appliedAt: NOW,
          statusUpdatedAt: NOW,
        },
      });
    });

    it('defaults a married applicant to the 3-Room type', () => {
      const result = submitApplication(submitInput({ applicant: buildUser({ maritalStatus: 'MARRIED', age: 30 }) }));

      expect(result.ok && result.value.flatType).toBe('THREE_ROOM');
    });

    it('honours a requested type within the eligible set', () => {
      const result = submitApplication(
        submitInput({ applicant: buildUser({ maritalStatus: 'MARRIED', age: 30 }), requestedType: 'TWO_ROOM' }),
      );

      expect(result.ok && result.value.flatType).toBe('TWO_ROOM');
    });

    it.each(['PENDING', 'SUCCESSFUL', 'BOOKED', 'WITHDRAWAL_REQUESTED'] as const)(
      'rejects a second application while one is %s',
      (status) => {
        const result = submitApplication(
          submitInput({ existingApplications: [buildApplication({ id: 'app-old', status, projectId: 'MAP001' })] }),
        );

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe('AlreadyHasActiveApplication');
        expect(result.error.details).toEqual({ applicationId: 'app-old', status });
      },
    );

    it('allows a new application after an unsuccessful one', () => {
      const result = submitApplication(
        submitInput({ existingApplications: [buildApplication({ status: 'UNSUCCESSFUL' })] }),
      );

      expect(result.ok).toBe(true);
    });

    it('rejects an officer registered for the same project', () => {
      const result = submitApplication(submitInput({ registeredAsOfficer: true }));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('ConflictingRole');
    });

    it('rejects an applicant eligible for nothing', () => {
      const result = submitApplication(submitInput({ applicant: buildUser({ age: 34 }) }));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('NotEligible');
      expect(result.error.message).toBe('Applicant S1234567A is not eligible for any flat type in ACA001');
    });

    it('accepts a sold-out type and leaves availability to the decision', () => {
      const soldOut = buildProject({ inventory: { TWO_ROOM: { total: 1, available: 0 } } });

      const result = submitApplication(submitInput({ project: soldOut }));

      expect(result.ok && result.value).toMatchObject({ status: 'PENDING', flatType: 'TWO_ROOM' });
    });

    it('prefers a type that still has units when none was requested', () => {
      const project = buildProject({
        inventory: { TWO_ROOM: { total: 2, available: 1 }, THREE_ROOM: { total: 1, available: 0 } },
      });

      const result = submitApplication(
        submitInput({ project, applicant: buildUser({ maritalStatus: 'MARRIED', age: 30 }) }),
      );

      expect(result.ok && result.value.flatType).toBe('TWO_ROOM');
    });

    it('rejects a type the project does not offer', () => {
      const project = buildProject({ inventory: { THREE_ROOM: { total: 2, available: 2 } } });

      const result = submitApplication(submitInput({ project }));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('NotEligible');
    });

    it('rejects a requested type outside the eligible set', () => {
      const result = submitApplication(submitInput({ requestedType: 'THREE_ROOM' }));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('NotEligible');
      expect(result.error.message).toBe('Applicant S1234567A is not eligible for a 3-Room flat in ACA001');
    });

    it('rejects outside the application window', () => {
      const result = submitApplication(submitInput({ now: new Date(2027, 0, 1, 0, 0, 1) }));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('ProjectNotOpen');
    });

    it('accepts applications until the end of the closing day', () => {
      const project = buildProject({ closeDate: new Date(2026, 9, 15) });
      const result = submitApplication(submitInput({ project, now: new Date(2026, 9, 15, 23, 30) }));

      expect(result.ok).toBe(true);
    });

    it('rejects a hidden project', () => {
      const result = submitApplication(submitInput({ project: buildProject({ visible: false }) }));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('ProjectNotVisible');
    });
  });

  describe('decideApplication', () => {
    const project = buildProject({ inventory: { TWO_ROOM: { total: 1, available: 1 } } });

    it('reserves a unit on approval when reserving at approval', () => {
      const result = decideApplication(buildApplication(), project, true, NOW, 'approval');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.outcome).toBe('approved');
      expect(result.value.application.status).toBe('SUCCESSFUL');
      expect(result.value.application.statusUpdatedAt).toBe(NOW);
      expect(result.value.inventory).toEqual({ TWO_ROOM: { total: 1, available: 0 } });
    });

    it('forces UNSUCCESSFUL when no units remain and leaves inventory unchanged', () => {
      const soldOut = buildProject({ inventory: { TWO_ROOM: { total: 1, available: 0 } } });

      const result = decideApplication(buildApplication(), soldOut, true, NOW, 'approval');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.outcome).toBe('exhausted');
      expect(result.value.application.status).toBe('UNSUCCESSFUL');
      expect(result.value.inventory).toEqual({ TWO_ROOM: { total: 1, available: 0 } });
    });

    it('rejects without touching inventory', () => {
      const result = decideApplication(buildApplication(), project, false, NOW, 'approval');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.outcome).toBe('rejected');
      expect(result.value.application.status).toBe('UNSUCCESSFUL');
      expect(result.value.inventory).toEqual({ TWO_ROOM: { total: 1, available: 1 } });
    });

    it('only reads availability when reserving at booking', () => {
      const result = decideApplication(buildApplication(), project, true, NOW, 'booking');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.application.status).toBe('SUCCESSFUL');
      expect(result.value.inventory).toEqual({ TWO_ROOM: { total: 1, available: 1 } });
    });

    it('is only legal in PENDING', () => {
      const result = decideApplication(buildApplication({ status: 'SUCCESSFUL' }), project, true, NOW, 'approval');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('InvalidTransition');
      expect(result.error.message).toBe('Cannot approve application app-1 in status SUCCESSFUL');
    });
  });

  describe('bookFlat', () => {
    const applicant = buildUser({ maritalStatus: 'MARRIED', age: 30 });
    // One 2-Room unit already reserved at approval
    const project = buildProject({
      inventory: {
        TWO_ROOM: { total: 2, available: 1 },
        THREE_ROOM: { total: 1, available: 1 },
      },
    });
    const approved = buildApplication({ status: 'SUCCESSFUL' });

    it('consumes the reserved unit without another decrement', () => {
      const result = bookFlat({
        application: approved,
        applicant,
        project,
        chosenType: 'TWO_ROOM',
        flatSequence: 1,
        now: NOW,
        reservationPoint: 'approval',
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.flat).toEqual({
        id: 'F-ACA001-2R-1',
        projectId: 'ACA001',
        flatType: 'TWO_ROOM',
        applicationId: 'app-1',
      });
      expect(result.value.application.status).toBe('BOOKED');
      expect(result.value.application.bookedFlatId).toBe('F-ACA001-2R-1');
      expect(result.value.inventory).toEqual(project.inventory);
    });

    it('swaps the reservation when booking a different eligible type', () => {
      const result = bookFlat({
        application: approved,
        applicant,
        project,
        chosenType: 'THREE_ROOM',
        flatSequence: 4,
        now: NOW,
        reservationPoint: 'approval',
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.flat.id).toBe('F-ACA001-3R-4');
      expect(result.value.application.flatType).toBe('THREE_ROOM');
      expect(result.value.inventory).toEqual({
        TWO_ROOM: { total: 2, available: 2 },
        THREE_ROOM: { total: 1, available: 0 },
      });
    });

    it('decrements at booking when reserving at booking', () => {
      const fresh = buildProject({ inventory: { TWO_ROOM: { total: 2, available: 2 } } });

      const result = bookFlat({
        application: approved,
        applicant,
        project: fresh,
        chosenType: 'TWO_ROOM',
        flatSequence: 1,
        now: NOW,
        reservationPoint: 'booking',
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.inventory).toEqual({ TWO_ROOM: { total: 2, available: 1 } });
    });

    it('fails with NoUnitsAvailable when reserving at booking and none remain', () => {
      const soldOut = buildProject({ inventory: { TWO_ROOM: { total: 1, available: 0 } } });

      const result = bookFlat({
        application: approved,
        applicant,
        project: soldOut,
        chosenType: 'TWO_ROOM',
        flatSequence: 2,
        now: NOW,
        reservationPoint: 'booking',
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('NoUnitsAvailable');
    });

    it('fails when no unit is held for the approved type', () => {
      const untouched = buildProject({ inventory: { TWO_ROOM: { total: 1, available: 1 } } });

      const result = bookFlat({
        application: approved,
        applicant,
        project: untouched,
        chosenType: 'TWO_ROOM',
        flatSequence: 1,
        now: NOW,
        reservationPoint: 'approval',
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('NoUnitsAvailable');
    });

    it('re-validates eligibility for the chosen type', () => {
      const result = bookFlat({
        application: approved,
        applicant: buildUser({ age: 40 }),
        project,
        chosenType: 'THREE_ROOM',
        flatSequence: 1,
        now: NOW,
        reservationPoint: 'approval',
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('NotEligible');
    });

    it('rejects double booking', () => {
      const result = bookFlat({
        application: buildApplication({ status: 'BOOKED', bookedFlatId: 'F-ACA001-2R-1' }),
        applicant,
        project,
        chosenType: 'TWO_ROOM',
        flatSequence: 2,
        now: NOW,
        reservationPoint: 'approval',
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('InvalidTransition');
    });
  });

  describe('requestWithdrawal', () => {
    it.each(['PENDING', 'SUCCESSFUL', 'BOOKED'] as const)('records the prior status from %s', (status) => {
      const result = requestWithdrawal(buildApplication({ status }), NOW);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.status).toBe('WITHDRAWAL_REQUESTED');
      expect(result.value.statusBeforeWithdrawal).toBe(status);
      expect(result.value.statusUpdatedAt).toBe(NOW);
    });

    it.each(['UNSUCCESSFUL', 'WITHDRAWAL_REQUESTED'] as const)('is illegal from %s', (status) => {
      const result = requestWithdrawal(buildApplication({ status }), NOW);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('InvalidTransition');
    });
  });

  describe('resolveWithdrawal', () => {
    const bookedProject = buildProject({ inventory: { TWO_ROOM: { total: 2, available: 0 } } });
    const bookedRequest = buildApplication({
      status: 'WITHDRAWAL_REQUESTED',
      statusBeforeWithdrawal: 'BOOKED',
      bookedFlatId: 'F-ACA001-2R-1',
    });

    it('releases exactly one unit of the booked type and unlinks the flat', () => {
      const result = resolveWithdrawal(bookedRequest, bookedProject, buildFlat(), true, NOW, 'approval');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.inventory).toEqual({ TWO_ROOM: { total: 2, available: 1 } });
      expect(result.value.releasedFlat).toEqual({ id: 'F-ACA001-2R-1', projectId: 'ACA001', flatType: 'TWO_ROOM' });
      expect(result.value.application.status).toBe('UNSUCCESSFUL');
      expect(result.value.application.bookedFlatId).toBeUndefined();
      expect(result.value.application.statusBeforeWithdrawal).toBeUndefined();
    });

    it('releases the approval-time reservation of an unbooked application', () => {
      const request = buildApplication({ status: 'WITHDRAWAL_REQUESTED', statusBeforeWithdrawal: 'SUCCESSFUL' });

      const result = resolveWithdrawal(request, bookedProject, null, true, NOW, 'approval');

      expect(result.ok && result.value.inventory).toEqual({ TWO_ROOM: { total: 2, available: 1 } });
    });

    it('leaves inventory alone for an unbooked application when reserving at booking', () => {
      const request = buildApplication({ status: 'WITHDRAWAL_REQUESTED', statusBeforeWithdrawal: 'SUCCESSFUL' });

      const result = resolveWithdrawal(request, bookedProject, null, true, NOW, 'booking');

      expect(result.ok && result.value.inventory).toEqual({ TWO_ROOM: { total: 2, available: 0 } });
    });

    it('leaves inventory alone when the application was still pending', () => {
      const request = buildApplication({ status: 'WITHDRAWAL_REQUESTED', statusBeforeWithdrawal: 'PENDING' });

      const result = resolveWithdrawal(request, bookedProject, null, true, NOW, 'approval');

      expect(result.ok && result.value.inventory).toEqual({ TWO_ROOM: { total: 2, available: 0 } });
    });

    it('restores the stored prior status on rejection', () => {
      const request = buildApplication({ status: 'WITHDRAWAL_REQUESTED', statusBeforeWithdrawal: 'PENDING' });

      const result = resolveWithdrawal(request, bookedProject, null, false, NOW, 'approval');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.application.status).toBe('PENDING');
      expect(result.value.application.statusBeforeWithdrawal).toBeUndefined();
      expect(result.value.inventory).toEqual(bookedProject.inventory);
    });

    it('falls back to booked-flat presence when no prior status was stored', () => {
      const { statusBeforeWithdrawal: _prior, ...legacy } = bookedRequest;

      const booked = resolveWithdrawal(legacy, bookedProject, buildFlat(), false, NOW, 'approval');
      const unbooked = resolveWithdrawal(
        buildApplication({ status: 'WITHDRAWAL_REQUESTED' }),
        bookedProject,
        null,
        false,
        NOW,
        'approval',
      );

      expect(booked.ok && booked.value.application.status).toBe('BOOKED');
      expect(booked.ok && booked.value.application.bookedFlatId).toBe('F-ACA001-2R-1');
      expect(unbooked.ok && unbooked.value.application.status).toBe('SUCCESSFUL');
    });

    it('is only legal in WITHDRAWAL_REQUESTED', () => {
      const result = resolveWithdrawal(buildApplication({ status: 'BOOKED' }), bookedProject, null, true, NOW, 'approval');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('InvalidTransition');
    });
  });

  it('formatFlatId encodes project, type and sequence', () => {
    expect(formatFlatId('MAP001', 'THREE_ROOM', 12)).toBe('F-MAP001-3R-12');
  });
});
