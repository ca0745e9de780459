import { describe, it, expect, beforeEach } from 'vitest';
import {
  buildTestContainer,
  errorCode,
  expectOk,
  sessionFor,
  sessions,
  TODAY,
  type TestContainer,
} from '../fixtures';

describe('ApplicationOrchestrator', () => {
  let app: TestContainer;

  beforeEach(async () => {
    app = await buildTestContainer();
  });

  const projectIds = (projects: { id: number }[]) => projects.map((project) => project.id);

  // Cara applies for Cedar Heights and Irene approves it
  async function successfulApplication(flatType: '2-Room' | '3-Room' = '3-Room') {
    const application = expectOk(await app.workflow.applications.apply(sessions.cara, 1, flatType));
    expectOk(await app.workflow.applications.approveApplication(sessions.irene, application.id));
    return application;
  }

  describe('listProjects', () => {
    it('shows applicants only projects with units in a flat type they may take', async () => {
      expect(projectIds(expectOk(await app.workflow.applications.listProjects(sessions.alicia)))).toEqual([1]);
      expect(projectIds(expectOk(await app.workflow.applications.listProjects(sessions.cara)))).toEqual([1, 2]);
      expect(expectOk(await app.workflow.applications.listProjects(sessions.bryan))).toEqual([]);
    });

    it('shows managers every project, hidden ones included', async () => {
      await app.repositories.projects.toggleVisibility(2, false);

      expect(projectIds(expectOk(await app.workflow.applications.listProjects(sessions.irene)))).toEqual([1, 2]);
      expect(projectIds(expectOk(await app.workflow.applications.listProjects(sessions.cara)))).toEqual([1]);
    });

    it('applies the applicant filter to officers too', async () => {
      expect(projectIds(expectOk(await app.workflow.applications.listProjects(sessions.gavin)))).toEqual([1]);
    });
  });

  describe('apply', () => {
    it('creates a pending application', async () => {
      const application = expectOk(await app.workflow.applications.apply(sessions.cara, 1, '3-Room'));

      expect(application).toEqual({
        id: 1,
        applicantId: 'S0000003C',
        projectId: 1,
        flatType: '3-Room',
        status: 'pending',
        withdrawalRequested: false,
        createdAt: TODAY,
        updatedAt: TODAY,
      });
      expect(app.logger.info).toHaveBeenCalledWith(
        { applicationId: 1, applicantId: 'S0000003C', projectId: 1, flatType: '3-Room' },
        'Application submitted',
      );
    });

    it('refuses a married applicant under 21 without creating anything', async () => {
      const result = await app.workflow.applications.apply(sessions.daniel, 1, '2-Room');

      expect(result).toEqual({
        ok: false,
        error: { code: 'EligibilityDenied', message: 'Daniel Ho is not eligible to apply for any flat type' },
      });
      expect(await app.repositories.applications.list()).toEqual([]);
      expect(app.logger.warn).toHaveBeenCalledWith(
        { operation: 'apply', userId: 'S0000004D', code: 'EligibilityDenied' },
        'Daniel Ho is not eligible to apply for any flat type',
      );
    });

    it('limits singles to 2-Room flats', async () => {
      const result = await app.workflow.applications.apply(sessions.alicia, 1, '3-Room');

      expect(result).toEqual({
        ok: false,
        error: { code: 'EligibilityDenied', message: 'Alicia Tan may only apply for 2-Room' },
      });
      expect(errorCode(await app.workflow.applications.apply(sessions.bryan, 1, '2-Room'))).toBe('EligibilityDenied');
    });

    it('refuses a second application while one is pending or successful', async () => {
      const first = expectOk(await app.workflow.applications.apply(sessions.cara, 1, '2-Room'));
      expect(errorCode(await app.workflow.applications.apply(sessions.cara, 2, '3-Room'))).toBe(
        'DuplicateActiveApplication',
      );

      expectOk(await app.workflow.applications.approveApplication(sessions.irene, first.id));
      expect(errorCode(await app.workflow.applications.apply(sessions.cara, 2, '3-Room'))).toBe(
        'DuplicateActiveApplication',
      );
    });

    it('accepts a new application once the previous one is unsuccessful', async () => {
      const first = expectOk(await app.workflow.applications.apply(sessions.cara, 1, '2-Room'));
      expectOk(await app.workflow.applications.rejectApplication(sessions.irene, first.id));

      const second = expectOk(await app.workflow.applications.apply(sessions.cara, 2, '3-Room'));

      expect(second.id).toBe(2);
      expect(second.status).toBe('pending');
    });

    it('accepts a new application once the previous one is booked', async () => {
      const first = await successfulApplication();
      expectOk(await app.workflow.applications.bookFlat(sessions.fiona, first.id));

      expect(expectOk(await app.workflow.applications.apply(sessions.cara, 2, '3-Room')).status).toBe('pending');
    });

    it('refuses a flat type with no units left', async () => {
      const result = await app.workflow.applications.apply(sessions.alicia, 2, '2-Room');

      expect(result).toEqual({
        ok: false,
        error: { code: 'UnitsExhausted', message: 'No 2-Room units available in Dahlia Vista' },
      });
    });

    it('treats unknown and hidden projects as not found', async () => {
      expect(errorCode(await app.workflow.applications.apply(sessions.cara, 99, '2-Room'))).toBe('NotFound');

      await app.repositories.projects.toggleVisibility(1, false);
      expect(errorCode(await app.workflow.applications.apply(sessions.cara, 1, '2-Room'))).toBe('NotFound');
    });

    it('refuses applications outside the application window', async () => {
      const late = await buildTestContainer({ clock: () => new Date(2027, 0, 4, 12, 0) });

      expect(errorCode(await late.workflow.applications.apply(sessions.cara, 1, '2-Room'))).toBe(
        'ApplicationWindowClosed',
      );
      // Dahlia Vista has no window, so it stays open
      expectOk(await late.workflow.applications.apply(sessions.cara, 2, '3-Room'));
    });

    it('refuses managers and stale sessions', async () => {
      expect(await app.workflow.applications.apply(sessions.irene, 1, '2-Room')).toEqual({
        ok: false,
        error: { code: 'AuthorizationDenied', message: 'Managers cannot act as applicants' },
      });
      expect(errorCode(await app.workflow.applications.apply(sessionFor('S0000003C', 'officer'), 1, '2-Room'))).toBe(
        'AuthorizationDenied',
      );
      expect(errorCode(await app.workflow.applications.apply(sessionFor('S9999999Z', 'applicant'), 1, '2-Room'))).toBe(
        'AuthorizationDenied',
      );
    });

    it('lets officers apply for a project they do not handle', async () => {
      const application = expectOk(await app.workflow.applications.apply(sessions.fiona, 2, '3-Room'));

      expect(application.applicantId).toBe('T0000001F');
    });

    it('lets only one of two simultaneous applications through', async () => {
      const results = await Promise.all([
        app.workflow.applications.apply(sessions.cara, 1, '2-Room'),
        app.workflow.applications.apply(sessions.cara, 2, '3-Room'),
      ]);

      expect(results.map((result) => result.ok)).toEqual([true, false]);
      expect(errorCode(results[1])).toBe('DuplicateActiveApplication');
      expect(await app.repositories.applications.listByApplicant('S0000003C')).toHaveLength(1);
    });
  });

  describe('viewStatus', () => {
    it('lists the caller applications with project names', async () => {
      const application = expectOk(await app.workflow.applications.apply(sessions.cara, 2, '3-Room'));

      expect(expectOk(await app.workflow.applications.viewStatus(sessions.cara))).toEqual([
        { application, projectName: 'Dahlia Vista' },
      ]);
      expect(expectOk(await app.workflow.applications.viewStatus(sessions.evan))).toEqual([]);
      expect(errorCode(await app.workflow.applications.viewStatus(sessions.irene))).toBe('AuthorizationDenied');
    });
  });

  describe('application decisions', () => {
    it('keeps units in stock on approval, withdrawal request and rejected withdrawal', async () => {
      const acacia = expectOk(
        await app.workflow.projects.createProject(sessions.irene, {
          name: 'Acacia',
          neighborhood: 'Yishun',
          flatTypes: { '2-Room': { units: 1, price: 200000 } },
          openDate: null,
          closeDate: null,
          officerSlots: 1,
        }),
      );

      const application = expectOk(await app.workflow.applications.apply(sessions.alicia, acacia.id, '2-Room'));
      expect(application.status).toBe('pending');

      expectOk(await app.workflow.applications.approveApplication(sessions.irene, application.id));
      expect(application.status).toBe('successful');
      expect(acacia.flatTypes['2-Room']?.units).toBe(1);

      expectOk(await app.workflow.applications.requestWithdrawal(sessions.alicia, application.id));
      expect(application.withdrawalRequested).toBe(true);
      expect(application.status).toBe('successful');

      expectOk(await app.workflow.applications.rejectWithdrawal(sessions.irene, application.id));
      expect(application.withdrawalRequested).toBe(false);
      expect(application.status).toBe('successful');
      expect(acacia.flatTypes['2-Room']?.units).toBe(1);
    });

    it('refuses approval when the flat type has no units, leaving the application pending', async () => {
      const cara = await successfulApplication();
      const evan = expectOk(await app.workflow.applications.apply(sessions.evan, 1, '3-Room'));
      expectOk(await app.workflow.applications.bookFlat(sessions.fiona, cara.id));

      const result = await app.workflow.applications.approveApplication(sessions.irene, evan.id);

      expect(result).toEqual({
        ok: false,
        error: { code: 'UnitsExhausted', message: 'No 3-Room units left in Cedar Heights' },
      });
      expect(evan.status).toBe('pending');
    });

    it('rejects a pending application', async () => {
      const application = expectOk(await app.workflow.applications.apply(sessions.cara, 1, '2-Room'));

      const rejected = expectOk(await app.workflow.applications.rejectApplication(sessions.irene, application.id));

      expect(rejected.status).toBe('unsuccessful');
      expect(app.logger.info).toHaveBeenCalledWith({ applicationId: 1, projectId: 1 }, 'Application rejected');
    });

    it('only lets the project manager decide', async () => {
      const application = expectOk(await app.workflow.applications.apply(sessions.cara, 1, '2-Room'));

      expect(errorCode(await app.workflow.applications.approveApplication(sessions.jacob, application.id))).toBe(
        'AuthorizationDenied',
      );
      expect(errorCode(await app.workflow.applications.rejectApplication(sessions.fiona, application.id))).toBe(
        'AuthorizationDenied',
      );
      expect(application.status).toBe('pending');
    });

    it('only decides pending applications', async () => {
      const application = await successfulApplication();

      expect(await app.workflow.applications.rejectApplication(sessions.irene, application.id)).toEqual({
        ok: false,
        error: { code: 'InvalidStateTransition', message: 'Application 1 is successful, not pending' },
      });
      expect(errorCode(await app.workflow.applications.approveApplication(sessions.irene, 77))).toBe('NotFound');
    });
  });

  describe('withdrawal', () => {
    it('turns an approved withdrawal of a pending application into unsuccessful', async () => {
      const application = expectOk(await app.workflow.applications.apply(sessions.cara, 1, '2-Room'));
      expectOk(await app.workflow.applications.requestWithdrawal(sessions.cara, application.id));

      const withdrawn = expectOk(await app.workflow.applications.approveWithdrawal(sessions.irene, application.id));

      expect(withdrawn.status).toBe('unsuccessful');
      expect(withdrawn.withdrawalRequested).toBe(false);
      expectOk(await app.workflow.applications.apply(sessions.cara, 1, '2-Room'));
    });

    it('does not re-credit units when a successful application is withdrawn', async () => {
      const application = await successfulApplication();
      expectOk(await app.workflow.applications.requestWithdrawal(sessions.cara, application.id));

      expectOk(await app.workflow.applications.approveWithdrawal(sessions.irene, application.id));

      expect(application.status).toBe('unsuccessful');
      const project = await app.repositories.projects.findById(1);
      expect(project?.flatTypes['3-Room']?.units).toBe(1);
    });

    it('only lets applicants withdraw their own active applications', async () => {
      const application = expectOk(await app.workflow.applications.apply(sessions.cara, 1, '2-Room'));

      expect(errorCode(await app.workflow.applications.requestWithdrawal(sessions.evan, application.id))).toBe(
        'AuthorizationDenied',
      );
      expect(errorCode(await app.workflow.applications.requestWithdrawal(sessions.cara, 5))).toBe('NotFound');

      expectOk(await app.workflow.applications.rejectApplication(sessions.irene, application.id));
      expect(await app.workflow.applications.requestWithdrawal(sessions.cara, application.id)).toEqual({
        ok: false,
        error: { code: 'InvalidStateTransition', message: 'Cannot withdraw an application that is unsuccessful' },
      });
    });

    it('refuses to withdraw a booked application', async () => {
      const application = await successfulApplication();
      expectOk(await app.workflow.applications.bookFlat(sessions.fiona, application.id));

      expect(errorCode(await app.workflow.applications.requestWithdrawal(sessions.cara, application.id))).toBe(
        'InvalidStateTransition',
      );
    });

    it('needs a withdrawal request before a decision', async () => {
      const application = expectOk(await app.workflow.applications.apply(sessions.cara, 1, '2-Room'));

      expect(await app.workflow.applications.approveWithdrawal(sessions.irene, application.id)).toEqual({
        ok: false,
        error: { code: 'InvalidStateTransition', message: 'No withdrawal requested for application 1' },
      });
      expect(errorCode(await app.workflow.applications.rejectWithdrawal(sessions.irene, application.id))).toBe(
        'InvalidStateTransition',
      );
    });
  });

  describe('bookFlat', () => {
    it('books a successful application and takes one unit', async () => {
      const application = await successfulApplication();

      const booked = expectOk(await app.workflow.applications.bookFlat(sessions.fiona, application.id));

      expect(booked.status).toBe('booked');
      const project = await app.repositories.projects.findById(1);
      expect(project?.flatTypes['3-Room']).toEqual({ units: 0, price: 400000, totalUnits: 1 });
    });

    it('only books for officers handling the project', async () => {
      const application = await successfulApplication();

      expect(errorCode(await app.workflow.applications.bookFlat(sessions.gavin, application.id))).toBe(
        'AuthorizationDenied',
      );
      expect(errorCode(await app.workflow.applications.bookFlat(sessions.cara, application.id))).toBe(
        'AuthorizationDenied',
      );
    });

    it('only books successful applications', async () => {
      const application = expectOk(await app.workflow.applications.apply(sessions.cara, 1, '2-Room'));

      expect(await app.workflow.applications.bookFlat(sessions.fiona, application.id)).toEqual({
        ok: false,
        error: { code: 'InvalidStateTransition', message: 'Cannot book an application that is pending' },
      });
    });

    it('refuses to book once the units are gone', async () => {
      const application = await successfulApplication();
      expectOk(await app.workflow.officers.updateFlatAvailability(sessions.fiona, '3-Room', 1));

      expect(errorCode(await app.workflow.applications.bookFlat(sessions.fiona, application.id))).toBe(
        'UnitsExhausted',
      );
      expect(application.status).toBe('successful');
    });
  });

  describe('generateReceipt', () => {
    it('describes the booked flat', async () => {
      const application = await successfulApplication();
      expectOk(await app.workflow.applications.bookFlat(sessions.fiona, application.id));

      expect(expectOk(await app.workflow.applications.generateReceipt(sessions.fiona, 'S0000003C'))).toEqual({
        applicationId: 1,
        applicantId: 'S0000003C',
        applicantName: 'Cara Ng',
        age: 21,
        maritalStatus: 'married',
        projectName: 'Cedar Heights',
        neighborhood: 'Tampines',
        flatType: '3-Room',
        price: 400000,
      });
    });

    it('matches the applicant id regardless of case and padding', async () => {
      const application = await successfulApplication();
      expectOk(await app.workflow.applications.bookFlat(sessions.fiona, application.id));

      const receipt = expectOk(await app.workflow.applications.generateReceipt(sessions.fiona, ' s0000003c '));

      expect(receipt.applicationId).toBe(1);
      expect(receipt.applicantId).toBe('S0000003C');
    });

    it('needs a booked application in the officer project', async () => {
      await successfulApplication();

      expect(errorCode(await app.workflow.applications.generateReceipt(sessions.fiona, 'S0000003C'))).toBe('NotFound');
      expect(errorCode(await app.workflow.applications.generateReceipt(sessions.fiona, 'S0000000X'))).toBe('NotFound');
      expect(errorCode(await app.workflow.applications.generateReceipt(sessions.gavin, 'S0000003C'))).toBe(
        'AuthorizationDenied',
      );
    });
  });
});
