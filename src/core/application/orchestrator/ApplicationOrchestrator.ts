import type {
  ApplicationRecord,
  ApplicationRepository,
  Config,
  FlatType,
  LockManager,
  Logger,
  MaritalStatus,
  Project,
  ProjectRepository,
  UserRepository,
} from "../../ports";
import { ACTIVE_APPLICATION_STATUSES } from "../../ports";
import { fail, succeed, type OperationResult } from "../../domain/errors";
import { eligibleFlatTypes, isProjectOpenTo, isWithinApplicationWindow } from "../../domain/eligibility";
import { applicantKey, projectKey, refuse } from "../outcome";
import {
  resolveActor,
  resolveApplicant,
  resolveManager,
  resolveOfficer,
  type Session,
} from "../session";

export interface ApplicationView {
  application: ApplicationRecord;
  projectName: string;
}

export interface BookingReceipt {
  applicationId: number;
  applicantId: string;
  applicantName: string;
  age: number;
  maritalStatus: MaritalStatus;
  projectName: string;
  neighborhood: string;
  flatType: FlatType;
  price: number;
}

/**
 * Drives an application through pending -> successful -> booked, with
 * unsuccessful reachable from pending (rejection or withdrawal) and from
 * successful (withdrawal only).
 */
export class ApplicationOrchestrator {
  constructor(
    private readonly users: UserRepository,
    private readonly projects: ProjectRepository,
    private readonly applications: ApplicationRepository,
    private readonly locks: LockManager,
    private readonly config: Config,
    private readonly logger: Logger,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  // Managers see every project; everyone else only what they could apply for right now
  async listProjects(session: Session): Promise<OperationResult<Project[]>> {
    const actor = await resolveActor(this.users, session);
    if (!actor.ok) {
      return refuse(this.logger, "listProjects", session, actor);
    }

    const all = await this.projects.list();
    if (actor.value.role === "manager") {
      return succeed(all);
    }

    const rules = this.config.eligibility();
    const person = actor.value.person;
    return succeed(all.filter((project) => isProjectOpenTo(person, project, rules)));
  }

  async apply(
    session: Session,
    projectId: number,
    flatType: FlatType,
  ): Promise<OperationResult<ApplicationRecord>> {
    const actor = await resolveApplicant(this.users, session);
    if (!actor.ok) {
      return refuse(this.logger, "apply", session, actor);
    }
    const person = actor.value.person;

    return this.locks.runExclusive(applicantKey(person.id), () =>
      this.locks.runExclusive(projectKey(projectId), async () => {
        const project = await this.projects.findById(projectId);
        if (!project || !project.visible) {
          return refuse(this.logger, "apply", session, fail("NotFound", `Project ${projectId} not found`));
        }

        if (!isWithinApplicationWindow(project, this.clock())) {
          return refuse(
            this.logger,
            "apply",
            session,
            fail(
              "ApplicationWindowClosed",
              `Applications for ${project.name} are open from ${project.openDate} to ${project.closeDate}`,
            ),
          );
        }

        const active = await this.applications.getActive(person.id);
        if (active) {
          return refuse(
            this.logger,
            "apply",
            session,
            fail("DuplicateActiveApplication", "You already have an active application"),
          );
        }

        const eligible = eligibleFlatTypes(person, this.config.eligibility());
        if (!eligible.has(flatType)) {
          const message =
            eligible.size === 0
              ? `${person.name} is not eligible to apply for any flat type`
              : `${person.name} may only apply for ${[...eligible].join(" or ")}`;
          return refuse(this.logger, "apply", session, fail("EligibilityDenied", message));
        }

        const inventory = project.flatTypes[flatType];
        if (!inventory || inventory.units <= 0) {
          return refuse(
            this.logger,
            "apply",
            session,
            fail("UnitsExhausted", `No ${flatType} units available in ${project.name}`),
          );
        }

        const application = await this.applications.create(person.id, project.id, flatType);
        this.logger.info(
          { applicationId: application.id, applicantId: person.id, projectId, flatType },
          "Application submitted",
        );
        return succeed(application);
      }),
    );
  }

  async viewStatus(session: Session): Promise<OperationResult<ApplicationView[]>> {
    const actor = await resolveApplicant(this.users, session);
    if (!actor.ok) {
      return refuse(this.logger, "viewStatus", session, actor);
    }

    const mine = await this.applications.listByApplicant(actor.value.person.id);
    const views: ApplicationView[] = [];
    for (const application of mine) {
      const project = await this.projects.findById(application.projectId);
      views.push({ application, projectName: project?.name ?? `#${application.projectId}` });
    }
    return succeed(views);
  }

  async requestWithdrawal(
    session: Session,
    applicationId: number,
  ): Promise<OperationResult<ApplicationRecord>> {
    const actor = await resolveApplicant(this.users, session);
    if (!actor.ok) {
      return refuse(this.logger, "requestWithdrawal", session, actor);
    }

    const application = await this.applications.findById(applicationId);
    if (!application) {
      return refuse(
        this.logger,
        "requestWithdrawal",
        session,
        fail("NotFound", `Application ${applicationId} not found`),
      );
    }

    return this.locks.runExclusive(projectKey(application.projectId), async () => {
      if (application.applicantId !== actor.value.person.id) {
        return refuse(
          this.logger,
          "requestWithdrawal",
          session,
          fail("AuthorizationDenied", "You can only withdraw your own application"),
        );
      }
      if (!ACTIVE_APPLICATION_STATUSES.includes(application.status)) {
        return refuse(
          this.logger,
          "requestWithdrawal",
          session,
          fail("InvalidStateTransition", `Cannot withdraw an application that is ${application.status}`),
        );
      }

      const updated = await this.applications.update(application.id, { withdrawalRequested: true });
      this.logger.info({ applicationId, status: updated.status }, "Withdrawal requested");
      return succeed(updated);
    });
  }

  approveApplication(session: Session, applicationId: number): Promise<OperationResult<ApplicationRecord>> {
    return this.decideApplication(session, applicationId, "approve");
  }

  rejectApplication(session: Session, applicationId: number): Promise<OperationResult<ApplicationRecord>> {
    return this.decideApplication(session, applicationId, "reject");
  }

  approveWithdrawal(session: Session, applicationId: number): Promise<OperationResult<ApplicationRecord>> {
    return this.decideWithdrawal(session, applicationId, "approve");
  }

  rejectWithdrawal(session: Session, applicationId: number): Promise<OperationResult<ApplicationRecord>> {
    return this.decideWithdrawal(session, applicationId, "reject");
  }

  /**
   * Officer confirms a flat for a successful application. This is the only
   * place units leave the project inventory for an application.
   */
  async bookFlat(session: Session, applicationId: number): Promise<OperationResult<ApplicationRecord>> {
    const officer = await resolveOfficer(this.users, session);
    if (!officer.ok) {
      return refuse(this.logger, "bookFlat", session, officer);
    }

    const application = await this.applications.findById(applicationId);
    if (!application) {
      return refuse(this.logger, "bookFlat", session, fail("NotFound", `Application ${applicationId} not found`));
    }

    return this.locks.runExclusive(projectKey(application.projectId), async () => {
      if (officer.value.assignment.handlingProjectId !== application.projectId) {
        return refuse(
          this.logger,
          "bookFlat",
          session,
          fail("AuthorizationDenied", "You are not handling this application's project"),
        );
      }
      if (application.status !== "successful") {
        return refuse(
          this.logger,
          "bookFlat",
          session,
          fail("InvalidStateTransition", `Cannot book an application that is ${application.status}`),
        );
      }

      const project = await this.projects.findById(application.projectId);
      const inventory = project?.flatTypes[application.flatType];
      if (!inventory || inventory.units <= 0) {
        return refuse(
          this.logger,
          "bookFlat",
          session,
          fail("UnitsExhausted", `No ${application.flatType} units left to book`),
        );
      }

      await this.projects.reduceUnits(application.projectId, application.flatType, 1);
      const updated = await this.applications.update(application.id, { status: "booked" });
      this.logger.info(
        { applicationId, projectId: application.projectId, flatType: application.flatType },
        "Flat booked",
      );
      return succeed(updated);
    });
  }

  async generateReceipt(session: Session, applicantId: string): Promise<OperationResult<BookingReceipt>> {
    const officer = await resolveOfficer(this.users, session);
    if (!officer.ok) {
      return refuse(this.logger, "generateReceipt", session, officer);
    }

    const handlingProjectId = officer.value.assignment.handlingProjectId;
    if (handlingProjectId === null) {
      return refuse(
        this.logger,
        "generateReceipt",
        session,
        fail("AuthorizationDenied", "You are not handling any project"),
      );
    }

    const applicant = await this.users.findById(applicantId);
    if (!applicant) {
      return refuse(this.logger, "generateReceipt", session, fail("NotFound", `Applicant ${applicantId} not found`));
    }

    const booked = (await this.applications.listByApplicant(applicant.person.id)).find(
      (application) => application.status === "booked" && application.projectId === handlingProjectId,
    );
    const project = booked ? await this.projects.findById(booked.projectId) : null;
    const inventory = booked ? project?.flatTypes[booked.flatType] : undefined;
    if (!booked || !project || !inventory) {
      return refuse(
        this.logger,
        "generateReceipt",
        session,
        fail("NotFound", `No booked application for ${applicantId} in your project`),
      );
    }

    const { person } = applicant;
    return succeed({
      applicationId: booked.id,
      applicantId: person.id,
      applicantName: person.name,
      age: person.age,
      maritalStatus: person.maritalStatus,
      projectName: project.name,
      neighborhood: project.neighborhood,
      flatType: booked.flatType,
      price: inventory.price,
    });
  }

  private async decideApplication(
    session: Session,
    applicationId: number,
    decision: "approve" | "reject",
  ): Promise<OperationResult<ApplicationRecord>> {
    const operation = decision === "approve" ? "approveApplication" : "rejectApplication";
    const manager = await resolveManager(this.users, session);
    if (!manager.ok) {
      return refuse(this.logger, operation, session, manager);
    }

    const application = await this.applications.findById(applicationId);
    if (!application) {
      return refuse(this.logger, operation, session, fail("NotFound", `Application ${applicationId} not found`));
    }

    return this.locks.runExclusive(projectKey(application.projectId), async () => {
      const project = await this.projects.findById(application.projectId);
      if (!project || project.managerId !== manager.value.person.id) {
        return refuse(
          this.logger,
          operation,
          session,
          fail("AuthorizationDenied", "You are not the manager of this project"),
        );
      }
      if (application.status !== "pending") {
        return refuse(
          this.logger,
          operation,
          session,
          fail("InvalidStateTransition", `Application ${applicationId} is ${application.status}, not pending`),
        );
      }

      if (decision === "reject") {
        const updated = await this.applications.update(application.id, { status: "unsuccessful" });
        this.logger.info({ applicationId, projectId: project.id }, "Application rejected");
        return succeed(updated);
      }

      // Approval only checks availability; units are taken at booking time
      const inventory = project.flatTypes[application.flatType];
      if (!inventory || inventory.units <= 0) {
        return refuse(
          this.logger,
          operation,
          session,
          fail("UnitsExhausted", `No ${application.flatType} units left in ${project.name}`),
        );
      }

      const updated = await this.applications.update(application.id, { status: "successful" });
      this.logger.info({ applicationId, projectId: project.id }, "Application approved");
      return succeed(updated);
    });
  }

  private async decideWithdrawal(
    session: Session,
    applicationId: number,
    decision: "approve" | "reject",
  ): Promise<OperationResult<ApplicationRecord>> {
    const operation = decision === "approve" ? "approveWithdrawal" : "rejectWithdrawal";
    const manager = await resolveManager(this.users, session);
    if (!manager.ok) {
      return refuse(this.logger, operation, session, manager);
    }

    const application = await this.applications.findById(applicationId);
    if (!application) {
      return refuse(this.logger, operation, session, fail("NotFound", `Application ${applicationId} not found`));
    }

    return this.locks.runExclusive(projectKey(application.projectId), async () => {
      const project = await this.projects.findById(application.projectId);
      if (!project || project.managerId !== manager.value.person.id) {
        return refuse(
          this.logger,
          operation,
          session,
          fail("AuthorizationDenied", "You are not the manager of this project"),
        );
      }
      if (!application.withdrawalRequested) {
        return refuse(
          this.logger,
          operation,
          session,
          fail("InvalidStateTransition", `No withdrawal requested for application ${applicationId}`),
        );
      }

      if (decision === "reject") {
        const updated = await this.applications.update(application.id, { withdrawalRequested: false });
        this.logger.info({ applicationId, status: updated.status }, "Withdrawal rejected");
        return succeed(updated);
      }

      if (!ACTIVE_APPLICATION_STATUSES.includes(application.status)) {
        return refuse(
          this.logger,
          operation,
          session,
          fail("InvalidStateTransition", `Cannot withdraw an application that is ${application.status}`),
        );
      }

      // Units are not re-credited: only booking ever removed them, and booked applications cannot withdraw
      const updated = await this.applications.update(application.id, {
        status: "unsuccessful",
        withdrawalRequested: false,
      });
      this.logger.info({ applicationId }, "Withdrawal approved");
      return succeed(updated);
    });
  }
}
