import type {
  ApplicationRecord,
  ApplicationRepository,
  FlatType,
  LockManager,
  Logger,
  OfficerAccount,
  Project,
  ProjectRepository,
  UserRepository,
} from "../../ports";
import { fail, succeed, type OperationResult } from "../../domain/errors";
import { officerKey, projectKey, refuse } from "../outcome";
import { resolveManager, resolveOfficer, type Session } from "../session";

/**
 * Officer registration: none -> pending -> approved | rejected, plus the
 * project-scoped work an approved officer does.
 */
export class OfficerOrchestrator {
  constructor(
    private readonly users: UserRepository,
    private readonly projects: ProjectRepository,
    private readonly applications: ApplicationRepository,
    private readonly locks: LockManager,
    private readonly logger: Logger,
  ) {}

  async registerOfficer(session: Session, projectId: number): Promise<OperationResult<OfficerAccount>> {
    const officer = await resolveOfficer(this.users, session);
    if (!officer.ok) {
      return refuse(this.logger, "registerOfficer", session, officer);
    }
    const account = officer.value;

    const project = await this.projects.findById(projectId);
    if (!project) {
      return refuse(this.logger, "registerOfficer", session, fail("NotFound", `Project ${projectId} not found`));
    }

    return this.locks.runExclusive(officerKey(account.person.id), () =>
      this.locks.runExclusive(projectKey(projectId), async () => {
        if (account.assignment.handlingProjectId !== null) {
          return refuse(
            this.logger,
            "registerOfficer",
            session,
            fail("InvalidStateTransition", "You are already handling another project"),
          );
        }

        // Any application, whatever its status, rules the officer out for that project
        const own = await this.applications.listByApplicant(account.person.id);
        if (own.some((application) => application.projectId === projectId)) {
          return refuse(
            this.logger,
            "registerOfficer",
            session,
            fail("EligibilityDenied", `You have applied for ${project.name} and cannot handle it`),
          );
        }

        const updated = await this.users.updateAssignment(account.person.id, {
          registeredProjectId: projectId,
          registrationStatus: "pending",
        });
        this.logger.info({ officerId: account.person.id, projectId }, "Officer registration submitted");
        return succeed(updated);
      }),
    );
  }

  approveOfficerRegistration(session: Session, officerId: string): Promise<OperationResult<OfficerAccount>> {
    return this.decideRegistration(session, officerId, "approve");
  }

  rejectOfficerRegistration(session: Session, officerId: string): Promise<OperationResult<OfficerAccount>> {
    return this.decideRegistration(session, officerId, "reject");
  }

  // Records units taken outside a booking; the registry clamps at zero
  async updateFlatAvailability(
    session: Session,
    flatType: FlatType,
    count: number,
  ): Promise<OperationResult<Project>> {
    const officer = await resolveOfficer(this.users, session);
    if (!officer.ok) {
      return refuse(this.logger, "updateFlatAvailability", session, officer);
    }

    const projectId = officer.value.assignment.handlingProjectId;
    if (projectId === null) {
      return refuse(
        this.logger,
        "updateFlatAvailability",
        session,
        fail("AuthorizationDenied", "You are not handling any project"),
      );
    }
    if (!Number.isInteger(count) || count < 0) {
      return refuse(
        this.logger,
        "updateFlatAvailability",
        session,
        fail("InvalidInput", "Number of units booked must be a non-negative whole number"),
      );
    }

    return this.locks.runExclusive(projectKey(projectId), async () => {
      await this.projects.reduceUnits(projectId, flatType, count);
      const project = await this.projects.findById(projectId);
      if (!project) {
        return refuse(
          this.logger,
          "updateFlatAvailability",
          session,
          fail("NotFound", `Project ${projectId} not found`),
        );
      }
      this.logger.info(
        { projectId, flatType, count, remaining: project.flatTypes[flatType]?.units },
        "Flat availability updated",
      );
      return succeed(project);
    });
  }

  // Looks up an applicant's application within the project the officer handles
  async retrieveApplication(session: Session, applicantId: string): Promise<OperationResult<ApplicationRecord>> {
    const officer = await resolveOfficer(this.users, session);
    if (!officer.ok) {
      return refuse(this.logger, "retrieveApplication", session, officer);
    }

    const projectId = officer.value.assignment.handlingProjectId;
    if (projectId === null) {
      return refuse(
        this.logger,
        "retrieveApplication",
        session,
        fail("AuthorizationDenied", "You are not handling any project"),
      );
    }

    const applicant = await this.users.findById(applicantId);
    const found = applicant
      ? (await this.applications.listByApplicant(applicant.person.id)).find(
          (application) => application.projectId === projectId,
        )
      : undefined;
    if (!found) {
      return refuse(
        this.logger,
        "retrieveApplication",
        session,
        fail("NotFound", `No application from ${applicantId} in your project`),
      );
    }
    return succeed(found);
  }

  private async decideRegistration(
    session: Session,
    officerId: string,
    decision: "approve" | "reject",
  ): Promise<OperationResult<OfficerAccount>> {
    const operation = decision === "approve" ? "approveOfficerRegistration" : "rejectOfficerRegistration";
    const manager = await resolveManager(this.users, session);
    if (!manager.ok) {
      return refuse(this.logger, operation, session, manager);
    }

    const candidate = await this.users.findById(officerId);
    if (!candidate || candidate.role !== "officer") {
      return refuse(this.logger, operation, session, fail("NotFound", `Officer ${officerId} not found`));
    }
    const registrant: OfficerAccount = candidate;
    const { assignment } = registrant;

    return this.locks.runExclusive(officerKey(registrant.person.id), async () => {
      // Re-read once the officer lock is held
      const projectId = assignment.registeredProjectId;
      if (projectId === null) {
        return refuse(
          this.logger,
          operation,
          session,
          fail("InvalidStateTransition", `Officer ${officerId} has no registration to decide`),
        );
      }

      return this.locks.runExclusive(projectKey(projectId), async () => {
        const project = await this.projects.findById(projectId);
        if (!project || project.managerId !== manager.value.person.id) {
          return refuse(
            this.logger,
            operation,
            session,
            fail("AuthorizationDenied", "You are not the manager of this project"),
          );
        }
        if (assignment.registeredProjectId !== projectId || assignment.registrationStatus !== "pending") {
          return refuse(
            this.logger,
            operation,
            session,
            fail("InvalidStateTransition", `Registration is ${assignment.registrationStatus}, not pending`),
          );
        }

        if (decision === "reject") {
          const updated = await this.users.updateAssignment(registrant.person.id, { registrationStatus: "rejected" });
          this.logger.info({ officerId, projectId }, "Officer registration rejected");
          return succeed(updated);
        }

        if (project.officerIds.length >= project.officerSlots) {
          return refuse(
            this.logger,
            operation,
            session,
            fail("SlotExhausted", `All ${project.officerSlots} officer slots for ${project.name} are taken`),
          );
        }

        await this.projects.addOfficer(projectId, registrant.person.id);
        const updated = await this.users.updateAssignment(registrant.person.id, {
          handlingProjectId: projectId,
          registrationStatus: "approved",
        });
        this.logger.info({ officerId, projectId }, "Officer registration approved");
        return succeed(updated);
      });
    });
  }
}
