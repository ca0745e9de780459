import type {
  ApplicationRepository,
  Logger,
  Person,
  Project,
  ProjectRepository,
  UserRepository,
} from "../../ports";
import { succeed, type OperationResult } from "../../domain/errors";
import { refuse } from "../outcome";
import { resolveManager, type Session } from "../session";
import {
  buildBookingReport,
  describeApplications,
  describeOfficers,
  pendingApplicationsFor,
  pendingOfficerRegistrationsFor,
  withdrawalRequestsFor,
  type ApplicationQueueItem,
  type BookingReportRow,
  type OfficerQueueItem,
  type ReportFilter,
} from "./queries";

// Read-only manager queues and the booking report
export class ReportService {
  constructor(
    private readonly users: UserRepository,
    private readonly projects: ProjectRepository,
    private readonly applications: ApplicationRepository,
    private readonly logger: Logger,
  ) {}

  async pendingApplications(session: Session): Promise<OperationResult<ApplicationQueueItem[]>> {
    const manager = await resolveManager(this.users, session);
    if (!manager.ok) {
      return refuse(this.logger, "pendingApplications", session, manager);
    }

    const { people, projects, projectList } = await this.lookups();
    const pending = pendingApplicationsFor(await this.applications.list(), projectList, manager.value.person.id);
    return succeed(describeApplications(pending, people, projects));
  }

  async withdrawalRequests(session: Session): Promise<OperationResult<ApplicationQueueItem[]>> {
    const manager = await resolveManager(this.users, session);
    if (!manager.ok) {
      return refuse(this.logger, "withdrawalRequests", session, manager);
    }

    const { people, projects, projectList } = await this.lookups();
    const requests = withdrawalRequestsFor(await this.applications.list(), projectList, manager.value.person.id);
    return succeed(describeApplications(requests, people, projects));
  }

  async pendingOfficerRegistrations(session: Session): Promise<OperationResult<OfficerQueueItem[]>> {
    const manager = await resolveManager(this.users, session);
    if (!manager.ok) {
      return refuse(this.logger, "pendingOfficerRegistrations", session, manager);
    }

    const { projects, projectList } = await this.lookups();
    const pending = pendingOfficerRegistrationsFor(
      await this.users.listOfficers(),
      projectList,
      manager.value.person.id,
    );
    return succeed(describeOfficers(pending, projects));
  }

  async generateReport(session: Session, filter: ReportFilter = {}): Promise<OperationResult<BookingReportRow[]>> {
    const manager = await resolveManager(this.users, session);
    if (!manager.ok) {
      return refuse(this.logger, "generateReport", session, manager);
    }

    const { people, projects } = await this.lookups();
    const rows = buildBookingReport(await this.applications.list(), people, projects, filter);
    this.logger.info({ managerId: session.userId, filter, rows: rows.length }, "Booking report generated");
    return succeed(rows);
  }

  private async lookups(): Promise<{
    people: Map<string, Person>;
    projects: Map<number, Project>;
    projectList: Project[];
  }> {
    const accounts = await this.users.list();
    const projectList = await this.projects.list();
    return {
      people: new Map(accounts.map((account) => [account.person.id, account.person])),
      projects: new Map(projectList.map((project) => [project.id, project])),
      projectList,
    };
  }
}
