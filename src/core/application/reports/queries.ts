import type {
  ApplicationRecord,
  FlatType,
  MaritalStatus,
  OfficerAccount,
  Person,
  Project,
} from "../../ports";

// Pure filters over in-memory collections. Nothing here mutates its inputs.

export interface ApplicationQueueItem {
  application: ApplicationRecord;
  applicantName: string;
  projectName: string;
}

export interface OfficerQueueItem {
  officerId: string;
  officerName: string;
  projectId: number;
  projectName: string;
}

export interface ReportFilter {
  projectId?: number;
  flatType?: FlatType;
  maritalStatus?: MaritalStatus;
}

export interface BookingReportRow {
  applicationId: number;
  applicantId: string;
  applicantName: string;
  age: number;
  maritalStatus: MaritalStatus;
  projectId: number;
  projectName: string;
  flatType: FlatType;
}

const ownedProjectIds = (projects: Project[], managerId: string): Set<number> =>
  new Set(projects.filter((project) => project.managerId === managerId).map((project) => project.id));

export function pendingApplicationsFor(
  applications: ApplicationRecord[],
  projects: Project[],
  managerId: string,
): ApplicationRecord[] {
  const owned = ownedProjectIds(projects, managerId);
  return applications.filter((application) => application.status === "pending" && owned.has(application.projectId));
}

export function withdrawalRequestsFor(
  applications: ApplicationRecord[],
  projects: Project[],
  managerId: string,
): ApplicationRecord[] {
  const owned = ownedProjectIds(projects, managerId);
  return applications.filter((application) => application.withdrawalRequested && owned.has(application.projectId));
}

export function pendingOfficerRegistrationsFor(
  officers: OfficerAccount[],
  projects: Project[],
  managerId: string,
): OfficerAccount[] {
  const owned = ownedProjectIds(projects, managerId);
  return officers.filter(
    ({ assignment }) =>
      assignment.registrationStatus === "pending" &&
      assignment.registeredProjectId !== null &&
      owned.has(assignment.registeredProjectId),
  );
}

export function describeApplications(
  applications: ApplicationRecord[],
  people: Map<string, Person>,
  projects: Map<number, Project>,
): ApplicationQueueItem[] {
  return applications.map((application) => ({
    application,
    applicantName: people.get(application.applicantId)?.name ?? application.applicantId,
    projectName: projects.get(application.projectId)?.name ?? `#${application.projectId}`,
  }));
}

export function describeOfficers(officers: OfficerAccount[], projects: Map<number, Project>): OfficerQueueItem[] {
  return officers.flatMap(({ person, assignment }) => {
    if (assignment.registeredProjectId === null) {
      return [];
    }
    return [
      {
        officerId: person.id,
        officerName: person.name,
        projectId: assignment.registeredProjectId,
        projectName: projects.get(assignment.registeredProjectId)?.name ?? `#${assignment.registeredProjectId}`,
      },
    ];
  });
}

// Booked applications only, across every project, narrowed by the optional filter
export function buildBookingReport(
  applications: ApplicationRecord[],
  people: Map<string, Person>,
  projects: Map<number, Project>,
  filter: ReportFilter = {},
): BookingReportRow[] {
  const rows: BookingReportRow[] = [];
  for (const application of applications) {
    if (application.status !== "booked") continue;
    if (filter.projectId !== undefined && application.projectId !== filter.projectId) continue;
    if (filter.flatType && application.flatType !== filter.flatType) continue;

    const person = people.get(application.applicantId);
    const project = projects.get(application.projectId);
    if (!person || !project) continue;
    if (filter.maritalStatus && person.maritalStatus !== filter.maritalStatus) continue;

    rows.push({
      applicationId: application.id,
      applicantId: person.id,
      applicantName: person.name,
      age: person.age,
      maritalStatus: person.maritalStatus,
      projectId: project.id,
      projectName: project.name,
      flatType: application.flatType,
    });
  }
  return rows;
}
