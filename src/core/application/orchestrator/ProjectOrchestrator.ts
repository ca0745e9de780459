import type { Config, LockManager, Logger, Project, ProjectPatch, ProjectRepository, UserRepository } from "../../ports";
import { fail, succeed, type OperationResult } from "../../domain/errors";
import { createProjectInputSchema, describeIssues, type ProjectInput } from "../../domain/projectDraft";
import { projectKey, refuse } from "../outcome";
import { resolveManager, type Session } from "../session";

// Manager-side project maintenance
export class ProjectOrchestrator {
  constructor(
    private readonly users: UserRepository,
    private readonly projects: ProjectRepository,
    private readonly locks: LockManager,
    private readonly config: Config,
    private readonly logger: Logger,
  ) {}

  async createProject(session: Session, input: ProjectInput): Promise<OperationResult<Project>> {
    const manager = await resolveManager(this.users, session);
    if (!manager.ok) {
      return refuse(this.logger, "createProject", session, manager);
    }

    const parsed = createProjectInputSchema(this.config.limits().maxOfficerSlots).safeParse(input);
    if (!parsed.success) {
      return refuse(this.logger, "createProject", session, fail("InvalidInput", describeIssues(parsed.error)));
    }

    const project = await this.projects.create({ ...parsed.data, managerId: manager.value.person.id });
    this.logger.info({ projectId: project.id, managerId: project.managerId }, "Project created");
    return succeed(project);
  }

  async editProject(session: Session, projectId: number, patch: ProjectPatch): Promise<OperationResult<Project>> {
    const owned = await this.ownedProject(session, "editProject", projectId);
    if (!owned.ok) {
      return owned;
    }

    // Blank fields mean "leave as is"
    const changes: ProjectPatch = {};
    if (patch.name?.trim()) changes.name = patch.name.trim();
    if (patch.neighborhood?.trim()) changes.neighborhood = patch.neighborhood.trim();

    const updated = await this.locks.runExclusive(projectKey(projectId), () =>
      this.projects.update(projectId, changes),
    );
    this.logger.info({ projectId, changes }, "Project updated");
    return succeed(updated);
  }

  async toggleVisibility(
    session: Session,
    projectId: number,
    visible: boolean,
  ): Promise<OperationResult<Project>> {
    const owned = await this.ownedProject(session, "toggleVisibility", projectId);
    if (!owned.ok) {
      return owned;
    }

    await this.locks.runExclusive(projectKey(projectId), () => this.projects.toggleVisibility(projectId, visible));
    this.logger.info({ projectId, visible }, "Project visibility changed");
    return succeed(owned.value);
  }

  private async ownedProject(
    session: Session,
    operation: string,
    projectId: number,
  ): Promise<OperationResult<Project>> {
    const manager = await resolveManager(this.users, session);
    if (!manager.ok) {
      return refuse(this.logger, operation, session, manager);
    }

    const project = await this.projects.findById(projectId);
    if (!project) {
      return refuse(this.logger, operation, session, fail("NotFound", `Project ${projectId} not found`));
    }
    if (project.managerId !== manager.value.person.id) {
      return refuse(
        this.logger,
        operation,
        session,
        fail("AuthorizationDenied", "You are not the manager of this project"),
      );
    }
    return succeed(project);
  }
}
