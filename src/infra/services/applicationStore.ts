import type { ApplicationRecord, ApplicationRepository, FlatType } from '../../core/ports';
import { ACTIVE_APPLICATION_STATUSES } from '../../core/ports';

// In-memory application store; records are mutated in place on update
export class ApplicationStore implements ApplicationRepository {
  private readonly applications = new Map<number, ApplicationRecord>();
  private nextId = 1;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async create(applicantId: string, projectId: number, flatType: FlatType): Promise<ApplicationRecord> {
    const now = this.clock();
    const application: ApplicationRecord = {
      id: this.nextId++,
      applicantId,
      projectId,
      flatType,
      status: 'pending',
      withdrawalRequested: false,
      createdAt: now,
      updatedAt: now,
    };
    this.applications.set(application.id, application);
    return application;
  }

  async findById(applicationId: number): Promise<ApplicationRecord | null> {
    return this.applications.get(applicationId) ?? null;
  }

  async list(): Promise<ApplicationRecord[]> {
    return [...this.applications.values()];
  }

  async listByApplicant(applicantId: string): Promise<ApplicationRecord[]> {
    return [...this.applications.values()].filter((application) => application.applicantId === applicantId);
  }

  async getActive(applicantId: string): Promise<ApplicationRecord | null> {
    for (const application of this.applications.values()) {
      if (application.applicantId === applicantId && ACTIVE_APPLICATION_STATUSES.includes(application.status)) {
        return application;
      }
    }
    return null;
  }

  async update(
    applicationId: number,
    patch: Partial<Pick<ApplicationRecord, 'status' | 'withdrawalRequested'>>,
  ): Promise<ApplicationRecord> {
    const application = this.applications.get(applicationId);
    if (!application) {
      throw new Error(`Application ${applicationId} not found`);
    }
    if (patch.status !== undefined) application.status = patch.status;
    if (patch.withdrawalRequested !== undefined) application.withdrawalRequested = patch.withdrawalRequested;
    application.updatedAt = this.clock();
    return application;
  }
}
