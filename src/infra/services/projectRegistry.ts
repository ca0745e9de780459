import type {
  FlatInventory,
  FlatType,
  Project,
  ProjectDraft,
  ProjectPatch,
  ProjectRepository,
} from '../../core/ports';
import { FLAT_TYPES } from '../../core/ports';

// In-memory project registry
// IDs are handed out sequentially from 1, like an auto-increment column
export class ProjectRegistry implements ProjectRepository {
  private readonly projects = new Map<number, Project>();
  private nextId = 1;

  async create(draft: ProjectDraft): Promise<Project> {
    const flatTypes: Partial<Record<FlatType, FlatInventory>> = {};
    for (const flatType of FLAT_TYPES) {
      const offer = draft.flatTypes[flatType];
      if (offer) {
        flatTypes[flatType] = { units: offer.units, price: offer.price, totalUnits: offer.units };
      }
    }

    const officerIds = [...(draft.officerIds ?? [])];
    if (officerIds.length > draft.officerSlots) {
      throw new Error(`Project ${draft.name} lists ${officerIds.length} officers for ${draft.officerSlots} slots`);
    }

    const project: Project = {
      id: this.nextId++,
      name: draft.name,
      neighborhood: draft.neighborhood,
      flatTypes,
      openDate: draft.openDate,
      closeDate: draft.closeDate,
      managerId: draft.managerId,
      visible: true,
      officerSlots: draft.officerSlots,
      officerIds,
    };
    this.projects.set(project.id, project);
    return project;
  }

  async findById(projectId: number): Promise<Project | null> {
    return this.projects.get(projectId) ?? null;
  }

  async list(): Promise<Project[]> {
    return [...this.projects.values()];
  }

  // Clamps at zero; unknown projects and flat types the project does not offer are ignored
  async reduceUnits(projectId: number, flatType: FlatType, count: number): Promise<void> {
    const inventory = this.projects.get(projectId)?.flatTypes[flatType];
    if (!inventory) {
      return;
    }
    inventory.units = Math.max(0, inventory.units - count);
  }

  async toggleVisibility(projectId: number, visible: boolean): Promise<void> {
    this.require(projectId).visible = visible;
  }

  async update(projectId: number, patch: ProjectPatch): Promise<Project> {
    const project = this.require(projectId);
    if (patch.name !== undefined) project.name = patch.name;
    if (patch.neighborhood !== undefined) project.neighborhood = patch.neighborhood;
    return project;
  }

  async addOfficer(projectId: number, officerId: string): Promise<Project> {
    const project = this.require(projectId);
    if (project.officerIds.includes(officerId)) {
      return project;
    }
    if (project.officerIds.length >= project.officerSlots) {
      throw new Error(`Project ${projectId} has no officer slots left`);
    }
    project.officerIds.push(officerId);
    return project;
  }

  private require(projectId: number): Project {
    const project = this.projects.get(projectId);
    if (!project) {
      throw new Error(`Project ${projectId} not found`);
    }
    return project;
  }
}
