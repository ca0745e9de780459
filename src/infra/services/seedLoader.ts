import type { Logger, ProjectDraft, ProjectRepository, UserAccount } from '../../core/ports';
import type { PersonSeed, SeedData } from '../config/seedSchema';
import { UserDirectory } from './userDirectory';

const toPerson = (row: PersonSeed) => ({
  id: row.id,
  name: row.name,
  age: row.age,
  maritalStatus: row.maritalStatus,
});

// Turn validated seed rows into accounts
// Officers start unregistered; the project rows below may assign them
export function buildAccounts(seed: SeedData): UserAccount[] {
  return [
    ...seed.applicants.map((row): UserAccount => ({ role: 'applicant', person: toPerson(row), credential: row.password })),
    ...seed.officers.map(
      (row): UserAccount => ({
        role: 'officer',
        person: toPerson(row),
        credential: row.password,
        assignment: { registeredProjectId: null, registrationStatus: 'none', handlingProjectId: null },
      }),
    ),
    ...seed.managers.map((row): UserAccount => ({ role: 'manager', person: toPerson(row), credential: row.password })),
  ];
}

// Load projects into the registry, resolving manager and officer references by id or name
// Officers listed on a project are approved for it straight away
// Unknown references abort the load: a project without its manager could never be administered
export async function loadProjects(
  seed: SeedData,
  users: UserDirectory,
  projects: ProjectRepository,
  logger: Logger,
): Promise<void> {
  for (const row of seed.projects) {
    const manager = await users.resolve(row.manager);
    if (!manager || manager.role !== 'manager') {
      throw new Error(`Seed project "${row.name}" references unknown manager "${row.manager}"`);
    }

    const officerIds: string[] = [];
    for (const reference of row.officers) {
      const officer = await users.resolve(reference);
      if (!officer || officer.role !== 'officer') {
        throw new Error(`Seed project "${row.name}" references unknown officer "${reference}"`);
      }
      if (officer.assignment.handlingProjectId !== null) {
        throw new Error(`Officer "${reference}" is listed on more than one seed project`);
      }
      if (!officerIds.includes(officer.person.id)) {
        officerIds.push(officer.person.id);
      }
    }

    const flatTypes: ProjectDraft['flatTypes'] = {};
    for (const { type, units, price } of row.flatTypes) {
      flatTypes[type] = { units, price };
    }

    const created = await projects.create({
      name: row.name,
      neighborhood: row.neighborhood,
      flatTypes,
      openDate: row.openDate,
      closeDate: row.closeDate,
      managerId: manager.person.id,
      officerSlots: row.officerSlots,
      officerIds,
    });

    for (const officerId of officerIds) {
      await users.updateAssignment(officerId, {
        registeredProjectId: created.id,
        registrationStatus: 'approved',
        handlingProjectId: created.id,
      });
    }

    logger.debug({ projectId: created.id, name: created.name, officers: officerIds.length }, 'Seed project loaded');
  }
}
