import Table from 'cli-table3';
import chalk from 'chalk';
import type { HousingError } from '../../core/domain/errors';
import type { ApplicationStatus, FlatType, Project, RegistrationStatus } from '../../core/ports';
import { FLAT_TYPES } from '../../core/ports';

// Print formatted table using cli-table3 with cyan headers
export function printTable(headers: string[], rows: string[][]): void {
  const table = new Table({
    head: headers.map((h) => chalk.cyan(h)),
    style: { head: [], border: [] },
  });

  rows.forEach((row) => table.push(row));
  console.log(table.toString());
}

// Print success message with green checkmark
export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

// Print error message to stderr with red X
export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

// Print a refused operation with its error code
export function printFailure(error: HousingError): void {
  printError(`${chalk.bold(error.code)}: ${error.message}`);
}

// Print warning message with yellow warning icon
export function printWarning(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

// Print info message with blue info icon
export function printInfo(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

// Format date for display. Returns - if null/undefined
export function formatDate(date: Date | null | undefined): string {
  if (!date) return '-';
  return date.toLocaleString();
}

// Format application status with color coding
export function formatStatus(status: ApplicationStatus): string {
  const colors: Record<ApplicationStatus, typeof chalk.green> = {
    pending: chalk.yellow,
    successful: chalk.green,
    unsuccessful: chalk.red,
    booked: chalk.magenta,
  };
  return colors[status](status);
}

// Format officer registration status with color coding
export function formatRegistration(status: RegistrationStatus): string {
  const colors: Record<RegistrationStatus, typeof chalk.green> = {
    none: chalk.gray,
    pending: chalk.yellow,
    approved: chalk.green,
    rejected: chalk.red,
  };
  return colors[status](status);
}

// "2 / 5 @ 350000" style cell for one flat type, or - when the project does not offer it
export function formatInventory(project: Project, flatType: FlatType): string {
  const inventory = project.flatTypes[flatType];
  if (!inventory) return '-';
  return `${inventory.units} / ${inventory.totalUnits} @ ${inventory.price}`;
}

export function printProjects(projects: Project[]): void {
  printTable(
    ['ID', 'Name', 'Neighborhood', ...FLAT_TYPES, 'Window', 'Officers', 'Visible'],
    projects.map((project) => [
      project.id.toString(),
      project.name,
      project.neighborhood,
      ...FLAT_TYPES.map((flatType) => formatInventory(project, flatType)),
      `${project.openDate ?? '-'} → ${project.closeDate ?? '-'}`,
      `${project.officerIds.length}/${project.officerSlots}`,
      project.visible ? chalk.green('yes') : chalk.gray('no'),
    ]),
  );
}
