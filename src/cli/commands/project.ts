import { Command } from 'commander';
import { getCliContainer } from '../container';
import { printError, printInfo, printProjects } from '../utils/output';

// Read-only project listing straight from the seeded registry, no session required
export function registerProjectCommands(program: Command): void {
  const projectCmd = program
    .command('projects')
    .description('Project registry commands');

  projectCmd
    .command('list')
    .description('List every project, hidden ones included')
    .option('-v, --visible', 'Only show projects that are visible to applicants')
    .action(async (options: { visible?: boolean }) => {
      try {
        const { repositories } = await getCliContainer();
        const projects = (await repositories.projects.list()).filter((project) => !options.visible || project.visible);

        if (projects.length === 0) {
          printInfo('No projects found');
          return;
        }

        console.log(`\n=== Projects (${projects.length}) ===\n`);
        printProjects(projects);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        printError(`Failed to list projects: ${reason}`);
        process.exit(1);
      }
    });
}
