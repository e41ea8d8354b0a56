import { Command } from 'commander';
import type { FlatType } from '../../core/ports';
import type { ProjectChanges, ProjectSortKey } from '../../core/domain/projectCatalog';
import { getCliContainer } from '../container';
import { parseCount, parseDay, parseFlatType, parseNric, parseSortKey } from '../utils/args';
import { formatDay, formatInventory, printError, printInfo, printSuccess, printTable, unwrap } from '../utils/output';

interface ListOptions {
  as: string;
  neighborhood?: string;
  flatType?: FlatType;
  openFrom?: Date;
  closeBy?: Date;
  minAvailable?: number;
  manager?: string;
  sort?: ProjectSortKey;
}

interface CreateOptions {
  manager: string;
  name: string;
  neighborhood: string;
  open: Date;
  close: Date;
  twoRoom?: number;
  threeRoom?: number;
  officerSlots: number;
  hidden?: boolean;
}

interface UpdateOptions {
  name?: string;
  neighborhood?: string;
  open?: Date;
  close?: Date;
  twoRoom?: number;
  threeRoom?: number;
  officerSlots?: number;
}

// Register project catalogue commands (list, show, create, update, visibility)
export function registerProjectCommands(program: Command): void {
  const projectCmd = program
    .command('project')
    .description('Project catalogue commands');

  // list shows the projects a given user is allowed to see, with optional filters
  projectCmd
    .command('list')
    .description('List projects visible to a user')
    .requiredOption('--as <nric>', 'NRIC of the user browsing', parseNric)
    .option('--neighborhood <name>', 'Only projects in this neighborhood')
    .option('--flat-type <type>', 'Only projects offering 2-Room or 3-Room', parseFlatType)
    .option('--open-from <date>', 'Opening on or after dd/MM/yyyy', parseDay)
    .option('--close-by <date>', 'Closing on or before dd/MM/yyyy', parseDay)
    .option('--min-available <count>', 'Minimum units still available', parseCount)
    .option('--manager <nric>', 'Only projects run by this manager', parseNric)
    .option('--sort <key>', 'Sort key (name, neighborhood, openDate, closeDate, availability, availabilityDesc, flatType)', parseSortKey)
    .action(async (options: ListOptions) => {
      try {
        const { coordinator } = await getCliContainer();
        const projects = unwrap(
          await coordinator.listProjectsForUser(options.as, {
            neighborhood: options.neighborhood,
            flatType: options.flatType,
            openFrom: options.openFrom,
            closeBy: options.closeBy,
            minAvailability: options.minAvailable,
            managerId: options.manager,
            sortBy: options.sort,
          }),
          'list projects',
        );

        if (projects.length === 0) {
          printInfo('No projects match');
          return;
        }

        printTable(
          ['ID', 'Name', 'Neighborhood', 'Units (available/total)', 'Window', 'Manager', 'Officers', 'Visible'],
          projects.map((p) => [
            p.id,
            p.name,
            p.neighborhood,
            formatInventory(p.inventory),
            `${formatDay(p.openDate)} - ${formatDay(p.closeDate)}`,
            p.managerId,
            `${p.officerIds.length}/${p.officerSlots}`,
            p.visible ? 'yes' : 'no',
          ]),
        );
      } catch (error) {
        printError(`Failed to list projects: ${(error as Error).message}`);
        process.exit(1);
      }
    });

  // show prints one project's details including its officer roster
  projectCmd
    .command('show <projectId>')
    .description('View detailed information about a project')
    .action(async (projectId: string) => {
      try {
        const { repositories } = await getCliContainer();
        const project = await repositories.projects.findById(projectId);

        if (!project) {
          printError(`Project ${projectId} not found`);
          process.exit(1);
        }

        console.log('\n=== Project Details ===\n');
        printTable(
          ['Field', 'Value'],
          [
            ['ID', project.id],
            ['Name', project.name],
            ['Neighborhood', project.neighborhood],
            ['Units (available/total)', formatInventory(project.inventory)],
            ['Opens', formatDay(project.openDate)],
            ['Closes', formatDay(project.closeDate)],
            ['Manager', project.managerId],
            ['Officer Slots', `${project.officerIds.length}/${project.officerSlots}`],
            ['Officers', project.officerIds.join(', ') || '-'],
            ['Visible', project.visible ? 'yes' : 'no'],
          ],
        );
      } catch (error) {
        printError(`Failed to show project: ${(error as Error).message}`);
        process.exit(1);
      }
    });

  projectCmd
    .command('create')
    .description('Create a project managed by the given manager')
    .requiredOption('--manager <nric>', 'NRIC of the managing officer', parseNric)
    .requiredOption('--name <name>', 'Project name')
    .requiredOption('--neighborhood <name>', 'Neighborhood')
    .requiredOption('--open <date>', 'Application opening date dd/MM/yyyy', parseDay)
    .requiredOption('--close <date>', 'Application closing date dd/MM/yyyy', parseDay)
    .option('--two-room <count>', 'Number of 2-Room units', parseCount)
    .option('--three-room <count>', 'Number of 3-Room units', parseCount)
    .requiredOption('--officer-slots <count>', 'Officer slots', parseCount)
    .option('--hidden', 'Create the project hidden from applicants')
    .action(async (options: CreateOptions) => {
      try {
        const { coordinator } = await getCliContainer();
        const project = unwrap(
          await coordinator.createProject(options.manager, {
            name: options.name,
            neighborhood: options.neighborhood,
            openDate: options.open,
            closeDate: options.close,
            officerSlots: options.officerSlots,
            units: { TWO_ROOM: options.twoRoom, THREE_ROOM: options.threeRoom },
            visible: !options.hidden,
          }),
          'create project',
        );
        printSuccess(`Created project ${project.id} (${formatInventory(project.inventory)})`);
      } catch (error) {
        printError(`Failed to create project: ${(error as Error).message}`);
        process.exit(1);
      }
    });

  projectCmd
    .command('update <projectId>')
    .description('Edit project details, unit totals or officer slots')
    .option('--name <name>', 'Project name')
    .option('--neighborhood <name>', 'Neighborhood')
    .option('--open <date>', 'Application opening date dd/MM/yyyy', parseDay)
    .option('--close <date>', 'Application closing date dd/MM/yyyy', parseDay)
    .option('--two-room <count>', 'Total 2-Room units', parseCount)
    .option('--three-room <count>', 'Total 3-Room units', parseCount)
    .option('--officer-slots <count>', 'Officer slots', parseCount)
    .action(async (projectId: string, options: UpdateOptions) => {
      try {
        const { coordinator } = await getCliContainer();
        const changes: ProjectChanges = {
          name: options.name,
          neighborhood: options.neighborhood,
          openDate: options.open,
          closeDate: options.close,
          officerSlots: options.officerSlots,
        };
        if (options.twoRoom !== undefined || options.threeRoom !== undefined) {
          changes.units = { TWO_ROOM: options.twoRoom, THREE_ROOM: options.threeRoom };
        }

        const project = unwrap(await coordinator.updateProject(projectId, changes), 'update project');
        printSuccess(`Updated project ${project.id} (${formatInventory(project.inventory)})`);
      } catch (error) {
        printError(`Failed to update project: ${(error as Error).message}`);
        process.exit(1);
      }
    });

  projectCmd
    .command('visibility <projectId> <state>')
    .description('Show or hide a project from applicants (on|off)')
    .action(async (projectId: string, state: string) => {
      try {
        if (state !== 'on' && state !== 'off') {
          printError('State must be on or off');
          process.exit(1);
        }

        const { coordinator } = await getCliContainer();
        const project = unwrap(await coordinator.setProjectVisibility(projectId, state === 'on'), 'change visibility');
        printSuccess(`Project ${project.id} is now ${project.visible ? 'visible' : 'hidden'}`);
      } catch (error) {
        printError(`Failed to change visibility: ${(error as Error).message}`);
        process.exit(1);
      }
    });
}
