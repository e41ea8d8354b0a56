import { Command } from 'commander';
import type { RegistrationStatus } from '../../core/ports';
import { getCliContainer } from '../container';
import { parseDecision, parseNric, parseRegistrationStatus } from '../utils/args';
import { formatDate, formatRegistrationStatus, printError, printInfo, printSuccess, printTable, unwrap } from '../utils/output';

// Register officer registration commands (register, decide, list)
export function registerOfficerCommands(program: Command): void {
  const officerCmd = program
    .command('officer')
    .description('Officer registration commands');

  officerCmd
    .command('register')
    .description('Register an officer to handle a project')
    .argument('<nric>', 'Officer NRIC', parseNric)
    .argument('<projectId>', 'Project ID')
    .action(async (nric: string, projectId: string) => {
      try {
        const { coordinator } = await getCliContainer();
        const registration = unwrap(await coordinator.registerOfficer(nric, projectId), 'register officer');
        printSuccess(`Registration of ${registration.officerId} for ${registration.projectId} is PENDING`);
      } catch (error) {
        printError(`Failed to register officer: ${(error as Error).message}`);
        process.exit(1);
      }
    });

  officerCmd
    .command('decide')
    .description('Approve or reject a pending officer registration')
    .argument('<nric>', 'Officer NRIC', parseNric)
    .argument('<projectId>', 'Project ID')
    .argument('<decision>', 'approve or reject', parseDecision)
    .option('--manager <nric>', 'NRIC of the deciding manager', parseNric)
    .action(async (nric: string, projectId: string, approve: boolean, options: { manager?: string }) => {
      try {
        const { coordinator } = await getCliContainer();
        const registration = unwrap(
          await coordinator.decideRegistration(nric, projectId, approve, options.manager),
          'decide registration',
        );
        printSuccess(
          `Registration of ${registration.officerId} for ${registration.projectId} is ${formatRegistrationStatus(registration.status)}`,
        );
      } catch (error) {
        printError(`Failed to decide registration: ${(error as Error).message}`);
        process.exit(1);
      }
    });

  officerCmd
    .command('list')
    .description('List officer registrations')
    .option('--officer <nric>', 'Only registrations by this officer', parseNric)
    .option('--project <projectId>', 'Only registrations for this project')
    .option('--status <status>', 'Only registrations in this status', parseRegistrationStatus)
    .action(async (options: { officer?: string; project?: string; status?: RegistrationStatus }) => {
      try {
        const { coordinator } = await getCliContainer();
        const registrations = unwrap(
          await coordinator.listRegistrations({
            officerId: options.officer,
            projectId: options.project,
            status: options.status,
          }),
          'list registrations',
        );

        if (registrations.length === 0) {
          printInfo('No registrations match');
          return;
        }

        printTable(
          ['Officer', 'Project', 'Status', 'Registered At'],
          registrations.map((r) => [
            r.officerId,
            r.projectId,
            formatRegistrationStatus(r.status),
            formatDate(r.registeredAt),
          ]),
        );
      } catch (error) {
        printError(`Failed to list registrations: ${(error as Error).message}`);
        process.exit(1);
      }
    });
}
