import { Command } from 'commander';
import type { ApplicationStatus, FlatType, MaritalStatus } from '../../core/ports';
import { formatFlatType } from '../../core/domain/inventory';
import { getCliContainer } from '../container';
import {
  parseApplicationStatus,
  parseDecision,
  parseFlatType,
  parseMaritalStatus,
  parseNric,
} from '../utils/args';
import { formatDate, formatStatus, printError, printInfo, printSuccess, printTable, unwrap } from '../utils/output';

interface ListOptions {
  project?: string;
  status?: ApplicationStatus;
  maritalStatus?: MaritalStatus;
  flatType?: FlatType;
}

// Register application workflow commands (apply, decide, book, withdraw, resolve-withdrawal, list, overview)
export function registerApplicationCommands(program: Command): void {
  const applicationCmd = program
    .command('application')
    .description('Flat application workflow commands');

  applicationCmd
    .command('apply')
    .description('Submit an application for a project')
    .argument('<nric>', 'Applicant NRIC', parseNric)
    .argument('<projectId>', 'Project ID')
    .option('--flat-type <type>', 'Requested flat type (2-Room or 3-Room)', parseFlatType)
    .action(async (nric: string, projectId: string, options: { flatType?: FlatType }) => {
      try {
        const { coordinator } = await getCliContainer();
        const application = unwrap(await coordinator.apply(nric, projectId, options.flatType), 'apply');
        printSuccess(
          `Application ${application.id} submitted for ${formatFlatType(application.flatType)} in ${projectId}`,
        );
      } catch (error) {
        printError(`Failed to apply: ${(error as Error).message}`);
        process.exit(1);
      }
    });

  // decide approves or rejects a pending application; approval may be overridden by exhausted units
  applicationCmd
    .command('decide')
    .description('Approve or reject a pending application')
    .argument('<applicationId>', 'Application ID')
    .argument('<decision>', 'approve or reject', parseDecision)
    .option('--manager <nric>', 'NRIC of the deciding manager', parseNric)
    .action(async (applicationId: string, approve: boolean, options: { manager?: string }) => {
      try {
        const { coordinator } = await getCliContainer();
        const application = unwrap(
          await coordinator.decideApplication(applicationId, approve, options.manager),
          'decide application',
        );
        printSuccess(`Application ${application.id} is now ${formatStatus(application.status)}`);
      } catch (error) {
        printError(`Failed to decide application: ${(error as Error).message}`);
        process.exit(1);
      }
    });

  applicationCmd
    .command('book')
    .description('Book a flat for a successful application')
    .argument('<applicationId>', 'Application ID')
    .option('--flat-type <type>', 'Flat type to book (defaults to the applied type)', parseFlatType)
    .option('--officer <nric>', 'NRIC of the booking officer', parseNric)
    .action(async (applicationId: string, options: { flatType?: FlatType; officer?: string }) => {
      try {
        const { coordinator } = await getCliContainer();
        const receipt = unwrap(
          await coordinator.bookFlat(applicationId, options.flatType, options.officer),
          'book flat',
        );

        console.log('\n=== Booking Receipt ===\n');
        printTable(
          ['Field', 'Value'],
          [
            ['Receipt', receipt.id],
            ['Application', receipt.applicationId],
            ['Applicant', receipt.applicantId],
            ['Project', receipt.projectId],
            ['Flat', receipt.flatId],
            ['Flat Type', formatFlatType(receipt.flatType)],
            ['Officer', receipt.officerId || '-'],
            ['Generated At', formatDate(receipt.generatedAt)],
          ],
        );
      } catch (error) {
        printError(`Failed to book flat: ${(error as Error).message}`);
        process.exit(1);
      }
    });

  applicationCmd
    .command('withdraw <applicationId>')
    .description('Request withdrawal of an application')
    .action(async (applicationId: string) => {
      try {
        const { coordinator } = await getCliContainer();
        const application = unwrap(await coordinator.requestWithdrawal(applicationId), 'request withdrawal');
        printSuccess(`Withdrawal requested for ${application.id}`);
      } catch (error) {
        printError(`Failed to request withdrawal: ${(error as Error).message}`);
        process.exit(1);
      }
    });

  applicationCmd
    .command('resolve-withdrawal')
    .description('Approve or reject a withdrawal request')
    .argument('<applicationId>', 'Application ID')
    .argument('<decision>', 'approve or reject', parseDecision)
    .option('--manager <nric>', 'NRIC of the deciding manager', parseNric)
    .action(async (applicationId: string, approve: boolean, options: { manager?: string }) => {
      try {
        const { coordinator } = await getCliContainer();
        const application = unwrap(
          await coordinator.resolveWithdrawal(applicationId, approve, options.manager),
          'resolve withdrawal',
        );
        printSuccess(`Application ${application.id} is now ${formatStatus(application.status)}`);
      } catch (error) {
        printError(`Failed to resolve withdrawal: ${(error as Error).message}`);
        process.exit(1);
      }
    });

  applicationCmd
    .command('list')
    .description('List applications with optional filters')
    .option('--project <projectId>', 'Only applications for this project')
    .option('--status <status>', 'Only applications in this status', parseApplicationStatus)
    .option('--marital-status <status>', 'Only applicants with this marital status', parseMaritalStatus)
    .option('--flat-type <type>', 'Only applications for this flat type', parseFlatType)
    .action(async (options: ListOptions) => {
      try {
        const { coordinator } = await getCliContainer();
        const applications = unwrap(
          await coordinator.listApplications({
            projectId: options.project,
            status: options.status,
            maritalStatus: options.maritalStatus,
            flatType: options.flatType,
          }),
          'list applications',
        );

        if (applications.length === 0) {
          printInfo('No applications match');
          return;
        }

        console.log(`\nFound ${applications.length} application(s):\n`);
        printTable(
          ['ID', 'Applicant', 'Project', 'Flat Type', 'Status', 'Flat', 'Updated At'],
          applications.map((a) => [
            a.id,
            a.applicantId,
            a.projectId,
            formatFlatType(a.flatType),
            formatStatus(a.status),
            a.bookedFlatId || '-',
            formatDate(a.statusUpdatedAt),
          ]),
        );
      } catch (error) {
        printError(`Failed to list applications: ${(error as Error).message}`);
        process.exit(1);
      }
    });

  // overview shows an applicant's active application and booked flat
  applicationCmd
    .command('overview')
    .description("Show an applicant's active application and booked flat")
    .argument('<nric>', 'Applicant NRIC', parseNric)
    .action(async (nric: string) => {
      try {
        const { coordinator } = await getCliContainer();
        const overview = unwrap(await coordinator.getApplicantOverview(nric), 'load overview');
        const { applicant, activeApplication, bookedFlat } = overview;

        console.log('\n=== Applicant ===\n');
        printTable(
          ['Field', 'Value'],
          [
            ['NRIC', applicant.nric],
            ['Name', applicant.name],
            ['Age', applicant.age.toString()],
            ['Marital Status', applicant.maritalStatus],
            ['Role', applicant.role],
            ['Active Application', activeApplication ? activeApplication.id : '-'],
            ['Status', activeApplication ? formatStatus(activeApplication.status) : '-'],
            ['Booked Flat', bookedFlat ? `${bookedFlat.id} (${formatFlatType(bookedFlat.flatType)})` : '-'],
          ],
        );

        if (overview.applications.length > 1) {
          printInfo(`${overview.applications.length} application(s) on record`);
        }
      } catch (error) {
        printError(`Failed to load overview: ${(error as Error).message}`);
        process.exit(1);
      }
    });
}
