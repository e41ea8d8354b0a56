import { Command } from 'commander';
import { APPLICATION_STATUSES } from '../../core/ports';
import { getCliContainer } from '../container';
import { formatDate, formatInventory, formatStatus, printError, printInfo, printSuccess, printTable, unwrap } from '../utils/output';

// Register system commands (status, audit, flush)
export function registerSystemCommands(program: Command): void {
  // status command shows application counts by status and inventory per project
  program
    .command('status')
    .description('Show application statistics and project inventory')
    .action(async () => {
      try {
        const { coordinator, repositories, config } = await getCliContainer();
        const applications = unwrap(await coordinator.listApplications(), 'load applications');

        console.log(`\n=== Reservation point: ${config.allocation().reservationPoint} ===\n`);

        console.log('Application Statistics:');
        // .filter().length counts applications in each status
        printTable(
          ['Status', 'Count'],
          APPLICATION_STATUSES.map((status) => [
            formatStatus(status),
            applications.filter((a) => a.status === status).length.toString(),
          ]),
        );

        const projects = await repositories.projects.list();
        console.log('\nProject Inventory:');
        printTable(
          ['Project', 'Units (available/total)', 'Officers'],
          projects.map((p) => [p.id, formatInventory(p.inventory), `${p.officerIds.length}/${p.officerSlots}`]),
        );

        const pending = applications.filter((a) => a.status === 'PENDING' || a.status === 'WITHDRAWAL_REQUESTED');
        if (pending.length > 0) {
          printInfo(`\n${pending.length} application(s) awaiting a manager`);
        } else {
          printInfo('\nNo applications awaiting a manager');
        }
      } catch (error) {
        printError(`Failed to get status: ${(error as Error).message}`);
        process.exit(1);
      }
    });

  // audit command shows the audit trail for one entity, or every entry when no id is given
  program
    .command('audit [entityId]')
    .description('View the audit log for an application, project or registration')
    .action(async (entityId?: string) => {
      try {
        const { coordinator } = await getCliContainer();
        const entries = unwrap(await coordinator.auditTrail(entityId), 'get audit log');

        if (entries.length === 0) {
          printInfo(entityId ? `No audit entries found for ${entityId}` : 'Audit log is empty');
          return;
        }

        printTable(
          ['Timestamp', 'Entity', 'Action', 'From State', 'To State', 'Actor Type', 'Actor ID'],
          entries.map((entry) => [
            formatDate(entry.timestamp),
            entry.entityId,
            entry.action,
            entry.fromState || '-',
            entry.toState || '-',
            entry.actorType,
            entry.actorId || '-',
          ]),
        );
      } catch (error) {
        printError(`Failed to get audit log: ${(error as Error).message}`);
        process.exit(1);
      }
    });

  // flush rewrites every data file from the loaded state
  program
    .command('flush')
    .description('Rewrite all data files')
    .action(async () => {
      try {
        const { coordinator } = await getCliContainer();
        unwrap(await coordinator.flush(), 'flush data files');
        printSuccess('Data files written');
      } catch (error) {
        printError(`Failed to flush data files: ${(error as Error).message}`);
        process.exit(1);
      }
    });
}
