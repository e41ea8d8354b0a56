import { Command } from 'commander';
import { env } from '../../infra/env';
import { getCliContainer } from '../container';
import { printTable, printError } from '../utils/output';

export function registerConfigCommands(program: Command): void {
  const configCmd = program
    .command('config')
    .description('Configuration viewing');

  configCmd
    .command('show')
    .description('Display current configuration')
    .action(async () => {
      try {
        const { config } = await getCliContainer();

        console.log('\n=== Current Configuration ===\n');

        console.log('Environment:');
        printTable(
          ['Setting', 'Value'],
          [
            ['Data Directory', env.DATA_DIR],
            ['Policy File', env.POLICY_PATH],
            ['Environment', env.NODE_ENV],
          ],
        );

        // Eligibility
        const eligibility = config.eligibility();
        console.log('\nEligibility:');
        printTable(
          ['Setting', 'Value'],
          [
            ['Single minimum age', eligibility.singleMinAge.toString()],
            ['Married minimum age', eligibility.marriedMinAge.toString()],
          ],
        );

        // Allocation and limits
        console.log('\nAllocation:');
        printTable(
          ['Setting', 'Value'],
          [
            ['Reservation point', config.allocation().reservationPoint],
            ['Max officer slots', config.projectLimits().maxOfficerSlots.toString()],
            ['Date format', config.storage().dateFormat],
          ],
        );
      } catch (error) {
        printError(`Failed to show config: ${(error as Error).message}`);
        process.exit(1);
      }
    });
}
