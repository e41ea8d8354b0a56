import Table from 'cli-table3';
import chalk from 'chalk';
import { format } from 'date-fns';
import type { ApplicationStatus, FlatInventory, RegistrationStatus } from '../../core/ports';
import { FLAT_TYPES } from '../../core/ports';
import { formatFlatType } from '../../core/domain/inventory';
import type { Result } from '../../core/domain/result';

// Print formatted table using cli-table3 with cyan headers
export function printTable(headers: string[], rows: string[][]): void {
  const table = new Table({
    head: headers.map((h) => chalk.cyan(h)),
    style: { head: [], border: [] },
  });

  // .forEach() iterates array and applies function to each element
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

// Print warning message with yellow warning icon
export function printWarning(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

// Print info message with blue info icon
export function printInfo(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

// Return the value of a successful result, or print the failure and exit
// process.exit() returns never, so the compiler narrows result to the ok branch below it
export function unwrap<T>(result: Result<T>, action: string): T {
  if (!result.ok) {
    printError(`Failed to ${action}: ${result.error.message} (${result.error.kind})`);
    process.exit(1);
  }
  return result.value;
}

// Format date for display. Returns - if null/undefined
export function formatDate(date: Date | null | undefined): string {
  if (!date) return '-';
  return date.toLocaleString();
}

// Calendar date in the same dd/MM/yyyy shape the data files use
export function formatDay(date: Date): string {
  return format(date, 'dd/MM/yyyy');
}

// Format application status with color coding
// Record<ApplicationStatus, typeof chalk.green> maps every status to a color function
export function formatStatus(status: ApplicationStatus): string {
  const colors: Record<ApplicationStatus, typeof chalk.green> = {
    PENDING: chalk.yellow,
    SUCCESSFUL: chalk.blue,
    BOOKED: chalk.green,
    UNSUCCESSFUL: chalk.red,
    WITHDRAWAL_REQUESTED: chalk.magenta,
  };

  return colors[status](status);
}

// Format officer registration status with color coding
export function formatRegistrationStatus(status: RegistrationStatus): string {
  const colors: Record<RegistrationStatus, typeof chalk.green> = {
    PENDING: chalk.yellow,
    APPROVED: chalk.green,
    REJECTED: chalk.red,
  };

  return colors[status](status);
}

// "2-Room 3/5, 3-Room 0/2" (available/total), or - when nothing is offered
export function formatInventory(inventory: FlatInventory): string {
  const parts = FLAT_TYPES.flatMap((type) => {
    const entry = inventory[type];
    return entry ? [`${formatFlatType(type)} ${entry.available}/${entry.total}`] : [];
  });
  return parts.join(', ') || '-';
}
