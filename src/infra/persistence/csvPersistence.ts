import fs from 'fs';
import path from 'path';
import Papa from 'papaparse';
import { ZodError } from 'zod';
import type { Logger, PersistencePort, ProjectRecord, UserRecord, UserRole } from '../../core/ports';
import { KeyedLock } from '../../core/application/KeyedLock';
import type { InMemoryRepositories } from '../services/inMemoryRepositories';
import {
  applicationTable,
  auditTable,
  flatTable,
  projectTable,
  registrationTable,
  userTable,
  type CsvTable,
} from './csvTables';

export interface CsvPersistenceOptions {
  dataDir: string;
  dateFormat: string;
  logger: Logger;
}

const USER_ROLES: UserRole[] = ['applicant', 'officer', 'manager'];

// Every load and save shares one key; saves from different projects write the same files
const DATA_FILES_KEY = 'data-files';

/**
 * Loads every collection from one CSV file each under `dataDir` into the
 * in-memory repositories, and writes them all back on `saveAll`.
 *
 * Files are written to a temporary sibling first and renamed into place,
 * so an interrupted save never leaves a half-written file. Rows end in a
 * bare \n on both write and read.
 */
export class CsvPersistence implements PersistencePort {
  private readonly dataDir: string;
  private readonly logger: Logger;
  private readonly projectTable: CsvTable<ProjectRecord>;
  private readonly lock = new KeyedLock();

  constructor(
    private readonly repositories: InMemoryRepositories,
    options: CsvPersistenceOptions,
  ) {
    this.dataDir = options.dataDir;
    this.logger = options.logger;
    this.projectTable = projectTable(options.dateFormat);
  }

  async loadAll(): Promise<void> {
    await this.lock.run(DATA_FILES_KEY, () => this.readAll());
  }

  async saveAll(): Promise<void> {
    await this.lock.run(DATA_FILES_KEY, () => this.writeAll());
  }

  private async readAll(): Promise<void> {
    // Later role files win, so an applicant promoted to officer loads as an officer
    const users = new Map<string, UserRecord>();
    for (const role of USER_ROLES) {
      for (const user of await this.readTable(userTable(role))) {
        users.set(user.nric, user);
      }
    }

    const { repositories } = this;
    repositories.users.replaceAll([...users.values()]);
    repositories.projects.replaceAll(await this.readTable(this.projectTable));
    repositories.applications.replaceAll(await this.readTable(applicationTable));
    repositories.flats.replaceAll(await this.readTable(flatTable));
    repositories.registrations.replaceAll(await this.readTable(registrationTable));
    repositories.audit.replaceAll(await this.readTable(auditTable));

    this.logger.info(
      {
        dataDir: this.dataDir,
        users: users.size,
        projects: repositories.projects.snapshot().length,
        applications: repositories.applications.snapshot().length,
      },
      'Loaded data files',
    );
  }

  private async writeAll(): Promise<void> {
    const { repositories } = this;
    await fs.promises.mkdir(this.dataDir, { recursive: true });

    const users = repositories.users.snapshot();
    for (const role of USER_ROLES) {
      await this.writeTable(
        userTable(role),
        users.filter((user) => user.role === role),
      );
    }
    await this.writeTable(this.projectTable, repositories.projects.snapshot());
    await this.writeTable(applicationTable, repositories.applications.snapshot());
    await this.writeTable(flatTable, repositories.flats.snapshot());
    await this.writeTable(registrationTable, repositories.registrations.snapshot());
    await this.writeTable(auditTable, repositories.audit.snapshot());

    this.logger.debug({ dataDir: this.dataDir }, 'Saved data files');
  }

  private async readTable<T>(table: CsvTable<T>): Promise<T[]> {
    const filePath = path.join(this.dataDir, table.fileName);
    if (!fs.existsSync(filePath)) {
      this.logger.debug({ filePath }, 'Data file missing, starting empty');
      return [];
    }

    // Hand-edited files may carry \r\n line endings
    const text = (await fs.promises.readFile(filePath, 'utf-8')).replace(/\r\n/g, '\n');
    // Positional rows; the first row is the header
    const result = Papa.parse<string[]>(text, { delimiter: ',', newline: '\n', skipEmptyLines: true });
    const fatal = result.errors.filter((error) => error.type !== 'FieldMismatch');
    if (fatal.length > 0) {
      const first = fatal[0];
      throw new Error(`Failed to parse ${filePath} at row ${first.row ?? '?'}: ${first.message}`);
    }

    return result.data.slice(1).map((row, index) => {
      try {
        return table.fromRow(row);
      } catch (error) {
        // +2: header row plus 1-based numbering
        throw new Error(`Invalid row ${index + 2} in ${filePath}: ${describeError(error)}`);
      }
    });
  }

  private async writeTable<T>(table: CsvTable<T>, records: T[]): Promise<void> {
    const filePath = path.join(this.dataDir, table.fileName);
    const csv = Papa.unparse(
      {
        fields: [...table.headers],
        data: records.map((record) => table.toRow(record)),
      },
      { newline: '\n' },
    );

    const tempPath = `${filePath}.tmp`;
    await fs.promises.writeFile(tempPath, `${csv}\n`, 'utf-8');
    await fs.promises.rename(tempPath, filePath);
  }
}

const describeError = (error: unknown): string => {
  if (error instanceof ZodError) {
    return error.issues.map((issue) => `${issue.path.join('.') || 'row'}: ${issue.message}`).join('; ');
  }
  return error instanceof Error ? error.message : String(error);
};
