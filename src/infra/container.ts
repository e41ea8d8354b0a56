import path from 'path';
import { AllocationCoordinator } from '../core/application/orchestrator/AllocationCoordinator';
import type { Clock, Config } from '../core/ports';
import { logger } from './logger';
import { env } from './env';
import { CsvPersistence } from './persistence/csvPersistence';
import { ConfigImpl, loadPolicyConfig } from './services/Config';
import { createInMemoryRepositories, type InMemoryRepositories } from './services/inMemoryRepositories';

export interface AppContainer {
  coordinator: AllocationCoordinator;
  repositories: InMemoryRepositories;
  persistence: CsvPersistence;
  config: Config;
}

export interface ContainerOptions {
  dataDir?: string;
  policyPath?: string;
  clock?: Clock;
}

// Wire config, repositories, CSV persistence and the coordinator
// Data files are loaded before the container is returned
export async function buildAppContainer(options: ContainerOptions = {}): Promise<AppContainer> {
  const policyPath = resolveFromRoot(options.policyPath ?? env.POLICY_PATH);
  const dataDir = resolveFromRoot(options.dataDir ?? env.DATA_DIR);

  const config: Config = new ConfigImpl(loadPolicyConfig(policyPath));
  const repositories = createInMemoryRepositories();
  const persistence = new CsvPersistence(repositories, {
    dataDir,
    dateFormat: config.storage().dateFormat,
    logger,
  });

  await persistence.loadAll();

  const coordinator = new AllocationCoordinator({
    ...repositories,
    persistence,
    config,
    logger,
    clock: options.clock,
  });

  logger.debug(
    { policyPath, dataDir, reservationPoint: config.allocation().reservationPoint },
    'Application container ready',
  );

  return { coordinator, repositories, persistence, config };
}

function resolveFromRoot(relative: string): string {
  return path.resolve(process.cwd(), relative);
}
