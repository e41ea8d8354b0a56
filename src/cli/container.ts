// Dependency container for CLI commands
// Uses singleton pattern to reuse container across commands in one process

import { buildAppContainer, type AppContainer } from '../infra/container';

export type CliContainer = AppContainer;

// Cached container instance (singleton pattern)
let container: CliContainer | null = null;

// Get or create CLI container
// Returns cached instance if already created
// Loads policy and every data file on first call
export async function getCliContainer(): Promise<CliContainer> {
  if (container) {
    return container;
  }

  container = await buildAppContainer();
  return container;
}

