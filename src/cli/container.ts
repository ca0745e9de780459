// Lazily built container for CLI commands
// Uses singleton pattern so every command in one process shares the same in-memory state

import { buildContainerFromFiles, type AppContainer } from '../infra/container';
import { env } from '../infra/env';

// Cached container instance (singleton pattern)
let container: AppContainer | null = null;

// Get or create CLI container
// Returns cached instance if already created
// Loads policy and seed files named by POLICY_PATH and SEED_PATH on first call
export async function getCliContainer(): Promise<AppContainer> {
  if (container) {
    return container;
  }

  container = await buildContainerFromFiles({ policyPath: env.POLICY_PATH, seedPath: env.SEED_PATH });
  return container;
}

