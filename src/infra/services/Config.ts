import fs from 'fs';
import type {
  AllocationConfig,
  Config,
  EligibilityConfig,
  ProjectLimitsConfig,
  StorageConfig,
} from '../../core/ports';
import { PolicySchema, type PolicyConfig, type PolicyInput } from '../config/policySchema';

// Synchronous configuration service implementing Config port interface
// Config is loaded at startup from policy.json and doesn't change
// private readonly means the policy cannot be modified after construction
export class ConfigImpl implements Config {
  constructor(private readonly policy: PolicyConfig) {}

  // Build from an unvalidated object, applying schema defaults
  static fromInput(input: PolicyInput = {}): ConfigImpl {
    return new ConfigImpl(PolicySchema.parse(input));
  }

  eligibility(): EligibilityConfig {
    return { ...this.policy.eligibility };
  }

  allocation(): AllocationConfig {
    return { reservationPoint: this.policy.allocation.reservationPoint };
  }

  projectLimits(): ProjectLimitsConfig {
    return { maxOfficerSlots: this.policy.projects.maxOfficerSlots };
  }

  storage(): StorageConfig {
    return { dateFormat: this.policy.storage.dateFormat };
  }
}

// Load and validate policy config from JSON file
// Throws with the file path if the file is missing, unparseable or invalid
export function loadPolicyConfig(policyPath: string): PolicyConfig {
  try {
    const fileContents = fs.readFileSync(policyPath, 'utf-8');
    const raw: unknown = JSON.parse(fileContents);
    return PolicySchema.parse(raw);
  } catch (error) {
    throw new Error(
      `Failed to read configuration file at ${policyPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}
