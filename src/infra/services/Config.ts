import type { Config, EligibilityRules, LimitsConfig } from '../../core/ports';
import type { PolicyConfig } from '../config/policySchema';

// Synchronous configuration service implementing Config port interface
// Config is loaded at startup from policy.json and doesn't change
// private readonly means the policy cannot be modified after construction
export class ConfigImpl implements Config {
  constructor(private readonly policy: PolicyConfig) {}

  // Return eligibility thresholds; arrays are copied so callers cannot edit the policy
  eligibility(): EligibilityRules {
    return {
      singleMinAge: this.policy.eligibility.singleMinAge,
      singleFlatTypes: [...this.policy.eligibility.singleFlatTypes],
      marriedMinAge: this.policy.eligibility.marriedMinAge,
      marriedFlatTypes: [...this.policy.eligibility.marriedFlatTypes],
    };
  }

  limits(): LimitsConfig {
    return {
      maxOfficerSlots: this.policy.limits.maxOfficerSlots,
    };
  }
}
