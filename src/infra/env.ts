import dotenv from 'dotenv';
import { z } from 'zod';

// Load .env file into process.env
dotenv.config();

// Zod schema validates environment variables at runtime
// .default() provides fallback if not set
// z.enum() restricts to specific values
const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  POLICY_PATH: z.string().min(1).default('config/policy.json'),
  SEED_PATH: z.string().min(1).default('config/seed.json'),
});

export type Env = z.infer<typeof EnvSchema>;

// Parse and validate process.env against schema
// Throws error if validation fails
export const env: Env = EnvSchema.parse(process.env);
