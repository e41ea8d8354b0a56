import dotenv from 'dotenv';
import { z } from 'zod';

// Load .env file into process.env
dotenv.config();

// Zod schema validates environment variables at runtime
// .default() provides fallback if not set
// z.enum() restricts to specific values
const EnvSchema = z.object({
  DATA_DIR: z.string().min(1).default('data'),
  POLICY_PATH: z.string().min(1).default('config/policy.json'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof EnvSchema>;

// Parse and validate an environment object against the schema
// Throws ZodError listing every invalid variable
export const parseEnv = (source: NodeJS.ProcessEnv): Env => EnvSchema.parse(source);

export const env: Env = parseEnv(process.env);
