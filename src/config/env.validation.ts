import { z } from 'zod';

/**
 * Environment schema. Numbers are coerced from their string form and every
 * key has a default, so an empty environment is valid.
 */
export const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(3000),

  // Local language model
  OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
  OLLAMA_MODEL: z.string().min(1).default('llama3.1'),

  // Image synthesis backend
  COMFYUI_API_URL: z.string().url().default('http://127.0.0.1:8188'),
  COMFYUI_CHECKPOINT: z.string().min(1).default('flux1-dev-fp8.safetensors'),
  COMFYUI_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  IMAGE_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  IMAGE_POLL_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * `validate` hook for `ConfigModule.forRoot`. Throws with every offending key
 * listed so a bad deployment fails at boot.
 */
export function validateEnv(config: Record<string, unknown>): Env {
  const parsed = EnvSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}
