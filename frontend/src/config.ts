import { z } from 'zod';

const EnvSchema = z.object({
  VITE_DEBUG_ENGINE: z
    .string()
    .optional()
    .transform((value) => value === 'true')
});

export interface FrontendConfig {
  debugEngine: boolean;
}

export const parseConfig = (env: Record<string, unknown>): FrontendConfig => {
  const parsed = EnvSchema.parse(env);
  return {
    debugEngine: parsed.VITE_DEBUG_ENGINE
  };
};

export const config = parseConfig(import.meta.env);
