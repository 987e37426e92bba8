import { z } from 'zod';

export type ApiConfig = {
  port: number;
  /** Sessions untouched for this long are discarded */
  sessionIdleMinutes: number;
  webAppUrl: string;
};

const ApiEnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  SESSION_IDLE_MINUTES: z.coerce.number().int().positive().default(120),
  WEB_APP_URL: z.string().url().default('http://localhost:5173'),
});

/**
 * Load HTTP server settings from the environment
 *
 * @throws Error naming every invalid variable
 */
export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const result = ApiEnvSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid API configuration: ${errors}`);
  }

  return {
    port: result.data.PORT,
    sessionIdleMinutes: result.data.SESSION_IDLE_MINUTES,
    webAppUrl: result.data.WEB_APP_URL,
  };
}
