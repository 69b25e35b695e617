import { z } from 'zod';

const ConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  // Normally delivered by remote config
  SEARCH_RADIUS_KM: z.coerce.number().positive().default(4),
  TRAVEL_TIME_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  PLACE_LOOKUP_CACHE_SIZE: z.coerce.number().int().positive().default(200),
  POSTGRES_HOST: z.string().default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
  POSTGRES_DB: z.string().default('nearby_places'),
  POSTGRES_USER: z.string().default('places_user'),
  POSTGRES_PASSWORD: z.string().default('places_secret'),
  GOOGLE_MAPS_API_KEY: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Parse configuration from the environment. Throws on invalid values.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}
