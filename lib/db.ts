/**
 * Database connection and place queries for PostGIS.
 *
 * This module provides the connection pool and the PostGIS-backed
 * implementation of the places database the store reads from.
 */

import { Pool } from 'pg';
import type { PoolConfig } from 'pg';
import { z } from 'zod';
import { loadConfig } from './config';
import { WeeklySchedule, SchedulePeriodSchema } from './hours';
import { createLogger, errorMessage } from './logger';
import { RatingProviderSchema } from './types';
import type { LatLon, Place } from './types';

const log = createLogger('DB');

const MAX_DB_RESULTS = 200;

export interface PlacesDatabase {
  getPlaces(location: LatLon, radiusKm: number): Promise<Place[]>;
  getPlace(id: string): Promise<Place | null>;
}

// Minimal query surface; satisfied by pg.Pool and by test doubles
export interface Queryable {
  query(text: string, values: unknown[]): Promise<{ rows: unknown[] }>;
}

// Singleton pool instance
let pool: Pool | null = null;

/**
 * Get the database connection pool (lazy initialization).
 */
export function getPool(): Pool {
  if (!pool) {
    const config = loadConfig();
    const dbConfig: PoolConfig = {
      host: config.POSTGRES_HOST,
      port: config.POSTGRES_PORT,
      database: config.POSTGRES_DB,
      user: config.POSTGRES_USER,
      password: config.POSTGRES_PASSWORD,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    };
    pool = new Pool(dbConfig);

    pool.on('error', (err) => {
      log.error('Unexpected pool error:', err);
    });
  }
  return pool;
}

const PlaceRowSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  address: z.string().nullish(),
  lat: z.number(),
  lon: z.number(),
  categories: z.array(z.string()).nullish(),
  hours: z.array(SchedulePeriodSchema).nullish(),
  providers: z.array(RatingProviderSchema).min(1),
});

/**
 * Convert a row from public.places, or null if it is malformed.
 */
export function rowToPlace(row: unknown): Place | null {
  const parsed = PlaceRowSchema.safeParse(row);
  if (!parsed.success) {
    log.warn('Skipping malformed place row:', parsed.error.issues[0]?.message ?? 'invalid');
    return null;
  }
  const r = parsed.data;
  return {
    id: r.id,
    name: r.name,
    address: r.address ?? undefined,
    coordinate: { lat: r.lat, lon: r.lon },
    categories: r.categories ?? [],
    hours: r.hours ? new WeeklySchedule(r.hours) : undefined,
    ratingProviders: r.providers,
  };
}

const PLACE_COLUMNS = `
  id,
  name,
  address,
  ST_Y(geom) as lat,
  ST_X(geom) as lon,
  categories,
  hours,
  providers
`;

export class PostgisPlacesDatabase implements PlacesDatabase {
  constructor(private readonly db: Queryable = getPool()) {}

  /**
   * Places within radius of a point, nearest first.
   */
  async getPlaces(location: LatLon, radiusKm: number): Promise<Place[]> {
    const query = `
      SELECT ${PLACE_COLUMNS}
      FROM public.places
      WHERE ST_DWithin(
          geom::geography,
          ST_SetSRID(ST_MakePoint($2, $1), 4326)::geography,
          $3
        )
      ORDER BY ST_Distance(
          geom::geography,
          ST_SetSRID(ST_MakePoint($2, $1), 4326)::geography
        ) ASC
      LIMIT $4
    `;

    try {
      const result = await this.db.query(query, [location.lat, location.lon, radiusKm * 1000, MAX_DB_RESULTS]);
      const places = result.rows
        .map(rowToPlace)
        .filter((p): p is Place => p !== null);
      log.debug(`Returned ${places.length} places within ${radiusKm}km`);
      return places;
    } catch (error) {
      log.error('Radius query error:', errorMessage(error));
      throw error;
    }
  }

  async getPlace(id: string): Promise<Place | null> {
    const result = await this.db.query(`SELECT ${PLACE_COLUMNS} FROM public.places WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row === undefined ? null : rowToPlace(row);
  }
}
