import { SHELTER_QUERIES } from '../data/vocabulary';
import type { Coordinates } from '../types';
import { createLogger } from '../utils/logger';
import type { NominatimClient } from './nominatimClient';

const logger = createLogger('Shelters');

const KM_PER_DEGREE = 111;

export const DEFAULT_SHELTER_RADIUS_KM = 5;
export const DEFAULT_SHELTER_LIMIT = 5;

export interface ShelterFinder {
  findShelters(coordinates: Coordinates, radiusKm?: number, limit?: number): Promise<string[]>;
}

/** left,top,right,bottom around the point; 1° is taken as 111km on both axes. */
export function viewboxAround({ latitude, longitude }: Coordinates, radiusKm: number): string {
  const delta = radiusKm / KM_PER_DEGREE;
  return [longitude - delta, latitude + delta, longitude + delta, latitude - delta].join(',');
}

export class ShelterService implements ShelterFinder {
  constructor(private readonly client: Pick<NominatimClient, 'search'>) {}

  async findShelters(
    coordinates: Coordinates,
    radiusKm: number = DEFAULT_SHELTER_RADIUS_KM,
    limit: number = DEFAULT_SHELTER_LIMIT,
  ): Promise<string[]> {
    const viewbox = viewboxAround(coordinates, radiusKm);
    const results: string[] = [];

    for (const query of SHELTER_QUERIES) {
      const places = await this.client.search(query, { limit, bounded: 1, viewbox });
      if (!places) continue;

      for (const place of places) {
        const name = place.display_name;
        if (name && !results.includes(name)) {
          results.push(name);
        }
        if (results.length >= limit) {
          logger.debug('Shelter limit reached', { query, count: results.length });
          return results;
        }
      }
    }

    logger.debug('Shelter lookup finished', { count: results.length, viewbox });
    return results.slice(0, limit);
  }
}
