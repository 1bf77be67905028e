import type { GeocodeMatch } from '../types';
import { createLogger } from '../utils/logger';
import type { NominatimClient } from './nominatimClient';

const logger = createLogger('Geocoding');

export interface Geocoder {
  geocode(query: string): Promise<GeocodeMatch | null>;
}

function toCoordinate(raw: string | number | undefined): number | null {
  if (raw === undefined) return null;
  if (typeof raw === 'string' && !raw.trim()) return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

export class GeocodingService implements Geocoder {
  constructor(private readonly client: Pick<NominatimClient, 'search'>) {}

  async geocode(query: string): Promise<GeocodeMatch | null> {
    const places = await this.client.search(query, { limit: 1 });
    if (!places || places.length === 0) {
      logger.debug('No geocoding match', { query });
      return null;
    }

    const top = places[0];
    const latitude = toCoordinate(top.lat);
    const longitude = toCoordinate(top.lon);
    if (latitude === null || longitude === null) {
      logger.warn('Geocoding match without usable coordinates', { query });
      return null;
    }

    return {
      displayName: top.display_name || query,
      latitude,
      longitude,
    };
  }
}
