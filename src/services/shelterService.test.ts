import { describe, it, expect, vi } from 'vitest';
import type { NominatimPlace, SearchParams } from './nominatimClient';
import { ShelterService, viewboxAround } from './shelterService';

const berlin = { latitude: 52.52, longitude: 13.405 };

function clientWith(results: Record<string, NominatimPlace[] | null>) {
  return {
    search: vi.fn(async (query: string, _params?: SearchParams): Promise<NominatimPlace[] | null> => results[query] ?? null),
  };
}

describe('viewboxAround', () => {
  it('builds left,top,right,bottom from the radius', () => {
    expect(viewboxAround({ latitude: 52, longitude: 13 }, 111)).toBe('12,53,14,51');
  });
});

describe('ShelterService', () => {
  it('queries every shelter term inside the bounded viewbox', async () => {
    const client = clientWith({});
    const service = new ShelterService(client);

    await service.findShelters(berlin);

    expect(client.search.mock.calls.map(([query]) => query)).toEqual([
      'emergency shelter',
      'evacuation center',
      'community center',
      'shelter',
    ]);
    expect(client.search).toHaveBeenCalledWith('emergency shelter', {
      limit: 5,
      bounded: 1,
      viewbox: viewboxAround(berlin, 5),
    });
  });

  it('deduplicates names in first-seen order and skips failed queries', async () => {
    const service = new ShelterService(clientWith({
      'emergency shelter': [{ display_name: 'Notunterkunft Mitte' }, { display_name: 'Turnhalle Nord' }],
      'evacuation center': null,
      'community center': [{ display_name: 'Turnhalle Nord' }, { lat: '52.5' }, { display_name: 'Gemeindezentrum Ost' }],
      shelter: [],
    }));

    await expect(service.findShelters(berlin)).resolves.toEqual([
      'Notunterkunft Mitte',
      'Turnhalle Nord',
      'Gemeindezentrum Ost',
    ]);
  });

  it('stops querying once the limit is reached', async () => {
    const client = clientWith({
      'emergency shelter': [
        { display_name: 'Shelter A' },
        { display_name: 'Shelter B' },
        { display_name: 'Shelter C' },
      ],
    });
    const service = new ShelterService(client);

    await expect(service.findShelters(berlin, 5, 2)).resolves.toEqual(['Shelter A', 'Shelter B']);
    expect(client.search).toHaveBeenCalledTimes(1);
  });

  it('returns an empty list when every query fails', async () => {
    const client = clientWith({});
    const service = new ShelterService(client);

    await expect(service.findShelters(berlin)).resolves.toEqual([]);
    expect(client.search).toHaveBeenCalledTimes(4);
  });
});
