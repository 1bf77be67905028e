import { describe, it, expect, vi } from 'vitest';
import { MESSAGES } from '../data/prompts';
import type { GeocodeMatch } from '../types';
import { SlotValidationService, titleCase } from './slotValidationService';

const session = { sessionId: 'session-1' };

function geocoderReturning(match: GeocodeMatch | null) {
  return { geocode: vi.fn(async (_query: string): Promise<GeocodeMatch | null> => match) };
}

describe('SlotValidationService', () => {
  describe('validateLocation', () => {
    it('rejects a blank location', async () => {
      const geocoder = geocoderReturning(null);
      const service = new SlotValidationService(geocoder);

      await expect(service.validateLocation('   ', session)).resolves.toEqual({ value: null, message: MESSAGES.noLocation });
      await expect(service.validateLocation(undefined, session)).resolves.toEqual({ value: null, message: MESSAGES.noLocation });
      expect(geocoder.geocode).not.toHaveBeenCalled();
    });

    it('rejects vague phrases without geocoding', async () => {
      const geocoder = geocoderReturning(null);
      const service = new SlotValidationService(geocoder);

      const result = await service.validateLocation('  Home ', session);

      expect(result).toEqual({
        value: null,
        message: "'Home' is too vague. Please provide: City + Landmark (e.g., 'Berlin, Alexanderplatz').",
      });
      expect(geocoder.geocode).not.toHaveBeenCalled();
    });

    it('rejects numeric and too-short input', async () => {
      const service = new SlotValidationService(geocoderReturning(null));

      await expect(service.validateLocation('10115', session)).resolves.toEqual({
        value: null,
        message: "'10115' seems incomplete. Please provide full location (City + Landmark).",
      });
      await expect(service.validateLocation('abc', session)).resolves.toEqual({
        value: null,
        message: "'abc' seems incomplete. Please provide full location (City + Landmark).",
      });
    });

    it('counts characters, not UTF-16 units, for the length rule', async () => {
      const geocoder = geocoderReturning(null);
      const service = new SlotValidationService(geocoder);

      await expect(service.validateLocation('𝔸𝔹', session)).resolves.toEqual({
        value: null,
        message: "'𝔸𝔹' seems incomplete. Please provide full location (City + Landmark).",
      });
      expect(geocoder.geocode).not.toHaveBeenCalled();
    });

    it('accepts a geocoded location as verified', async () => {
      const geocoder = geocoderReturning({
        displayName: 'Alexanderplatz, Mitte, Berlin, Deutschland',
        latitude: 52.5219,
        longitude: 13.4132,
      });
      const service = new SlotValidationService(geocoder);

      const result = await service.validateLocation('Alexanderplatz Berlin', session);

      expect(geocoder.geocode).toHaveBeenCalledWith('Alexanderplatz Berlin');
      expect(result).toEqual({
        value: {
          name: 'Alexanderplatz, Mitte, Berlin, Deutschland',
          verified: true,
          coordinates: { latitude: 52.5219, longitude: 13.4132 },
        },
        message: null,
      });
    });

    it('gives the same result when a verified location is validated again', async () => {
      const service = new SlotValidationService(geocoderReturning({
        displayName: 'Marienplatz, München',
        latitude: 48.1374,
        longitude: 11.5755,
      }));

      const first = await service.validateLocation('Marienplatz Munich', session);
      const second = await service.validateLocation('Marienplatz Munich', session);

      expect(second).toEqual(first);
    });

    it('accepts a known city unverified and title-cased when geocoding fails', async () => {
      const service = new SlotValidationService(geocoderReturning(null));

      await expect(service.validateLocation('frankfurt am main', session)).resolves.toEqual({
        value: { name: 'Frankfurt Am Main', verified: false, coordinates: null },
        message: null,
      });
      await expect(service.validateLocation('DÜSSELDORF', session)).resolves.toEqual({
        value: { name: 'Düsseldorf', verified: false, coordinates: null },
        message: null,
      });
    });

    it('accepts an unknown place unverified and asks for a landmark', async () => {
      const service = new SlotValidationService(geocoderReturning(null));

      const result = await service.validateLocation('Springfield', session);

      expect(result).toEqual({
        value: { name: 'Springfield', verified: false, coordinates: null },
        message: MESSAGES.unverifiedLocation,
      });
    });
  });

  describe('validatePeopleCount', () => {
    const service = new SlotValidationService(geocoderReturning(null));

    it('leaves the slot unset without complaint when empty', () => {
      expect(service.validatePeopleCount('', session)).toEqual({ value: null, message: null });
      expect(service.validatePeopleCount(null, session)).toEqual({ value: null, message: null });
    });

    it('normalizes positive integers to strings', () => {
      expect(service.validatePeopleCount(' 07 ', session)).toEqual({ value: '7', message: null });
      expect(service.validatePeopleCount(3, session)).toEqual({ value: '3', message: null });
      expect(service.validatePeopleCount('+0005', session)).toEqual({ value: '5', message: null });
    });

    it('keeps every digit of counts beyond double precision', () => {
      expect(service.validatePeopleCount('1000000000000000000000', session)).toEqual({
        value: '1000000000000000000000',
        message: null,
      });
      expect(service.validatePeopleCount('9007199254740993', session)).toEqual({ value: '9007199254740993', message: null });
    });

    it('rejects zero and negatives', () => {
      expect(service.validatePeopleCount('0', session)).toEqual({ value: null, message: MESSAGES.peopleNotPositive });
      expect(service.validatePeopleCount('-2', session)).toEqual({ value: null, message: MESSAGES.peopleNotPositive });
      expect(service.validatePeopleCount('-0', session)).toEqual({ value: null, message: MESSAGES.peopleNotPositive });
      expect(service.validatePeopleCount('000', session)).toEqual({ value: null, message: MESSAGES.peopleNotPositive });
    });

    it('rejects non-integers', () => {
      expect(service.validatePeopleCount('two', session)).toEqual({ value: null, message: MESSAGES.peopleNotNumber });
      expect(service.validatePeopleCount('2.5', session)).toEqual({ value: null, message: MESSAGES.peopleNotNumber });
    });
  });

  describe('validateVulnerability', () => {
    const service = new SlotValidationService(geocoderReturning(null));

    it('re-asks when a greeting lands in the slot', () => {
      expect(service.validateVulnerability('Hi', session)).toEqual({ value: null, message: MESSAGES.reaskVulnerability });
    });

    it('keeps the description verbatim', () => {
      expect(service.validateVulnerability(' 2 children ', session)).toEqual({ value: '2 children', message: null });
    });

    it('leaves the slot unset when empty', () => {
      expect(service.validateVulnerability(undefined, session)).toEqual({ value: null, message: null });
    });
  });

  describe('validateMobilityStatus', () => {
    const service = new SlotValidationService(geocoderReturning(null));

    it('maps synonyms to yes / no / unsure with an acknowledgment', () => {
      expect(service.validateMobilityStatus('Yeah', session)).toEqual({ value: 'yes', message: MESSAGES.mobilityYes });
      expect(service.validateMobilityStatus('stuck', session)).toEqual({ value: 'no', message: MESSAGES.mobilityNo });
      expect(service.validateMobilityStatus("can't move", session)).toEqual({ value: 'no', message: MESSAGES.mobilityNo });
      expect(service.validateMobilityStatus('maybe', session)).toEqual({ value: 'unsure', message: MESSAGES.mobilityUnsure });
    });

    it('re-asks on filler words', () => {
      expect(service.validateMobilityStatus('where', session)).toEqual({ value: null, message: MESSAGES.reaskMobility });
    });

    it('keeps unmapped answers as typed', () => {
      expect(service.validateMobilityStatus('on crutches', session)).toEqual({ value: 'on crutches', message: null });
    });
  });

  describe('validateInjuryStatus', () => {
    const service = new SlotValidationService(geocoderReturning(null));

    it('maps synonyms to yes / no / unsure with an acknowledgment', () => {
      expect(service.validateInjuryStatus('bleeding', session)).toEqual({ value: 'yes', message: MESSAGES.injuryYes });
      expect(service.validateInjuryStatus('Okay', session)).toEqual({ value: 'no', message: MESSAGES.injuryNo });
      expect(service.validateInjuryStatus('unclear', session)).toEqual({ value: 'unsure', message: MESSAGES.injuryUnsure });
    });

    it('re-asks on filler words', () => {
      expect(service.validateInjuryStatus('help', session)).toEqual({ value: null, message: MESSAGES.reaskInjury });
    });

    it('keeps unmapped answers as typed', () => {
      expect(service.validateInjuryStatus('a few scratches', session)).toEqual({ value: 'a few scratches', message: null });
    });
  });

  describe('validate', () => {
    it('dispatches by slot name', async () => {
      const service = new SlotValidationService(geocoderReturning(null));

      await expect(service.validate('people_count', '4', session)).resolves.toEqual({ value: '4', message: null });
      await expect(service.validate('injury_status', 'no', session)).resolves.toEqual({ value: 'no', message: MESSAGES.injuryNo });
      await expect(service.validate('location', 'here', session)).resolves.toEqual({
        value: null,
        message: "'here' is too vague. Please provide: City + Landmark (e.g., 'Berlin, Alexanderplatz').",
      });
    });
  });
});

describe('titleCase', () => {
  it('capitalizes each word', () => {
    expect(titleCase('frankfurt am main')).toBe('Frankfurt Am Main');
    expect(titleCase('NÜRNBERG')).toBe('Nürnberg');
  });
});
