import { describe, expect, it } from 'vitest';
import { createMemoryRepositories } from '../../__tests__/helpers/memory-repositories';
import { getOrCreateCountry, normalizeCountryCode } from '../country.service';

describe('normalizeCountryCode', () => {
  it.each([
    ['United States', 'US'],
    ['usa', 'US'],
    ['  Puerto Rico ', 'PR'],
    ['República Dominicana', 'DO'],
    ['Republica Dominicana', 'DO'],
    ['méxico', 'MX'],
    ['uk', 'GB'],
  ])('maps %s to %s', (input, code) => {
    expect(normalizeCountryCode(input)).toBe(code);
  });

  it('returns null for blank or unknown input', () => {
    expect(normalizeCountryCode(null)).toBeNull();
    expect(normalizeCountryCode('   ')).toBeNull();
    expect(normalizeCountryCode('Atlantis')).toBeNull();
  });
});

describe('getOrCreateCountry', () => {
  it('creates the country row once and reuses it afterwards', async () => {
    const db = createMemoryRepositories();

    const first = await getOrCreateCountry(db, 'Puerto Rico');
    const second = await getOrCreateCountry(db, 'PR');

    expect(first).toEqual({ countryId: 1, created: true });
    expect(second).toEqual({ countryId: 1, created: false });
    expect(await db.countries.list()).toEqual([{ id: 1, name: 'PR' }]);
  });

  it('creates nothing for unknown names', async () => {
    const db = createMemoryRepositories();

    expect(await getOrCreateCountry(db, 'Narnia')).toEqual({ countryId: null, created: false });
    expect(await db.countries.list()).toEqual([]);
  });
});
