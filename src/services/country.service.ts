import countryAliases from '../data/country-aliases.json';
import type { Repositories } from '../repositories/types';

const ALIASES = new Map<string, string>(Object.entries(countryAliases));

/**
 * Canonical two-letter code for a free-text country name or code, matched
 * case-insensitively against the alias table. Unknown names give null.
 */
export function normalizeCountryCode(input: string | null | undefined): string | null {
  const key = input?.trim().toUpperCase();
  if (!key) return null;
  return ALIASES.get(key) ?? null;
}

export interface CountryResolution {
  countryId: number | null;
  created: boolean;
}

/** Finds the country row for `input` by its canonical code, creating it when missing. */
export async function getOrCreateCountry(db: Repositories, input: string | null | undefined): Promise<CountryResolution> {
  const code = normalizeCountryCode(input);
  if (!code) {
    return { countryId: null, created: false };
  }

  const existing = await db.countries.findByName(code);
  if (existing) {
    return { countryId: existing.id, created: false };
  }

  const country = await db.countries.create(code);
  return { countryId: country.id, created: true };
}
