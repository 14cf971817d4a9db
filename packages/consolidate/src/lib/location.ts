import { resolve } from "path";
import { z } from "zod";
import { getConfigDir, readJsonFile } from "./json";
import { cleanString, normalizeTerm } from "./normalize";
import type { ProfileLocation } from "./types";

const locationDataSchema = z.object({
  countries: z.array(
    z.object({
      code: z.string().length(2),
      name: z.string().min(1),
      aliases: z.array(z.string().min(1)),
    }),
  ),
  regions: z.array(
    z.object({
      code: z.string().min(2),
      name: z.string().min(1),
      country: z.string().length(2),
    }),
  ),
  cities: z.array(
    z.object({
      aliases: z.array(z.string().min(1)).min(1),
      city: z.string().min(1),
      region: z.string().nullable(),
      country: z.string().length(2),
    }),
  ),
});

type LocationData = z.infer<typeof locationDataSchema>;
type Country = LocationData["countries"][number];
type Region = LocationData["regions"][number];
type City = LocationData["cities"][number];

export type LocationLookup = {
  countries: Map<string, Country>;
  countriesByCode: Map<string, Country>;
  regions: Map<string, Region[]>;
  cities: Map<string, City>;
};

const pushTo = <T>(map: Map<string, T[]>, key: string, value: T) => {
  const existing = map.get(key);
  if (existing) {
    existing.push(value);
  } else {
    map.set(key, [value]);
  }
};

export const buildLocationLookup = (data: LocationData): LocationLookup => {
  const countries = new Map<string, Country>();
  const countriesByCode = new Map<string, Country>();
  for (const country of data.countries) {
    countriesByCode.set(country.code, country);
    for (const alias of [country.name, ...country.aliases]) {
      countries.set(normalizeTerm(alias), country);
    }
  }

  const regions = new Map<string, Region[]>();
  for (const region of data.regions) {
    pushTo(regions, normalizeTerm(region.code), region);
    pushTo(regions, normalizeTerm(region.name), region);
  }

  const cities = new Map<string, City>();
  for (const city of data.cities) {
    for (const alias of city.aliases) {
      cities.set(normalizeTerm(alias), city);
    }
  }

  return { countries, countriesByCode, regions, cities };
};

let defaultLookup: LocationLookup | null = null;

export const loadLocationLookup = (filePath = resolve(getConfigDir(), "locations.json")) =>
  buildLocationLookup(readJsonFile(filePath, locationDataSchema));

const getDefaultLookup = () => {
  if (!defaultLookup) {
    defaultLookup = loadLocationLookup();
  }
  return defaultLookup;
};

const findRegion = (lookup: LocationLookup, value: string, countryCode: string | null) => {
  const matches = lookup.regions.get(normalizeTerm(value));
  if (!matches) {
    return null;
  }
  if (countryCode) {
    return matches.find((region) => region.country === countryCode) ?? null;
  }
  return matches[0] ?? null;
};

export const parseLocation = (
  raw: string | null | undefined,
  lookup: LocationLookup = getDefaultLookup(),
): ProfileLocation | null => {
  const cleaned = cleanString(raw);
  if (!cleaned) {
    return null;
  }

  const parts = cleaned
    .split(/[,|]/)
    .map((part) => part.trim())
    .filter(Boolean);

  let country: Country | null = null;
  let region: Region | null = null;
  let city: string | null = null;

  const last = parts[parts.length - 1];
  if (last) {
    const matched = lookup.countries.get(normalizeTerm(last));
    if (matched && (parts.length > 1 || !lookup.cities.has(normalizeTerm(last)))) {
      country = matched;
      parts.pop();
    }
  }

  if (parts.length > 1) {
    const candidate = parts[parts.length - 1];
    const matched = findRegion(lookup, candidate, country?.code ?? null);
    if (matched) {
      region = matched;
      parts.pop();
    }
  }

  if (parts.length) {
    const head = parts[0];
    const knownCity = lookup.cities.get(normalizeTerm(head));
    if (knownCity) {
      city = knownCity.city;
      if (!country) {
        country = lookup.countriesByCode.get(knownCity.country) ?? null;
      }
      if (!region && knownCity.region && knownCity.country === country?.code) {
        region = findRegion(lookup, knownCity.region, knownCity.country);
      }
    } else if (parts.length === 1 && !country && !region) {
      const regionOnly = findRegion(lookup, head, null);
      if (regionOnly && regionOnly.name.toLowerCase() === head.toLowerCase()) {
        region = regionOnly;
      } else {
        city = head;
      }
    } else {
      city = head;
    }
  }

  if (!country && region) {
    country = lookup.countriesByCode.get(region.country) ?? null;
  }

  return {
    raw: cleaned,
    city,
    state: region?.name ?? null,
    country: country?.name ?? null,
    countryCode: country?.code ?? null,
  };
};

export const locationSignature = (location: ProfileLocation | null) => {
  if (!location?.city) {
    return null;
  }
  return [normalizeTerm(location.city), location.countryCode?.toLowerCase() ?? ""].join("|");
};

export const countryNameForCode = (
  code: string | null,
  lookup: LocationLookup = getDefaultLookup(),
) => (code ? lookup.countriesByCode.get(code.trim().toUpperCase())?.name ?? null : null);
