/**
 * @fileOverview: Known issuing agencies with acronyms, for display and question parsing
 * @module: AgencyDirectory
 */

import { z } from 'zod';
import agencyData from '../data/agencies.json';

const AgencyEntrySchema = z.object({
  acronym: z.string().min(1),
  name: z.string().min(1),
  slug: z.string().min(1),
});

export type AgencyEntry = z.infer<typeof AgencyEntrySchema>;

export const KNOWN_AGENCIES: readonly AgencyEntry[] = z.array(AgencyEntrySchema).parse(agencyData);

const bySlug = new Map(KNOWN_AGENCIES.map(entry => [entry.slug, entry]));
const byName = new Map(KNOWN_AGENCIES.map(entry => [entry.name.toLowerCase(), entry]));

export function findAgency(slugOrName: string): AgencyEntry | undefined {
  return bySlug.get(slugOrName) ?? byName.get(slugOrName.toLowerCase());
}

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/&/g, ' ')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}
