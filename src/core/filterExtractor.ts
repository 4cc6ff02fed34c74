/**
 * @fileOverview: Best-effort extraction of agency, date and document-type filters from a free-text question
 * @module: FilterExtractor
 * @keyFunctions:
 *   - extractFilters(): SearchFilters or null; never throws
 * @context: Pattern matching only. Agencies are recognised by acronym (case-sensitive) or full name; dates by ISO
 * dates, month names, years and relative phrases such as "last 30 days". Anything unrecognised yields no filter.
 */

import { logger } from '../utils/logger';
import { getErrorMessage } from '../utils/errorHandler';
import { AgencyEntry, KNOWN_AGENCIES } from '../shared/agencies';
import { SearchFilters } from '../shared/types';

export interface FilterExtractionOptions {
  /** Reference time for relative phrases */
  now?: Date;
  agencies?: readonly AgencyEntry[];
}

interface DateRange {
  startDate?: string;
  endDate?: string;
}

const RECENT_DAYS = 90;

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

const DOCUMENT_TYPE_PATTERNS: Array<{ pattern: RegExp; type: string }> = [
  { pattern: /\bproposed rules?\b/i, type: 'Proposed Rule' },
  { pattern: /\bfinal rules?\b/i, type: 'Rule' },
  { pattern: /\bnotices?\b/i, type: 'Notice' },
  { pattern: /\b(?:presidential documents?|executive orders?|proclamations?)\b/i, type: 'Presidential Document' },
];

const UNIT_DAYS: Record<string, number> = { day: 1, week: 7 };

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function lastDayOfMonth(year: number, monthIndex: number): string {
  return isoDate(new Date(Date.UTC(year, monthIndex + 1, 0)));
}

function isValidIso(value: string): boolean {
  const date = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(date.getTime()) && isoDate(date) === value;
}

function extractAgencies(question: string, agencies: readonly AgencyEntry[]): string[] {
  const lower = question.toLowerCase();
  const found: string[] = [];

  for (const entry of agencies) {
    const byAcronym = new RegExp(`(^|[^A-Za-z])${escapeRegExp(entry.acronym)}($|[^A-Za-z])`).test(question);
    const byName = new RegExp(`\\b${escapeRegExp(entry.name.toLowerCase())}\\b`).test(lower);
    if ((byAcronym || byName) && !found.includes(entry.name)) {
      found.push(entry.name);
    }
  }

  return found;
}

function extractIsoRange(question: string): DateRange | null {
  const matches = [...question.matchAll(/\b(\d{4}-\d{2}-\d{2})\b/g)]
    .map(match => ({ value: match[1], index: match.index ?? 0 }))
    .filter(match => isValidIso(match.value));
  if (matches.length === 0) return null;

  if (matches.length >= 2) {
    const [a, b] = [matches[0].value, matches[1].value].sort();
    return { startDate: a, endDate: b };
  }

  const { value, index } = matches[0];
  const before = question.slice(0, index).toLowerCase();
  if (/\b(since|after|from|starting)\s*$/.test(before)) return { startDate: value };
  if (/\b(before|until|through|by)\s*$/.test(before)) return { endDate: value };
  return { startDate: value, endDate: value };
}

function extractMonthRange(question: string): DateRange | null {
  const match = question.match(new RegExp(`\\b(${MONTHS.join('|')})\\s+(\\d{4})\\b`, 'i'));
  if (!match) return null;

  const monthIndex = MONTHS.indexOf(match[1].toLowerCase());
  const year = Number(match[2]);
  const month = String(monthIndex + 1).padStart(2, '0');
  return { startDate: `${year}-${month}-01`, endDate: lastDayOfMonth(year, monthIndex) };
}

function extractYearRange(question: string): DateRange | null {
  const range = question.match(/\b(?:between|from)\s+((?:19|20)\d{2})\s+(?:and|to|through|-)\s+((?:19|20)\d{2})\b/i);
  const dashed = range ?? question.match(/\b((?:19|20)\d{2})\s*[-–]\s*((?:19|20)\d{2})\b/);
  if (dashed) {
    const [from, to] = [Number(dashed[1]), Number(dashed[2])].sort((a, b) => a - b);
    return { startDate: `${from}-01-01`, endDate: `${to}-12-31` };
  }

  const bounded = question.match(/\b(since|after|before|until|prior to)\s+((?:19|20)\d{2})\b/i);
  if (bounded) {
    const year = Number(bounded[2]);
    switch (bounded[1].toLowerCase()) {
      case 'since':
        return { startDate: `${year}-01-01` };
      case 'after':
        return { startDate: `${year + 1}-01-01` };
      case 'until':
        return { endDate: `${year}-12-31` };
      default:
        return { endDate: `${year - 1}-12-31` };
    }
  }

  const single = question.match(/\b((?:19|20)\d{2})\b/);
  if (single) {
    return { startDate: `${single[1]}-01-01`, endDate: `${single[1]}-12-31` };
  }
  return null;
}

function extractRelativeRange(question: string, now: Date): DateRange | null {
  const lower = question.toLowerCase();
  const today = isoDate(now);
  const year = now.getUTCFullYear();

  const counted = lower.match(/\b(?:last|past|previous)\s+(\d{1,3})\s+(day|week|month|year)s?\b/);
  if (counted) {
    const amount = Number(counted[1]);
    const unit = counted[2];
    const start = new Date(now.getTime());
    if (unit === 'month') {
      start.setUTCMonth(start.getUTCMonth() - amount);
    } else if (unit === 'year') {
      start.setUTCFullYear(start.getUTCFullYear() - amount);
    } else {
      start.setUTCDate(start.getUTCDate() - amount * UNIT_DAYS[unit]);
    }
    return { startDate: isoDate(start), endDate: today };
  }

  if (/\blast year\b/.test(lower)) return { startDate: `${year - 1}-01-01`, endDate: `${year - 1}-12-31` };
  if (/\bthis year\b/.test(lower)) return { startDate: `${year}-01-01`, endDate: today };

  const singular = lower.match(/\b(?:last|past)\s+(day|week|month)\b/);
  if (singular) {
    const start = new Date(now.getTime());
    if (singular[1] === 'month') {
      start.setUTCMonth(start.getUTCMonth() - 1);
    } else {
      start.setUTCDate(start.getUTCDate() - UNIT_DAYS[singular[1]]);
    }
    return { startDate: isoDate(start), endDate: today };
  }

  if (/\brecent(ly)?\b/.test(lower)) {
    const start = new Date(now.getTime());
    start.setUTCDate(start.getUTCDate() - RECENT_DAYS);
    return { startDate: isoDate(start), endDate: today };
  }

  return null;
}

function extractDocumentTypes(question: string): string[] {
  const types: string[] = [];
  for (const { pattern, type } of DOCUMENT_TYPE_PATTERNS) {
    if (pattern.test(question) && !types.includes(type)) types.push(type);
  }
  return types;
}

/**
 * Structured filters found in `question`, or null when there are none
 */
export function extractFilters(question: string, options: FilterExtractionOptions = {}): SearchFilters | null {
  try {
    const now = options.now ?? new Date();
    const filters: SearchFilters = {};

    const agencies = extractAgencies(question, options.agencies ?? KNOWN_AGENCIES);
    if (agencies.length > 0) filters.agencies = agencies;

    const range =
      extractIsoRange(question) ??
      extractMonthRange(question) ??
      extractRelativeRange(question, now) ??
      extractYearRange(question);
    if (range?.startDate) filters.startDate = range.startDate;
    if (range?.endDate) filters.endDate = range.endDate;

    const documentTypes = extractDocumentTypes(question);
    if (documentTypes.length > 0) filters.documentTypes = documentTypes;

    return Object.keys(filters).length > 0 ? filters : null;
  } catch (error) {
    logger.debug('Filter extraction skipped', { error: getErrorMessage(error) });
    return null;
  }
}
