import * as cheerio from 'cheerio';

import type { LocationDefaults } from '../db/types.js';
import { requestText, type FetchLike, type RequestErrorKind } from '../http/request.js';
import { err, ok, type Result } from '../result.js';

// House number leads the value: "100 MAIN ST", "12B ELM AVE".
const STREET_NUMBER = /^\d{1,6}[A-Z]?\s+\S/i;
// "Location Code: 0042" and similar sub-labels are not the situs line.
const LOCATION_LINE = /^location\b(?!\s+\w+\s*:)\s*:?\s*(.*)$/i;
const TRAILING_ZIP = /\S\s+\d{5}(?:-\d{4})?$/;

export type LookupFailureKind = RequestErrorKind | 'invalid_apn' | 'no_location' | 'no_street_number';

export interface LookupFailure {
  kind: LookupFailureKind;
  lookupUrl: string;
  message: string;
}

export interface LookupSuccess {
  lookupUrl: string;
  location: string;
  situs: string;
}

export interface LookupOptions {
  urlTemplate: string;
  timeoutMs: number;
  defaults: LocationDefaults;
  fetchImpl?: FetchLike;
}

export function parcelDigits(apn: string | null | undefined): string {
  return (apn ?? '').replace(/\D+/g, '');
}

export function buildLookupUrl(apn: string | null | undefined, urlTemplate: string): string {
  return urlTemplate.split('{apn}').join(encodeURIComponent(parcelDigits(apn)));
}

/** True when the text starts with a house number followed by a street. */
export function hasStreetNumber(value: string | null | undefined): boolean {
  return STREET_NUMBER.test((value ?? '').trim());
}

/** Flattens markup into trimmed, non-empty text lines, one per block or table row. */
export function pageLines(body: string): string[] {
  const $ = cheerio.load(body);
  $('script, style, noscript').remove();
  $('br').replaceWith('\n');
  $('td, th').append(' ');
  $('p, div, tr, li, dt, dd, h1, h2, h3, h4, h5, h6, table, section, article, label').append('\n');

  return $.root()
    .text()
    .split(/\r?\n/)
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter((line) => line.length > 0);
}

/**
 * Value of the first "Location"-labelled line. A bare label takes its value
 * from the following line, as in definition lists.
 */
export function extractLocation(body: string): string | null {
  const lines = pageLines(body);

  for (let index = 0; index < lines.length; index += 1) {
    const match = lines[index].match(LOCATION_LINE);
    if (!match) {
      continue;
    }

    const value = match[1].trim() || (lines[index + 1] ?? '').trim();
    return value || null;
  }

  return null;
}

/** Appends the default city, state and zip where the extracted text lacks them. */
export function normalizeSitus(location: string, defaults: LocationDefaults): string {
  const base = location.replace(/\s+/g, ' ').trim().replace(/[\s,]+$/, '');
  const lower = base.toLowerCase();

  const hasCity = lower.includes(defaults.city.toLowerCase());
  const hasState = new RegExp(`\\b${escapeRegExp(defaults.state)}\\b`, 'i').test(base);
  const hasZip = TRAILING_ZIP.test(base);

  let situs = hasCity ? base : `${base}, ${defaults.city}`;
  const tail = [hasState ? null : defaults.state, hasZip ? null : defaults.zip].filter(
    (part): part is string => Boolean(part),
  );
  if (tail.length > 0) {
    situs = `${situs}, ${tail.join(' ')}`;
  }
  return situs;
}

export async function lookupSitus(apn: string, options: LookupOptions): Promise<Result<LookupSuccess, LookupFailure>> {
  const lookupUrl = buildLookupUrl(apn, options.urlTemplate);

  if (!parcelDigits(apn)) {
    return err({ kind: 'invalid_apn', lookupUrl, message: `parcel number "${apn}" has no digits` });
  }

  const page = await requestText(lookupUrl, {
    timeoutMs: options.timeoutMs,
    fetchImpl: options.fetchImpl,
  });
  if (!page.ok) {
    return err({ kind: page.error.kind, lookupUrl, message: page.error.message });
  }

  const location = extractLocation(page.value);
  if (!location) {
    return err({ kind: 'no_location', lookupUrl, message: 'page has no Location line' });
  }

  if (!hasStreetNumber(location)) {
    return err({ kind: 'no_street_number', lookupUrl, message: `location "${location}" has no street number` });
  }

  return ok({
    lookupUrl,
    location,
    situs: normalizeSitus(location, options.defaults),
  });
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
