import type { PropertyRecord } from '../db/types.js';
import { buildLookupUrl, hasStreetNumber } from './parcel-lookup.js';

const MAPS_SEARCH_URL = 'https://www.google.com/maps/search/?api=1&query=';
const LISTING_SEARCH_URL = 'https://www.zillow.com/homes/';

export type LinkableRecord = Pick<
  PropertyRecord,
  'apn' | 'address' | 'city' | 'state' | 'zip' | 'assessor_url' | 'resolved_situs'
>;

export interface RecordLinks {
  maps_url: string;
  listing_url: string | null;
}

function quotePlus(value: string): string {
  return encodeURIComponent(value).replace(/%20/g, '+');
}

export function postalQuery(record: LinkableRecord): string {
  return `${record.address}, ${record.city}, ${record.state} ${record.zip ?? ''}`.trim();
}

/** A real street address for the record, if one is known. */
export function streetAddress(record: LinkableRecord): string | null {
  const situs = record.resolved_situs?.trim();
  if (situs) {
    return situs;
  }
  if (hasStreetNumber(record.address)) {
    return postalQuery(record);
  }
  return null;
}

/**
 * Map deep link: the resolved situs, then a street-numbered address, then the
 * parcel lookup page. Records with neither an address nor a parcel number
 * fall back to a text search on whatever postal fields they carry.
 */
export function mapsUrl(record: LinkableRecord, lookupUrlTemplate: string): string {
  const street = streetAddress(record);
  if (street) {
    return `${MAPS_SEARCH_URL}${quotePlus(street)}`;
  }

  if (record.apn?.trim()) {
    return record.assessor_url || buildLookupUrl(record.apn, lookupUrlTemplate);
  }

  return `${MAPS_SEARCH_URL}${quotePlus(postalQuery(record))}`;
}

/** Listing-site search; omitted unless a genuine street address exists. */
export function listingUrl(record: LinkableRecord): string | null {
  const street = streetAddress(record);
  return street ? `${LISTING_SEARCH_URL}${quotePlus(street)}_rb/` : null;
}

export function buildRecordLinks(record: LinkableRecord, lookupUrlTemplate: string): RecordLinks {
  return {
    maps_url: mapsUrl(record, lookupUrlTemplate),
    listing_url: listingUrl(record),
  };
}
