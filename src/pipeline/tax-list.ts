import type { Database } from 'better-sqlite3';
import * as cheerio from 'cheerio';

import { replaceStageRecords } from '../db/records.js';
import { UNKNOWN_ADDRESS, type LocationDefaults, type NewPropertyRecord } from '../db/types.js';
import { requestDocument, requestText, type FetchedDocument, type FetchLike } from '../http/request.js';
import { err, ok, type Result } from '../result.js';
import { pageLines } from './parcel-lookup.js';

const PARCEL_NUMBER = /\b\d{2}-\d{4}-\d{2}\b/g;

export const TAX_LIST_DOC_TYPE = 'Delinquent Tax Sale Parcel List';

/** Turns a fetched document into text. PDF extraction lives outside this project. */
export type DocumentTextExtractor = (document: FetchedDocument) => Promise<string>;

export interface ReplaceTaxRecordsOptions {
  defaults: LocationDefaults;
  sourceUrl: string | null;
  docType?: string;
}

export interface TaxRefreshOptions extends ReplaceTaxRecordsOptions {
  pageUrl: string;
  fallbackUrl: string;
  timeoutMs: number;
  documentUrl?: string;
  documentText?: string;
  extractText?: DocumentTextExtractor;
  fetchImpl?: FetchLike;
}

export interface TaxRefreshSummary {
  source_url: string | null;
  parcels: number;
  deleted: number;
  inserted: number;
}

export interface TaxRefreshFailure {
  reason: 'fetch_failed' | 'unsupported_document' | 'extract_failed' | 'no_parcels';
  source_url: string | null;
  message: string;
}

/** Parcel numbers (NN-NNNN-NN) in first-seen order, without duplicates. */
export function extractParcelNumbers(text: string): string[] {
  return Array.from(new Set(text.match(PARCEL_NUMBER) ?? []));
}

/**
 * Picks the first PDF link on the listing page whose text or href mentions
 * parcels or delinquency ("sale" alone is not enough).
 */
export function discoverTaxListUrl(pageHtml: string, pageUrl: string): string | null {
  const $ = cheerio.load(pageHtml);

  for (const anchor of $('a[href]').toArray()) {
    const href = ($(anchor).attr('href') ?? '').trim();
    const text = $(anchor).text().trim().toLowerCase();
    const lowerHref = href.toLowerCase();
    if (!lowerHref.includes('.pdf')) {
      continue;
    }

    const mentions = (word: string) => text.includes(word) || lowerHref.includes(word);
    let score = 0;
    if (mentions('parcel')) score += 2;
    if (mentions('delinquent')) score += 2;
    if (mentions('sale')) score += 1;

    if (score >= 2) {
      try {
        return new URL(href, pageUrl).toString();
      } catch {
        continue;
      }
    }
  }

  return null;
}

/**
 * Deletes every tax-delinquency record and inserts one placeholder per parcel
 * number, leaving street addresses to the resolver.
 */
export function replaceTaxRecords(
  db: Database,
  parcelNumbers: string[],
  options: ReplaceTaxRecordsOptions,
): { deleted: number; inserted: number } {
  const unique = Array.from(new Set(parcelNumbers.map((apn) => apn.trim()).filter((apn) => apn.length > 0)));
  const records: NewPropertyRecord[] = unique.map((apn) => ({
    stage: 'TAX_DELINQUENCY',
    apn,
    address: UNKNOWN_ADDRESS,
    city: options.defaults.city,
    state: options.defaults.state,
    zip: options.defaults.zip,
    record_date: null,
    doc_type: options.docType ?? TAX_LIST_DOC_TYPE,
    source_url: options.sourceUrl,
  }));

  return replaceStageRecords(db, 'TAX_DELINQUENCY', records);
}

async function resolveDocumentUrl(options: TaxRefreshOptions): Promise<string> {
  if (options.documentUrl) {
    return options.documentUrl;
  }

  const page = await requestText(options.pageUrl, {
    timeoutMs: options.timeoutMs,
    fetchImpl: options.fetchImpl,
  });
  if (!page.ok) {
    console.error(`distress-tracker: tax list page unavailable (${page.error.message}); using fallback document`);
    return options.fallbackUrl;
  }
  return discoverTaxListUrl(page.value, options.pageUrl) ?? options.fallbackUrl;
}

function isPdf(document: FetchedDocument): boolean {
  return document.contentType.toLowerCase().includes('pdf') || document.body.subarray(0, 5).toString('latin1') === '%PDF-';
}

async function documentToText(
  document: FetchedDocument,
  extractText: DocumentTextExtractor | undefined,
): Promise<Result<string, TaxRefreshFailure>> {
  if (extractText) {
    try {
      return ok(await extractText(document));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return err({ reason: 'extract_failed', source_url: document.url, message });
    }
  }

  if (isPdf(document)) {
    return err({
      reason: 'unsupported_document',
      source_url: document.url,
      message: 'document is a PDF and no text extractor is configured',
    });
  }

  const body = document.body.toString('utf8');
  return ok(document.contentType.toLowerCase().includes('html') ? pageLines(body).join('\n') : body);
}

/**
 * Refreshes the tax-delinquency list. Any failure before the replace leaves the
 * store as it was, and a document without parcel numbers never wipes the list.
 */
export async function refreshTaxList(
  db: Database,
  options: TaxRefreshOptions,
): Promise<Result<TaxRefreshSummary, TaxRefreshFailure>> {
  let sourceUrl: string | null = options.sourceUrl;
  let text: string;

  if (options.documentText !== undefined) {
    text = options.documentText;
  } else {
    sourceUrl = await resolveDocumentUrl(options);
    const document = await requestDocument(sourceUrl, {
      timeoutMs: options.timeoutMs,
      fetchImpl: options.fetchImpl,
    });
    if (!document.ok) {
      return err({ reason: 'fetch_failed', source_url: sourceUrl, message: document.error.message });
    }

    const extracted = await documentToText(document.value, options.extractText);
    if (!extracted.ok) {
      return extracted;
    }
    text = extracted.value;
  }

  const parcels = extractParcelNumbers(text);
  if (parcels.length === 0) {
    return err({ reason: 'no_parcels', source_url: sourceUrl, message: 'no parcel numbers found in the document' });
  }

  const { deleted, inserted } = replaceTaxRecords(db, parcels, { ...options, sourceUrl });
  return ok({
    source_url: sourceUrl,
    parcels: parcels.length,
    deleted,
    inserted,
  });
}
