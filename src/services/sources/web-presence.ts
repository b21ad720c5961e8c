import { load } from 'cheerio';
import { hasChildren, isText, type AnyNode } from 'domhandler';
import { z } from 'zod';
import type { ProviderRecord, WebMatch, WebPresenceData, WebPresenceResult } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import { phoneDigitsMatch, similarityRatio } from '../comparison/index.js';
import {
  parsePayload,
  requestFailedMessage,
  sourceFailure,
  sourceSuccess,
  type SourceClient,
  type SourceClientDeps,
} from './types.js';

export const WEB_SOURCE = 'Web Scraping';

export const WebConfidence = {
  BASE: 50,
  UNMATCHED_CONTACT: 60,
  MATCHED: 75,
} as const;

const ADDRESS_SIMILARITY_THRESHOLD = 0.7;
const ADDRESS_KEYWORDS = ['address', 'location', 'office', 'clinic'];

const PHONE_PATTERN = /\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/g;
const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;
const COPYRIGHT_PATTERN = /©|Copyright/;
const YEAR_PATTERN = /20\d{2}/;

const log = logger.child({ module: 'source-web' });

export interface ContactInfo {
  phonesFound: string[];
  addressesFound: string[];
  emailsFound: string[];
  lastUpdated: string | null;
}

/** Lowercase name without a leading "Dr" title or any non-alphanumerics. */
export function siteSlug(fullName: string): string {
  return fullName
    .toLowerCase()
    .trim()
    .replace(/^dr\.?\s+/, '')
    .replace(/[^a-z0-9]/g, '');
}

export function candidateUrls(fullName: string): string[] {
  const slug = siteSlug(fullName);
  if (!slug) return [];
  return [`https://www.${slug}.com`, `https://${slug}.com`, `https://www.${slug}md.com`];
}

function visibleStrings(nodes: readonly AnyNode[], out: string[] = []): string[] {
  for (const node of nodes) {
    if (isText(node)) {
      const text = node.data.trim();
      if (text) out.push(text);
    } else if (hasChildren(node)) {
      visibleStrings(node.children, out);
    }
  }
  return out;
}

export function extractContactInfo(html: string): ContactInfo {
  const $ = load(html);
  $('script, style, noscript').remove();

  const strings = visibleStrings($.root().toArray());
  const phonesFound = strings.flatMap((text) => text.match(PHONE_PATTERN) ?? []);
  const emailsFound = strings.flatMap((text) => text.match(EMAIL_PATTERN) ?? []);
  const addressesFound = $('p, div, span')
    .toArray()
    .map((element) => $(element).text().replace(/\s+/g, ' ').trim())
    .filter((text) => {
      const lower = text.toLowerCase();
      return ADDRESS_KEYWORDS.some((keyword) => lower.includes(keyword));
    });

  const copyright = strings.find((text) => COPYRIGHT_PATTERN.test(text));
  const year = copyright?.match(YEAR_PATTERN);

  return { phonesFound, addressesFound, emailsFound, lastUpdated: year ? year[0] : null };
}

export class WebPresenceClient implements SourceClient<WebPresenceData> {
  readonly source = WEB_SOURCE;
  private readonly deps: SourceClientDeps;

  constructor(deps: SourceClientDeps) {
    this.deps = deps;
  }

  async check(record: ProviderRecord, signal?: AbortSignal): Promise<WebPresenceResult> {
    if (!record.fullName.trim() || !record.city.trim() || !record.state.trim()) {
      return sourceFailure(this.source, WebConfidence.BASE, 'Insufficient information for web search');
    }

    const url = await this.findWebsite(record.fullName, signal);
    if (url === null) {
      return sourceFailure(this.source, WebConfidence.BASE, 'No website found');
    }

    const page = await this.deps.retry.execute(
      () => this.deps.http.get(url, { responseType: 'text', signal }),
      signal,
      { source: this.source, url },
    );
    if (!page.ok) {
      return sourceFailure(this.source, WebConfidence.BASE, requestFailedMessage(page.error));
    }

    const html = parsePayload(z.string(), page.value.data, this.source);
    if (!html.ok) {
      return sourceFailure(this.source, WebConfidence.BASE, requestFailedMessage(html.error));
    }

    const contact = extractContactInfo(html.value);
    const data: WebPresenceData = {
      url,
      phoneOnSite: contact.phonesFound[0] ?? null,
      addressOnSite: contact.addressesFound[0] ?? null,
      emailOnSite: contact.emailsFound[0] ?? null,
      lastUpdated: contact.lastUpdated,
      phonesFound: contact.phonesFound,
      addressesFound: contact.addressesFound,
      matches: [],
    };

    return this.score(data, record);
  }

  /** Probes each candidate once; only a plain 200 counts as a live site. */
  async findWebsite(fullName: string, signal?: AbortSignal): Promise<string | null> {
    for (const url of candidateUrls(fullName)) {
      if (signal?.aborted) return null;
      const probe = await this.deps.http.get(url, { responseType: 'text', signal });
      if (probe.ok && probe.value.status === 200) {
        log.debug({ url }, 'Provider website found');
        return url;
      }
    }
    return null;
  }

  private score(data: WebPresenceData, record: ProviderRecord): WebPresenceResult {
    const matches: WebMatch[] = [];
    let confidence: number = WebConfidence.BASE;

    if (record.phone && data.phoneOnSite && phoneDigitsMatch(record.phone, data.phoneOnSite)) {
      confidence = WebConfidence.MATCHED;
      matches.push('phone');
    }

    const inputAddress = `${record.practiceAddress}, ${record.city}, ${record.state}`.toLowerCase();
    if (data.addressOnSite && similarityRatio(inputAddress, data.addressOnSite.toLowerCase()) > ADDRESS_SIMILARITY_THRESHOLD) {
      confidence = Math.max(confidence, WebConfidence.MATCHED);
      matches.push('address');
    }

    if (matches.length >= 2) confidence = WebConfidence.MATCHED;

    const contactFound = data.phoneOnSite !== null || data.addressOnSite !== null;
    if (matches.length === 0 && contactFound) confidence = WebConfidence.UNMATCHED_CONTACT;

    const matchesInput = matches.length > 0 ? true : contactFound ? false : null;
    return sourceSuccess(this.source, confidence, { ...data, matches }, matchesInput);
  }
}
