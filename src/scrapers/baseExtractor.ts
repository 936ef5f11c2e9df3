/**
 * baseExtractor.ts: Extractor contract + cheerio helpers shared by page parsers.
 *
 * An extractor turns one response body into zero or more candidate records.
 * It must not throw on missing fields: absent text becomes `null`, absent
 * explanation becomes `""`, an unreadable answer becomes -1.  The store's
 * validation is the final guard on whatever comes out.
 *
 * Adding support for another quiz layout is "extend BaseExtractor, implement
 * extract()"; the text helpers below come along for free.
 */

import * as cheerio from 'cheerio';
import type { CandidateRecord, SessionMeta } from '../core/types';

/** The boundary the SessionWalker depends on. */
export interface RecordExtractor {
  extract(html: string, session: SessionMeta): Promise<CandidateRecord[]>;
}

export abstract class BaseExtractor implements RecordExtractor {
  /**
   * Parse `html` fetched for `session` into candidate records.
   * An empty array means "this page holds no question".
   */
  abstract extract(html: string, session: SessionMeta): Promise<CandidateRecord[]>;

  // ── Text helpers ───────────────────────────────────────

  /** Collapse runs of whitespace (including newlines and NBSP) to one space. */
  protected collapse(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
  }

  /** Collapsed text of the first match, or null when nothing matches. */
  protected textOf($: cheerio.CheerioAPI, selector: string): string | null {
    const el = $(selector).first();
    if (el.length === 0) return null;
    return this.collapse(el.text());
  }

  /** `value` of the first `<input name=…>`, or null when absent. */
  protected inputValue($: cheerio.CheerioAPI, name: string): string | null {
    return $(`input[name="${name}"]`).first().attr('value') ?? null;
  }

  /**
   * Canonical page URL: `og:url`, then `<link rel="canonical">`, then the
   * caller's fallback.
   */
  protected canonicalUrl($: cheerio.CheerioAPI, fallback: string): string {
    const og = $('meta[property="og:url"]').attr('content')?.trim();
    if (og) return og;
    const canonical = $('link[rel="canonical"]').attr('href')?.trim();
    if (canonical) return canonical;
    return fallback;
  }
}
