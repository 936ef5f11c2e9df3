/**
 * quizPageExtractor.ts: Parser for the quiz site's single-question page.
 *
 * Page anatomy (only `.selectList` is mandatory):
 *
 *   <h3 class="qno">問1</h3><div>question text</div>
 *   <ul class="selectList">
 *     <li><button>ア</button><span id="select_a">choice</span></li> …
 *   </ul>
 *   <span id="answerChar">ウ</span>
 *   <div id="kaisetsu">explanation</div>
 *   <h3>分類</h3><div>テクノロジ系 » 基礎理論 » 離散数学</div>
 *   <input type="hidden" name="_q" value="r06h_1">
 */

import * as cheerio from 'cheerio';
import { stableRecordId } from '../core/identity';
import { Logger } from '../core/logger';
import { UNKNOWN_ANSWER } from '../core/schema';
import type { CandidateRecord, SessionMeta } from '../core/types';
import { BaseExtractor } from './baseExtractor';

const logger = new Logger('QuizPageExtractor');

/** Choice element ids in display order, with the katakana label of each. */
const CHOICE_SLOTS: ReadonlyArray<readonly [id: string, label: string]> = [
  ['select_a', 'ア'],
  ['select_i', 'イ'],
  ['select_u', 'ウ'],
  ['select_e', 'エ'],
];

const UNKNOWN_CATEGORY = 'unknown';
const PATH_SEPARATOR = ' » ';

export class QuizPageExtractor extends BaseExtractor {
  async extract(html: string, session: SessionMeta): Promise<CandidateRecord[]> {
    const $ = cheerio.load(html);

    if ($('.selectList').length === 0) {
      logger.debug(`No .selectList on page for ${session.label}`);
      return [];
    }

    const text = this.textOf($, 'h3.qno + div') || null;
    const choices = this.extractChoices($);
    const answerIndex = this.extractAnswerIndex($);
    const categoryPath = this.extractCategoryPath($);

    return [
      {
        id: this.extractId($, session),
        partitionKey: session.partitionKey,
        category:
          categoryPath.length > 0
            ? categoryPath.join(PATH_SEPARATOR)
            : UNKNOWN_CATEGORY,
        categoryPath,
        text,
        choices,
        answerIndex,
        explanation: this.textOf($, '#kaisetsu') ?? '',
        sourceUrl: this.canonicalUrl($, session.baseUrl),
      },
    ];
  }

  // ── Private helpers ────────────────────────────────────

  /**
   * Choices in ア/イ/ウ/エ order.  A choice with no text (an image-only
   * answer) falls back to its image alt text, then to its katakana label,
   * so every slot stays addressable by `answerIndex`.
   */
  private extractChoices($: cheerio.CheerioAPI): string[] {
    return CHOICE_SLOTS.map(([id, label]) => {
      const el = $(`#${id}`).first();
      const text = this.collapse(el.text());
      if (text) return text;
      const alt = el.find('img').first().attr('alt')?.trim();
      return alt || label;
    });
  }

  private extractAnswerIndex($: cheerio.CheerioAPI): number {
    const answerChar = this.textOf($, '#answerChar') ?? '';
    const index = CHOICE_SLOTS.findIndex(([, label]) => label === answerChar);
    return index === -1 ? UNKNOWN_ANSWER : index;
  }

  /** Labels of the "分類" breadcrumb, e.g. ["テクノロジ系", "基礎理論"]. */
  private extractCategoryPath($: cheerio.CheerioAPI): string[] {
    const heading = $('h3')
      .filter((_, el) => $(el).text().includes('分類'))
      .first();
    if (heading.length === 0) return [];

    const block = heading.nextAll('div').first();
    if (block.length === 0) return [];

    return this.collapse(block.text())
      .replace(/[＞>]/g, '»')
      .split(/\s*»\s*/)
      .map((part) => part.trim())
      .filter((part) => part.length > 0);
  }

  /** `p{year}-q{nnn}` from the trailing number of the `_q` token, if any. */
  private extractId($: cheerio.CheerioAPI, session: SessionMeta): string | null {
    const token = this.inputValue($, '_q');
    if (!token) return null;
    const last = token.split('_').pop() ?? '';
    if (!/^\d+$/.test(last)) return null;
    return stableRecordId(session.partitionKey, parseInt(last, 10));
  }
}
