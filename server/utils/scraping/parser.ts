/**
 * HTML Parser Utilities
 *
 * Helper functions for reading rendered KBO pages with Cheerio.
 * Every reader returns an empty or zero value instead of throwing,
 * so extraction strategies can treat "absent" and "unreadable" alike.
 */

import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';
import { coerceCount } from '@shared/schema';

export interface TableView {
  /** Header labels, whitespace-collapsed and upper-cased */
  headers: string[];
  /** Body rows (th and td cells in document order), whitespace-collapsed */
  rows: string[][];
}

const VENUE_PREFIX = /^\s*(?:venue|stadium|ballpark|구장|장소|경기장)\s*[:：]\s*/i;
const TRAILING_PARENTHETICAL = /\s*[(（][^()（）]*[)）]\s*$/;

export class HTMLParser {
  static load(html: string): cheerio.CheerioAPI {
    return cheerio.load(html);
  }

  /**
   * Collapse whitespace (including non-breaking spaces) and trim
   */
  static cleanText(text: string | null | undefined): string {
    if (!text) return '';
    return text.replace(/\u00a0/g, ' ').replace(/\s+/g, ' ').trim();
  }

  static extractText($elem: cheerio.Cheerio<AnyNode>): string {
    return this.cleanText($elem.text());
  }

  /**
   * First integer substring in noisy text ("3점", " 12 ", "F/10" -> 10), or 0
   */
  static extractInt(text: string | null | undefined): number {
    return coerceCount(text ?? '');
  }

  /**
   * True when the text is a bare integer cell (allows surrounding whitespace)
   */
  static isIntegerCell(text: string): boolean {
    return /^\d+$/.test(text.trim());
  }

  /**
   * Read the first table that exists for any of the selectors.
   * Returns null when none of them is present or none has body rows.
   */
  static readTable($: cheerio.CheerioAPI, selectors: readonly string[]): TableView | null {
    for (const selector of selectors) {
      const $table = $(selector).first();
      if ($table.length === 0) continue;

      const headers = $table
        .find('thead th, thead td')
        .toArray()
        .map((th) => this.cleanText($(th).text()).toUpperCase());

      const rows: string[][] = [];
      $table.find('tbody tr').each((_, tr) => {
        const cells = $(tr)
          .find('th, td')
          .toArray()
          .map((cell) => this.cleanText($(cell).text()));
        if (cells.length > 0) rows.push(cells);
      });

      if (rows.length > 0) return { headers, rows };
    }
    return null;
  }

  /**
   * Index of the first header matching one of the synonyms, or -1
   */
  static findColumn(headers: readonly string[], synonyms: readonly string[]): number {
    const wanted = synonyms.map((s) => s.toUpperCase());
    return headers.findIndex((h) => wanted.includes(h));
  }

  /**
   * Collect the text of every element matching the selector
   */
  static extractTextArray($: cheerio.CheerioAPI, selector: string): string[] {
    return $(selector)
      .toArray()
      .map((elem) => this.cleanText($(elem).text()))
      .filter((text) => text.length > 0);
  }

  /**
   * Drop "구장:"-style label prefixes and trailing parenthetical notes from a venue string
   */
  static stripVenueNoise(text: string): string {
    let venue = this.cleanText(text).replace(VENUE_PREFIX, '');
    while (TRAILING_PARENTHETICAL.test(venue)) {
      venue = venue.replace(TRAILING_PARENTHETICAL, '');
    }
    return this.cleanText(venue);
  }
}
