import { describe, it, expect } from 'vitest';
import { HTMLParser } from '@server/utils/scraping/parser';

describe('HTMLParser', () => {
  describe('cleanText', () => {
    it('collapses whitespace and non-breaking spaces', () => {
      expect(HTMLParser.cleanText('  잠실\u00a0\u00a0야구장 \n')).toBe('잠실 야구장');
    });

    it('returns empty string for null and undefined', () => {
      expect(HTMLParser.cleanText(null)).toBe('');
      expect(HTMLParser.cleanText(undefined)).toBe('');
    });
  });

  describe('extractInt', () => {
    it('takes the first integer substring', () => {
      expect(HTMLParser.extractInt('3점')).toBe(3);
      expect(HTMLParser.extractInt(' 12 ')).toBe(12);
      expect(HTMLParser.extractInt('F/10')).toBe(10);
    });

    it('defaults to 0 when nothing parses', () => {
      expect(HTMLParser.extractInt('-')).toBe(0);
      expect(HTMLParser.extractInt('')).toBe(0);
      expect(HTMLParser.extractInt(null)).toBe(0);
    });
  });

  describe('stripVenueNoise', () => {
    it('drops label prefixes and trailing parentheticals', () => {
      expect(HTMLParser.stripVenueNoise('구장 : 잠실 (Jamsil)')).toBe('잠실');
      expect(HTMLParser.stripVenueNoise('Stadium: Sajik (부산) (관중 22,758)')).toBe('Sajik');
    });

    it('leaves a plain venue alone', () => {
      expect(HTMLParser.stripVenueNoise('고척스카이돔')).toBe('고척스카이돔');
    });
  });

  describe('readTable', () => {
    const html = `
      <table id="first"><thead><tr><th>팀</th><th>r</th></tr></thead><tbody></tbody></table>
      <table id="second">
        <thead><tr><th>팀</th><th>r</th><th>H</th></tr></thead>
        <tbody>
          <tr><th> 롯데 </th><td>2</td><td>7</td></tr>
          <tr><th>LG</th><td>12</td><td>10</td></tr>
        </tbody>
      </table>`;

    it('skips tables without body rows and upper-cases headers', () => {
      const $ = HTMLParser.load(html);
      expect(HTMLParser.readTable($, ['#missing', '#first', '#second'])).toEqual({
        headers: ['팀', 'R', 'H'],
        rows: [
          ['롯데', '2', '7'],
          ['LG', '12', '10'],
        ],
      });
    });

    it('returns null when no selector matches', () => {
      const $ = HTMLParser.load(html);
      expect(HTMLParser.readTable($, ['#nope'])).toBeNull();
    });
  });

  describe('findColumn', () => {
    it('matches any synonym case-insensitively', () => {
      expect(HTMLParser.findColumn(['팀', '득점', 'H'], ['r', '득점'])).toBe(1);
      expect(HTMLParser.findColumn(['팀', 'H'], ['R'])).toBe(-1);
    });
  });
});
