/**
 * Team and Venue Mapper
 *
 * Maps team and ballpark names from the KBO pages to canonical values.
 * Teams resolve to KBO's own two-letter codes (the ones embedded in game ids,
 * e.g. 20250322LTLG0 is Lotte at LG); venues resolve to short English names.
 * Lookups ignore whitespace and case; unknown names pass through unchanged.
 */

import teamAliases from './data/teams.json';
import venueAliases from './data/venues.json';

export interface TeamMapping {
  [key: string]: string;
}

// Key used for alias lookups: whitespace removed, lower-cased
function lookupKey(name: string): string {
  return name.replace(/\s+/g, '').toLowerCase();
}

function buildMapping(aliases: Record<string, readonly string[]>): TeamMapping {
  const mapping: TeamMapping = {};
  for (const [canonical, names] of Object.entries(aliases)) {
    mapping[lookupKey(canonical)] = canonical;
    for (const name of names) {
      mapping[lookupKey(name)] = canonical;
    }
  }
  return Object.freeze(mapping);
}

export class TeamMapper {
  private static teams: TeamMapping = buildMapping(teamAliases);
  private static venues: TeamMapping = buildMapping(venueAliases);
  private static teamCodes: ReadonlySet<string> = new Set(Object.keys(teamAliases));

  /**
   * Map a team name to its canonical code
   * @param teamName Team name or alias (e.g. "롯데", "Lotte Giants", "LT")
   * @returns Canonical code ("LT"), or the whitespace-collapsed input when unknown
   */
  static canonicalTeam(teamName: string): string {
    return this.teams[lookupKey(teamName)] ?? collapse(teamName);
  }

  /**
   * Map a venue name to its canonical short name
   * @param venueName Venue name or alias (e.g. "잠실야구장")
   * @returns Canonical name ("Jamsil"), or the whitespace-collapsed input when unknown
   */
  static canonicalVenue(venueName: string): string {
    return this.venues[lookupKey(venueName)] ?? collapse(venueName);
  }

  static isKnownTeam(code: string): boolean {
    return this.teamCodes.has(code);
  }

  static isKnownVenue(name: string): boolean {
    return this.venues[lookupKey(name)] !== undefined;
  }

  /**
   * Resolve a two-letter code taken from a game id; null when it is not a team code
   */
  static teamFromCode(code: string): string | null {
    const upper = code.toUpperCase();
    return this.teamCodes.has(upper) ? upper : null;
  }
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
