// ─────────────────────────────────────────────
//  Team Types
// ─────────────────────────────────────────────

export type Team = 'BLUE' | 'RED';

/** Turn order: BLUE acts first, RED second. */
export const TEAMS: readonly Team[] = ['BLUE', 'RED'];

export const FIRST_MOVER: Team = 'BLUE';
export const SECOND_MOVER: Team = 'RED';

export function opposingTeam(team: Team): Team {
  return team === 'BLUE' ? 'RED' : 'BLUE';
}

