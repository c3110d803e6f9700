/**
 * Match rules chosen when a new game starts.
 */

export interface DeathMatchOptions {
  mode: 'DEATH_MATCH';
  timeLimitSecs: number;
  fragLimit: number;
}

export interface TeamDeathMatchOptions {
  mode: 'TEAM_DEATH_MATCH';
  timeLimitSecs: number;
  teamFragLimit: number;
}

export type MatchOptions = DeathMatchOptions | TeamDeathMatchOptions;

export const DEFAULT_MATCH_OPTIONS: DeathMatchOptions = {
  mode: 'DEATH_MATCH',
  timeLimitSecs: 20 * 60,
  fragLimit: 30,
};

export function createTeamDeathMatchOptions(
  overrides: Partial<Omit<TeamDeathMatchOptions, 'mode'>> = {}
): TeamDeathMatchOptions {
  return {
    mode: 'TEAM_DEATH_MATCH',
    timeLimitSecs: overrides.timeLimitSecs ?? 20 * 60,
    teamFragLimit: overrides.teamFragLimit ?? 50,
  };
}

export function isMatchOptions(value: unknown): value is MatchOptions {
  if (typeof value !== 'object' || value === null) return false;
  if (!('mode' in value) || !('timeLimitSecs' in value)) return false;
  if (typeof value.timeLimitSecs !== 'number') return false;
  switch (value.mode) {
    case 'DEATH_MATCH':
      return 'fragLimit' in value && typeof value.fragLimit === 'number';
    case 'TEAM_DEATH_MATCH':
      return 'teamFragLimit' in value && typeof value.teamFragLimit === 'number';
    default:
      return false;
  }
}
