export { LeaderBoard } from './LeaderBoard';
export type { LeaderBoardEntry, LeaderBoardSnapshot, PersonalScore } from './LeaderBoard';
export { DEFAULT_MATCH_OPTIONS, createTeamDeathMatchOptions, isMatchOptions } from './MatchOptions';
export type { DeathMatchOptions, MatchOptions, TeamDeathMatchOptions } from './MatchOptions';
