import type { Team } from '../actors/Character';
import type { MatchOptions } from './MatchOptions';

export interface PersonalScore {
  kills: number;
  deaths: number;
}

export interface LeaderBoardEntry extends PersonalScore {
  name: string;
}

export interface LeaderBoardSnapshot {
  personal: LeaderBoardEntry[];
  teams: Array<{ team: Team; score: number }>;
}

/**
 * Frags and deaths per actor name, plus team totals
 */
export class LeaderBoard {
  private personalScores: Map<string, PersonalScore> = new Map();
  private teamScores: Map<Team, number> = new Map();

  public getOrAddActor(name: string): PersonalScore {
    let score = this.personalScores.get(name);
    if (!score) {
      score = { kills: 0, deaths: 0 };
      this.personalScores.set(name, score);
    }
    return score;
  }

  public addFrag(name: string, team: Team = 'NONE'): void {
    this.getOrAddActor(name).kills++;
    if (team !== 'NONE') {
      this.teamScores.set(team, (this.teamScores.get(team) ?? 0) + 1);
    }
  }

  public addDeath(name: string): void {
    this.getOrAddActor(name).deaths++;
  }

  public teamScore(team: Team): number {
    return this.teamScores.get(team) ?? 0;
  }

  /**
   * Entry with the most kills, optionally ignoring one name. Ties keep the
   * first entry added.
   */
  public highestPersonalScore(except?: string): LeaderBoardEntry | null {
    let best: LeaderBoardEntry | null = null;
    for (const [name, score] of this.personalScores) {
      if (name === except) continue;
      if (!best || score.kills > best.kills) {
        best = { name, ...score };
      }
    }
    return best;
  }

  public values(): ReadonlyMap<string, Readonly<PersonalScore>> {
    return this.personalScores;
  }

  /**
   * Entries sorted by kills, highest first
   */
  public standings(): LeaderBoardEntry[] {
    return Array.from(this.personalScores, ([name, score]) => ({ name, ...score })).sort(
      (a, b) => b.kills - a.kills
    );
  }

  public isMatchOver(options: MatchOptions, elapsedSecs: number): boolean {
    if (elapsedSecs >= options.timeLimitSecs) {
      return true;
    }

    switch (options.mode) {
      case 'DEATH_MATCH': {
        const highest = this.highestPersonalScore();
        return highest !== null && highest.kills >= options.fragLimit;
      }
      case 'TEAM_DEATH_MATCH':
        for (const score of this.teamScores.values()) {
          if (score >= options.teamFragLimit) return true;
        }
        return false;
    }
  }

  public clear(): void {
    this.personalScores.clear();
    this.teamScores.clear();
  }

  public toSnapshot(): LeaderBoardSnapshot {
    return {
      personal: Array.from(this.personalScores, ([name, score]) => ({ name, ...score })),
      teams: Array.from(this.teamScores, ([team, score]) => ({ team, score })),
    };
  }

  public static fromSnapshot(snapshot: LeaderBoardSnapshot): LeaderBoard {
    const board = new LeaderBoard();
    for (const entry of snapshot.personal) {
      board.personalScores.set(entry.name, { kills: entry.kills, deaths: entry.deaths });
    }
    for (const { team, score } of snapshot.teams) {
      board.teamScores.set(team, score);
    }
    return board;
  }
}
