import type { CompletedSet, MatchScore, PlayerId, ScoreCall, ScoreStatus, SideScore } from './types';
import { InvalidOperation } from './errors';
import { otherSide } from './utils';

export interface ScoreConfig {
  bestOfSets: 3 | 5;
}

export interface ScoreTransition {
  score: MatchScore;
  status: ScoreStatus;
  calls: ScoreCall[];
}

const CALLS = ['0', '15', '30', '40'];

const zero = (): SideScore => ({ player: 0, opponent: 0 });

export function setsToWin(bestOfSets: number): number {
  return Math.ceil(bestOfSets / 2);
}

export function createScore(firstServer: PlayerId): MatchScore {
  return {
    points: zero(),
    games: zero(),
    sets: zero(),
    currentSet: 1,
    server: firstServer,
    completedSets: [],
    isTiebreak: false,
    isDeuce: false,
    advantage: null,
    tiebreakFirstServer: null,
    winner: null,
  };
}

export function cloneScore(score: MatchScore): MatchScore {
  return {
    ...score,
    points: { ...score.points },
    games: { ...score.games },
    sets: { ...score.sets },
    completedSets: score.completedSets.map(s => ({
      ...s,
      games: { ...s.games },
      tiebreak: s.tiebreak ? { ...s.tiebreak } : null,
    })),
  };
}

function refreshFlags(score: MatchScore): void {
  const { player, opponent } = score.points;
  if (score.isTiebreak || score.winner) {
    score.isDeuce = false;
    score.advantage = null;
    return;
  }
  score.isDeuce = player === 3 && opponent === 3;
  score.advantage = player === 4 ? 'player' : opponent === 4 ? 'opponent' : null;
}

function winSet(
  score: MatchScore, winner: PlayerId, tiebreak: SideScore | null, config: ScoreConfig, calls: ScoreCall[],
): ScoreStatus {
  const completed: CompletedSet = { games: { ...score.games }, tiebreak, winner };
  score.completedSets.push(completed);
  score.sets[winner] += 1;
  score.games = zero();
  score.points = zero();
  score.isTiebreak = false;

  // The tiebreak receiver opens the next set.
  score.server = otherSide(score.tiebreakFirstServer ?? score.server);
  score.tiebreakFirstServer = null;

  calls.push({ kind: 'set', side: winner, games: completed.games });
  if (score.sets[winner] >= setsToWin(config.bestOfSets)) {
    score.winner = winner;
    calls.push({ kind: 'match', side: winner });
    return 'match_over';
  }
  score.currentSet += 1;
  return 'set_over';
}

function winGame(score: MatchScore, winner: PlayerId, config: ScoreConfig, calls: ScoreCall[]): ScoreStatus {
  const loser = otherSide(winner);
  score.games[winner] += 1;
  score.points = zero();
  calls.push({ kind: 'game', side: winner });

  const won = score.games[winner];
  const lost = score.games[loser];
  if (won >= 6 && won - lost >= 2) return winSet(score, winner, null, config, calls);

  score.server = otherSide(score.server);
  if (won === 6 && lost === 6) {
    score.isTiebreak = true;
    score.tiebreakFirstServer = score.server;
    calls.push({ kind: 'tiebreak' });
  }
  return 'game_over';
}

function tiebreakPoint(score: MatchScore, winner: PlayerId, config: ScoreConfig, calls: ScoreCall[]): ScoreStatus {
  const loser = otherSide(winner);
  score.points[winner] += 1;
  const won = score.points[winner];
  const lost = score.points[loser];

  if (won >= 7 && won - lost >= 2) {
    const tiebreak = { ...score.points };
    score.games[winner] += 1;
    calls.push({ kind: 'game', side: winner });
    return winSet(score, winner, tiebreak, config, calls);
  }
  // Point 1 by the first server, then two each.
  if ((won + lost) % 2 === 1) score.server = otherSide(score.server);
  return 'point_over';
}

function regularPoint(score: MatchScore, winner: PlayerId, config: ScoreConfig, calls: ScoreCall[]): ScoreStatus {
  const loser = otherSide(winner);
  const won = score.points[winner];
  const lost = score.points[loser];

  if (won === 3 && lost === 3) {
    score.points[winner] = 4;
    calls.push({ kind: 'advantage', side: winner });
    return 'point_over';
  }
  if (won === 3 && lost === 4) {
    score.points[loser] = 3;
    calls.push({ kind: 'deuce' });
    return 'point_over';
  }
  if (won >= 3) return winGame(score, winner, config, calls);

  score.points[winner] += 1;
  if (score.points[winner] === 3 && lost === 3) calls.push({ kind: 'deuce' });
  return 'point_over';
}

/**
 * Advances the score by one point won by `winner`. The input score is left untouched.
 * Throws `InvalidOperation` once the match has a winner.
 */
export function awardPoint(score: MatchScore, winner: PlayerId, config: ScoreConfig): ScoreTransition {
  if (score.winner) {
    throw new InvalidOperation(`match is over: ${score.winner} already won`);
  }
  const next = cloneScore(score);
  const calls: ScoreCall[] = [];
  const status = next.isTiebreak
    ? tiebreakPoint(next, winner, config, calls)
    : regularPoint(next, winner, config, calls);
  refreshFlags(next);
  return { score: next, status, calls };
}

/** True when `side` faces game point (or set point in a tiebreak). */
export function isPressurePoint(score: MatchScore, side: PlayerId): boolean {
  const mine = score.points[side];
  const theirs = score.points[otherSide(side)];
  if (score.isTiebreak) return theirs >= 6 && theirs > mine;
  return theirs === 4 || (theirs === 3 && mine < 3);
}

export function formatPoints(score: MatchScore): string {
  const { player, opponent } = score.points;
  if (score.isTiebreak) return `${player}-${opponent}`;
  if (score.isDeuce) return 'Deuce';
  if (score.advantage) return `Advantage ${score.advantage}`;
  return `${CALLS[player]}-${CALLS[opponent]}`;
}

export function formatScore(score: MatchScore): string {
  const sets = `Sets ${score.sets.player}-${score.sets.opponent}`;
  if (score.winner) return `${sets} | Match won by ${score.winner}`;
  const label = score.isTiebreak ? 'Tiebreak' : 'Points';
  return `${sets} | Games ${score.games.player}-${score.games.opponent} | ${label} ${formatPoints(score)}`;
}
