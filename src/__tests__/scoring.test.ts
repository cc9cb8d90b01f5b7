import { describe, it, expect } from 'vitest';
import { awardPoint, createScore, formatPoints, formatScore, isPressurePoint } from '../engine/scoring';
import type { ScoreConfig, ScoreTransition } from '../engine/scoring';
import { InvalidOperation } from '../engine/errors';
import type { MatchScore, PlayerId } from '../engine/types';
import { createRng } from '../engine/utils';

const BO3: ScoreConfig = { bestOfSets: 3 };

function play(score: MatchScore, winners: PlayerId[], config: ScoreConfig = BO3): ScoreTransition {
  let t: ScoreTransition = { score, status: 'point_over', calls: [] };
  for (const w of winners) t = awardPoint(t.score, w, config);
  return t;
}

const repeat = (id: PlayerId, n: number): PlayerId[] => Array.from({ length: n }, () => id);
const games = (order: PlayerId[]): PlayerId[] => order.flatMap(id => repeat(id, 4));

describe('points within a game', () => {
  it('scores 15-0 and keeps the server', () => {
    const t = awardPoint(createScore('player'), 'player', BO3);
    expect(t.score.points).toEqual({ player: 1, opponent: 0 });
    expect(t.score.server).toBe('player');
    expect(t.status).toBe('point_over');
    expect(formatPoints(t.score)).toBe('15-0');
  });

  it('does not mutate the input score', () => {
    const start = createScore('player');
    awardPoint(start, 'opponent', BO3);
    expect(start.points).toEqual({ player: 0, opponent: 0 });
  });

  it('wins a love game, resets points and rotates the server', () => {
    const t = play(createScore('player'), repeat('player', 4));
    expect(t.status).toBe('game_over');
    expect(t.score.games).toEqual({ player: 1, opponent: 0 });
    expect(t.score.points).toEqual({ player: 0, opponent: 0 });
    expect(t.score.server).toBe('opponent');
    expect(t.calls).toEqual([{ kind: 'game', side: 'player' }]);
  });

  it('reads 30-40 from the player side', () => {
    const t = play(createScore('player'), ['opponent', 'player', 'opponent', 'player', 'opponent']);
    expect(formatPoints(t.score)).toBe('30-40');
    expect(isPressurePoint(t.score, 'player')).toBe(true);
    expect(isPressurePoint(t.score, 'opponent')).toBe(false);
  });
});

describe('deuce and advantage', () => {
  const deuce = () => play(createScore('player'), ['player', 'player', 'player', 'opponent', 'opponent', 'opponent']);

  it('calls deuce at 40-40', () => {
    const t = deuce();
    expect(t.score.isDeuce).toBe(true);
    expect(t.calls).toEqual([{ kind: 'deuce' }]);
    expect(formatPoints(t.score)).toBe('Deuce');
  });

  it('moves to advantage, then back to deuce rather than game', () => {
    const ad = awardPoint(deuce().score, 'player', BO3);
    expect(ad.score.advantage).toBe('player');
    expect(ad.score.isDeuce).toBe(false);
    expect(formatPoints(ad.score)).toBe('Advantage player');

    const back = awardPoint(ad.score, 'opponent', BO3);
    expect(back.status).toBe('point_over');
    expect(back.score.isDeuce).toBe(true);
    expect(back.score.advantage).toBeNull();
    expect(back.score.points).toEqual({ player: 3, opponent: 3 });
    expect(back.score.games).toEqual({ player: 0, opponent: 0 });
  });

  it('takes the game from advantage', () => {
    const t = play(deuce().score, ['opponent', 'opponent']);
    expect(t.status).toBe('game_over');
    expect(t.score.games).toEqual({ player: 0, opponent: 1 });
  });

  it('never lets regular-game points exceed advantage', () => {
    const t = play(deuce().score, ['player', 'opponent', 'player', 'opponent', 'opponent', 'player']);
    expect(t.score.points).toEqual({ player: 3, opponent: 3 });
  });
});

describe('sets', () => {
  it('wins a 6-0 set and opens set 2', () => {
    const t = play(createScore('player'), repeat('player', 24));
    expect(t.status).toBe('set_over');
    expect(t.score.sets).toEqual({ player: 1, opponent: 0 });
    expect(t.score.games).toEqual({ player: 0, opponent: 0 });
    expect(t.score.currentSet).toBe(2);
    expect(t.score.completedSets).toEqual([{ games: { player: 6, opponent: 0 }, tiebreak: null, winner: 'player' }]);
    // six games, six rotations
    expect(t.score.server).toBe('player');
  });

  it('plays on at 6-5 and closes 7-5', () => {
    const alternate: PlayerId[] = [];
    for (let i = 0; i < 5; i++) alternate.push('player', 'opponent');
    const at55 = play(createScore('player'), games(alternate));
    expect(at55.score.games).toEqual({ player: 5, opponent: 5 });

    const at65 = play(at55.score, games(['player']));
    expect(at65.status).toBe('game_over');
    expect(at65.score.sets).toEqual({ player: 0, opponent: 0 });

    const done = play(at65.score, games(['player']));
    expect(done.status).toBe('set_over');
    expect(done.score.completedSets[0].games).toEqual({ player: 7, opponent: 5 });
  });
});

describe('tiebreak', () => {
  const at66 = () => {
    const order: PlayerId[] = [];
    for (let i = 0; i < 6; i++) order.push('player', 'opponent');
    return play(createScore('player'), games(order));
  };

  it('starts at six games all', () => {
    const t = at66();
    expect(t.score.isTiebreak).toBe(true);
    expect(t.score.tiebreakFirstServer).toBe('player');
    expect(t.score.server).toBe('player');
    expect(t.calls).toContainEqual({ kind: 'tiebreak' });
  });

  it('alternates serve after the first point, then every two points', () => {
    let score = at66().score;
    const servers: PlayerId[] = [score.server];
    for (let i = 0; i < 6; i++) {
      score = awardPoint(score, 'player', BO3).score;
      servers.push(score.server);
    }
    expect(servers).toEqual(['player', 'opponent', 'opponent', 'player', 'player', 'opponent', 'opponent']);
  });

  it('goes to the first to seven and records 7-6', () => {
    const t = play(at66().score, repeat('player', 7));
    expect(t.status).toBe('set_over');
    expect(t.score.completedSets[0]).toEqual({
      games: { player: 7, opponent: 6 },
      tiebreak: { player: 7, opponent: 0 },
      winner: 'player',
    });
    // tiebreak receiver serves first in the next set
    expect(t.score.server).toBe('opponent');
    expect(t.score.isTiebreak).toBe(false);
  });

  it('needs a two-point margin', () => {
    const sixAll: PlayerId[] = [];
    for (let i = 0; i < 6; i++) sixAll.push('player', 'opponent');
    const t = play(at66().score, sixAll);
    expect(t.score.points).toEqual({ player: 6, opponent: 6 });

    const sevenSix = awardPoint(t.score, 'player', BO3);
    expect(sevenSix.status).toBe('point_over');
    expect(formatPoints(sevenSix.score)).toBe('7-6');

    const done = play(sevenSix.score, ['opponent', 'opponent', 'opponent']);
    expect(done.status).toBe('set_over');
    expect(done.score.completedSets[0].tiebreak).toEqual({ player: 7, opponent: 9 });
    expect(done.score.completedSets[0].winner).toBe('opponent');
  });
});

describe('match', () => {
  it('ends best of three after two sets and rejects further points', () => {
    const t = play(createScore('player'), repeat('opponent', 48));
    expect(t.status).toBe('match_over');
    expect(t.score.winner).toBe('opponent');
    expect(t.score.sets).toEqual({ player: 0, opponent: 2 });
    expect(formatScore(t.score)).toBe('Sets 0-2 | Match won by opponent');

    const frozen = JSON.stringify(t.score);
    expect(() => awardPoint(t.score, 'player', BO3)).toThrow(InvalidOperation);
    expect(JSON.stringify(t.score)).toBe(frozen);
  });

  it('needs three sets in best of five', () => {
    const five: ScoreConfig = { bestOfSets: 5 };
    const two = play(createScore('player'), repeat('player', 48), five);
    expect(two.status).toBe('set_over');
    expect(two.score.winner).toBeNull();
    const three = play(two.score, repeat('player', 24), five);
    expect(three.status).toBe('match_over');
    expect(three.score.sets).toEqual({ player: 3, opponent: 0 });
  });

  it('formats a live score', () => {
    const t = play(createScore('player'), [...repeat('player', 4), 'opponent']);
    expect(formatScore(t.score)).toBe('Sets 0-0 | Games 1-0 | Points 0-15');
  });

  it('only ever produces legal scores over random point sequences', () => {
    const rng = createRng(7);
    for (let m = 0; m < 20; m++) {
      let score = createScore('player');
      let sets = 0;
      while (!score.winner) {
        const before = score;
        const t = awardPoint(score, rng() < 0.5 ? 'player' : 'opponent', BO3);
        score = t.score;

        const totalSets = score.sets.player + score.sets.opponent;
        expect(totalSets).toBeGreaterThanOrEqual(sets);
        sets = totalSets;
        if (t.status === 'point_over') {
          expect(score.games).toEqual(before.games);
        }
        if (!score.isTiebreak) {
          expect(Math.max(score.points.player, score.points.opponent)).toBeLessThanOrEqual(4);
        }
        expect(Math.max(score.games.player, score.games.opponent)).toBeLessThanOrEqual(6);
      }
      for (const set of score.completedSets) {
        const w = set.games[set.winner];
        const l = set.games[set.winner === 'player' ? 'opponent' : 'player'];
        const legal = (w === 6 && l <= 4) || (w === 7 && l === 5) || (w === 7 && l === 6 && set.tiebreak !== null);
        expect(legal).toBe(true);
      }
    }
  });
});
