import type {
  CourtZone, MatchLogEntry, MatchScore, NextTurn, PlayerId, PlayerState, Rally, RallyStatus,
  RallyUpdate, ScoreCall, ServeType, ShotEvent, ShotType,
} from './types';
import { SHOT_LABELS } from './types';
import type { Tuning, TuningOverrides } from './constants';
import { resolveTuning } from './constants';
import { InvalidOperation, InvalidShotForZone } from './errors';
import { parseProfile } from './profiles';
import { applyShot, describeStamina, recover } from './fatigue';
import { isLegalShot, isServe } from './court';
import { resolveShot } from './shots';
import { chooseShot } from './styles';
import { awardPoint, cloneScore, createScore, formatScore } from './scoring';
import { clamp, createRng, otherSide } from './utils';
import type { Rng } from './utils';

export interface MatchConfig {
  bestOfSets: 3 | 5;
  firstServer?: PlayerId;
  seed?: number;
  // Takes precedence over `seed`.
  rng?: Rng;
  tuning?: TuningOverrides;
  debug?: boolean;
}

export interface MatchHandle {
  readonly id: string;
  readonly bestOfSets: 3 | 5;
  readonly seed: number;
  readonly debug: boolean;
  readonly tuning: Tuning;
  readonly rng: Rng;
  players: Record<PlayerId, PlayerState>;
  score: MatchScore;
  rally: Rally | null;
  log: MatchLogEntry[];
}

let matchCounter = 0;

function addLog(handle: MatchHandle, text: string) {
  handle.log.push({
    set: handle.score.currentSet,
    games: { ...handle.score.games },
    text,
  });
}

function nameOf(handle: MatchHandle, id: PlayerId): string {
  return handle.players[id].profile.name;
}

function callText(handle: MatchHandle, call: ScoreCall): string {
  switch (call.kind) {
    case 'deuce': return 'Deuce!';
    case 'tiebreak': return 'Six games all. Tiebreak!';
    case 'advantage': return `Advantage ${nameOf(handle, call.side)}.`;
    case 'game': return `Game ${nameOf(handle, call.side)}.`;
    case 'set': {
      const g = call.games;
      return `Set ${nameOf(handle, call.side)}, ${g.player}-${g.opponent}.`;
    }
    case 'match': return `Game, set and match ${nameOf(handle, call.side)}!`;
  }
}

function shotText(handle: MatchHandle, event: ShotEvent): string {
  const who = nameOf(handle, event.hitter);
  const shot = SHOT_LABELS[event.type];
  switch (event.outcome) {
    case 'in_play': return isServe(event.type) ? `${who} serves: ${shot}.` : `${who} hits a ${shot}.`;
    case 'ace': return `${who} serves an ace!`;
    case 'winner': return `${who} hits a winner with the ${shot}!`;
    case 'fault': return `Fault! ${who} will hit a second serve.`;
    case 'double_fault': return `Double fault by ${who}.`;
    case 'error': return `${who} makes an error with the ${shot}.`;
    case 'forced_error': return `${who} is forced into an error on the ${shot}.`;
  }
}

function turnOf(handle: MatchHandle): NextTurn {
  if (handle.score.winner) return 'none';
  const rally = handle.rally;
  if (!rally) return handle.score.server === 'player' ? 'player_serve' : 'opponent_serve';
  if (rally.expecting === 'second_serve') {
    return rally.currentHitter === 'player' ? 'player_serve' : 'opponent_serve';
  }
  return rally.currentHitter === 'player' ? 'player_shot' : 'opponent_shot';
}

function assertPlayable(handle: MatchHandle): void {
  if (handle.score.winner) {
    throw new InvalidOperation(`match ${handle.id} is over: ${nameOf(handle, handle.score.winner)} won`);
  }
}

function buildUpdate(
  handle: MatchHandle, lastShot: ShotEvent | null, status: RallyStatus,
  pointWinner: PlayerId | null, logFrom: number,
  // where the point ended; players are already back on the baseline by then
  zones: Record<PlayerId, CourtZone> = { player: handle.players.player.zone, opponent: handle.players.opponent.zone },
): RallyUpdate {
  const { player, opponent } = handle.players;
  return {
    matchId: handle.id,
    zones,
    stamina: { player: player.stamina, opponent: opponent.stamina },
    condition: { player: describeStamina(player.stamina), opponent: describeStamina(opponent.stamina) },
    ballZone: handle.rally ? handle.rally.ballZone : null,
    lastShot,
    score: cloneScore(handle.score),
    scoreLine: formatScore(handle.score),
    status,
    pointWinner,
    nextTurn: turnOf(handle),
    log: handle.log.slice(logFrom),
  };
}

function finishPoint(handle: MatchHandle, winner: PlayerId): RallyStatus {
  const transition = awardPoint(handle.score, winner, { bestOfSets: handle.bestOfSets });
  handle.score = transition.score;
  addLog(handle, `Point ${nameOf(handle, winner)}. ${formatScore(handle.score)}`);
  for (const call of transition.calls) addLog(handle, callText(handle, call));

  handle.rally = null;
  for (const p of [handle.players.player, handle.players.opponent]) {
    p.zone = 'baseline';
    p.stamina = recover(p.stamina, handle.tuning.fatigue);
  }
  return transition.status;
}

// Resolves and commits one shot. Callers validate turn and legality first.
function strike(handle: MatchHandle, hitterId: PlayerId, shotType: ShotType): RallyUpdate {
  const logFrom = handle.log.length;
  const hitter = handle.players[hitterId];
  const receiver = handle.players[otherSide(hitterId)];
  const shots = handle.rally ? handle.rally.shots : [];
  const previousShot = shots.length > 0 ? shots[shots.length - 1] : null;

  const { event, pointWinner } = resolveShot(hitter, shotType, { receiver, previousShot }, handle.rng, handle.tuning);

  if (handle.debug) {
    console.warn(`[SHOT] match=${handle.id} ${hitterId} ${shotType} p=${event.probability.toFixed(3)} outcome=${event.outcome} stamina=${hitter.stamina.toFixed(3)}`);
  }

  shots.push(event);
  hitter.stamina = applyShot(hitter.stamina, shots.length, shotType, hitter.profile.movement, handle.tuning.fatigue);
  hitter.zone = event.resultingZone;
  receiver.zone = event.receiverZone;
  addLog(handle, shotText(handle, event));

  if (pointWinner) {
    const zones = { player: handle.players.player.zone, opponent: handle.players.opponent.zone };
    const status = finishPoint(handle, pointWinner);
    return buildUpdate(handle, event, status, pointWinner, logFrom, zones);
  }

  const ballZone: CourtZone = receiver.zone;
  handle.rally = event.outcome === 'fault'
    ? { shots, currentHitter: hitterId, ballZone, expecting: 'second_serve' }
    : { shots, currentHitter: receiver.id, ballZone, expecting: 'shot' };
  return buildUpdate(handle, event, 'in_progress', null, logFrom);
}

/**
 * Validates both profiles and opens a match. The first server is drawn from
 * the match RNG unless `config.firstServer` is given.
 */
export function startMatch(playerProfile: unknown, opponentProfile: unknown, config: MatchConfig): MatchHandle {
  const playerData = parseProfile(playerProfile, 'player');
  const opponentData = parseProfile(opponentProfile, 'opponent');
  if (config.bestOfSets !== 3 && config.bestOfSets !== 5) {
    throw new InvalidOperation(`bestOfSets must be 3 or 5, got ${String(config.bestOfSets)}`);
  }

  const tuning = resolveTuning(config.tuning);
  const seed = config.seed ?? Date.now();
  const rng = config.rng ?? createRng(seed);
  const firstServer: PlayerId = config.firstServer ?? (rng() < 0.5 ? 'player' : 'opponent');
  const initial = (id: PlayerId, profile: PlayerState['profile']): PlayerState => ({
    id,
    profile,
    stamina: clamp(profile.stamina, tuning.fatigue.staminaFloor, 1),
    zone: 'baseline',
  });

  matchCounter += 1;
  const handle: MatchHandle = {
    id: `match-${seed}-${matchCounter}`,
    bestOfSets: config.bestOfSets,
    seed,
    debug: config.debug ?? false,
    tuning,
    rng,
    players: {
      player: initial('player', playerData),
      opponent: initial('opponent', opponentData),
    },
    score: createScore(firstServer),
    rally: null,
    log: [],
  };
  addLog(handle, `${playerData.name} vs ${opponentData.name}, best of ${config.bestOfSets} sets. ${nameOf(handle, firstServer)} serves first.`);
  return handle;
}

/** Current view of the match without playing anything. */
export function snapshot(handle: MatchHandle): RallyUpdate {
  const shots = handle.rally?.shots ?? [];
  const lastShot = shots.length > 0 ? shots[shots.length - 1] : null;
  const status: RallyStatus = handle.score.winner ? 'match_over' : handle.rally ? 'in_progress' : 'ready';
  return buildUpdate(handle, lastShot, status, null, 0);
}

export function nextTurn(handle: MatchHandle): NextTurn {
  return turnOf(handle);
}

export function serveChoice(handle: MatchHandle, serveType: ServeType): RallyUpdate {
  assertPlayable(handle);
  const turn = turnOf(handle);
  if (turn !== 'player_serve') throw new InvalidOperation(`not the player's serve (waiting for ${turn})`);
  if (handle.rally && serveType === 'first') {
    throw new InvalidShotForZone('first_serve', handle.players.player.zone, 'only a second serve is allowed after a fault');
  }
  if (!handle.rally && serveType === 'second') {
    throw new InvalidShotForZone('second_serve', handle.players.player.zone, 'a point opens with a first serve');
  }
  return strike(handle, 'player', serveType === 'first' ? 'first_serve' : 'second_serve');
}

export function playShot(handle: MatchHandle, shotType: ShotType): RallyUpdate {
  assertPlayable(handle);
  const turn = turnOf(handle);
  if (turn !== 'player_shot') throw new InvalidOperation(`not the player's shot (waiting for ${turn})`);
  const zone = handle.players.player.zone;
  if (isServe(shotType)) {
    throw new InvalidShotForZone(shotType, zone, `${SHOT_LABELS[shotType]} can only be played with serveChoice`);
  }
  if (!isLegalShot(zone, shotType)) throw new InvalidShotForZone(shotType, zone);
  return strike(handle, 'player', shotType);
}

/** Plays the opponent's turn: its serve, or a rally shot picked by its style. */
export function continueRally(handle: MatchHandle): RallyUpdate {
  assertPlayable(handle);
  const turn = turnOf(handle);
  if (turn === 'opponent_serve') {
    return strike(handle, 'opponent', handle.rally ? 'second_serve' : 'first_serve');
  }
  if (turn !== 'opponent_shot' || !handle.rally) {
    throw new InvalidOperation(`waiting for the player (${turn})`);
  }

  const opponent = handle.players.opponent;
  const shots = handle.rally.shots;
  const shotType = chooseShot(opponent, {
    receiver: handle.players.player,
    previousShot: shots.length > 0 ? shots[shots.length - 1] : null,
    rallyLength: shots.length,
    score: handle.score,
  }, handle.rng, handle.tuning);
  return strike(handle, 'opponent', shotType);
}
