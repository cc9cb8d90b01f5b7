import type { PlayerId, PlayerState, ShotEvent, ShotOutcome, ShotType, CourtZone } from './types';
import type { PositionTuning, Tuning } from './constants';
import { DEFAULT_TUNING } from './constants';
import { fatigueFactor } from './fatigue';
import { isBackCourt, isServe, nextZone, opponentZone } from './court';
import { clamp } from './utils';
import type { Rng } from './utils';

export interface ShotContext {
  receiver: PlayerState;
  // Last shot of the rally, if any (always the receiver's in-play shot for rally shots).
  previousShot: ShotEvent | null;
}

export interface ShotResolution {
  event: ShotEvent;
  pointWinner: PlayerId | null;
}

export function isWinnerCapable(shotType: ShotType, tuning: Tuning = DEFAULT_TUNING): boolean {
  return tuning.shots[shotType].winnerChance > 0;
}

export function positionalFitness(
  zone: CourtZone, shotType: ShotType, ctx: ShotContext,
  tuning: PositionTuning = DEFAULT_TUNING.position,
): number {
  if (isServe(shotType)) return 1;
  const receiverZone = ctx.receiver.zone;
  let f = 1;

  switch (shotType) {
    case 'volley':
      if (zone === 'net') f *= tuning.volleyAtNet;
      else if (zone === 'midcourt') f *= tuning.volleyFromMidcourt;
      break;
    case 'drop_shot': {
      if (isBackCourt(receiverZone)) f *= tuning.dropVsBaseline;
      else if (receiverZone === 'net') f *= tuning.dropVsNet;
      // quick receivers run drops down
      f *= 1 - tuning.dropMovementDefense * (2 * ctx.receiver.profile.movement - 1);
      break;
    }
    case 'lob':
      if (receiverZone === 'net') f *= tuning.lobVsNet;
      break;
    case 'approach':
      if (isBackCourt(zone)) f *= tuning.approachFromBack;
      break;
  }

  const crossCourt = shotType === 'forehand_cross_court' || shotType === 'backhand_cross_court';
  if ((zone === 'wide_left' || zone === 'wide_right') && !crossCourt) f *= tuning.offBalanceFromWide;

  const prev = ctx.previousShot?.type;
  if (prev === 'drop_shot' && shotType === 'lob') f *= tuning.lobAfterDrop;
  if (prev === 'lob' && shotType === 'volley') f *= tuning.volleyAfterLob;

  return f;
}

export function successProbability(
  hitter: PlayerState, shotType: ShotType, ctx: ShotContext, tuning: Tuning = DEFAULT_TUNING,
): number {
  const skill = hitter.profile.skills[shotType];
  const strength = hitter.profile.strengths.includes(shotType) ? tuning.strengthBonus : 1;
  const fatigue = fatigueFactor(hitter.stamina, tuning.fatigue);
  const position = positionalFitness(hitter.zone, shotType, ctx, tuning.position);
  const risk = tuning.shots[shotType].risk;
  return clamp(skill * strength * fatigue * position * risk, tuning.minSuccess, tuning.maxSuccess);
}

/**
 * Resolves one shot with a single uniform draw. The draw decides success
 * (`r < p`) and, for winner-capable shots, whether the success is outright
 * (`r >= p * (1 - winnerChance)`).
 *
 * Neither player state is touched; the returned event carries the zones the
 * caller should commit.
 */
export function resolveShot(
  hitter: PlayerState, shotType: ShotType, ctx: ShotContext, rng: Rng, tuning: Tuning = DEFAULT_TUNING,
): ShotResolution {
  const receiver = ctx.receiver;
  const p = successProbability(hitter, shotType, ctx, tuning);
  const r = rng();
  const success = r < p;
  const winnerChance = tuning.shots[shotType].winnerChance;

  const make = (outcome: ShotOutcome, beneficiary: PlayerId, hitterZone: CourtZone, receiverZone: CourtZone): ShotEvent => ({
    type: shotType,
    hitter: hitter.id,
    success,
    outcome,
    beneficiary,
    probability: p,
    resultingZone: hitterZone,
    receiverZone,
  });

  if (success) {
    const hitterZone = nextZone(hitter.zone, shotType);
    if (winnerChance > 0 && r >= p * (1 - winnerChance)) {
      // receiver is left stranded where they stood
      const outcome = isServe(shotType) ? 'ace' : 'winner';
      return { event: make(outcome, hitter.id, hitterZone, receiver.zone), pointWinner: hitter.id };
    }
    return {
      event: make('in_play', hitter.id, hitterZone, opponentZone(receiver.zone, shotType)),
      pointWinner: null,
    };
  }

  if (shotType === 'first_serve') {
    return { event: make('fault', receiver.id, hitter.zone, receiver.zone), pointWinner: null };
  }
  if (shotType === 'second_serve') {
    return { event: make('double_fault', receiver.id, hitter.zone, receiver.zone), pointWinner: receiver.id };
  }

  const prev = ctx.previousShot;
  const forced = prev !== null
    && prev.outcome === 'in_play'
    && prev.hitter === receiver.id
    && isWinnerCapable(prev.type, tuning);
  return {
    event: make(forced ? 'forced_error' : 'error', receiver.id, hitter.zone, receiver.zone),
    pointWinner: receiver.id,
  };
}
