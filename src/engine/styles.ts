import type { MatchScore, OpponentStyle, PlayerState, ShotEvent, ShotType } from './types';
import type { StyleWeights, Tuning } from './constants';
import { DEFAULT_TUNING } from './constants';
import { isBackCourt, legalShots } from './court';
import { isPressurePoint } from './scoring';
import { pickWeighted } from './utils';
import type { Rng } from './utils';

export interface PolicyContext {
  receiver: PlayerState;
  previousShot: ShotEvent | null;
  rallyLength: number;
  score: MatchScore;
}

const AGGRESSIVE: OpponentStyle[] = ['aggressive_baseliner', 'net_rusher', 'forehand_dominant'];

const isDownTheLine = (s: ShotType) => s === 'forehand_down_the_line' || s === 'backhand_down_the_line';
const isCrossCourt = (s: ShotType) => s === 'forehand_cross_court' || s === 'backhand_cross_court';

export function styleWeights(style: OpponentStyle, tuning: Tuning = DEFAULT_TUNING): StyleWeights {
  return tuning.styles[style];
}

/** Weighted legal options for `opponent` in this situation; zero-weight shots are dropped. */
export function shotWeights(
  opponent: PlayerState, ctx: PolicyContext, tuning: Tuning = DEFAULT_TUNING,
): { item: ShotType; weight: number }[] {
  const style = opponent.profile.style ?? 'all_rounder';
  const table = styleWeights(style, tuning);
  const zone = opponent.zone;
  const pressure = isPressurePoint(ctx.score, opponent.id);

  return legalShots(zone).map(shot => {
    // skill 0.5 is neutral; squared so strong shots dominate
    let w = (table[shot] ?? 1) * (opponent.profile.skills[shot] / 0.5) ** 2;

    if (style === 'net_rusher' && zone === 'midcourt' && (shot === 'approach' || shot === 'volley')) w *= 1.8;
    if (zone === 'net') w *= shot === 'volley' ? 3 : 0.5;

    if (ctx.receiver.zone === 'net' && shot === 'lob') {
      w *= 2;
      if (style === 'counter_puncher' && isBackCourt(zone)) w *= 2.5;
    }

    const prev = ctx.previousShot?.type;
    if (prev && isCrossCourt(prev) && isDownTheLine(shot)) w *= 1.3;

    if (ctx.rallyLength > 6 && (style === 'aggressive_baseliner' || style === 'forehand_dominant')) {
      if (isDownTheLine(shot) || shot === 'drop_shot') w *= 1 + (ctx.rallyLength - 6) * 0.1;
    }

    if (pressure) {
      if (AGGRESSIVE.includes(style)) {
        if (isDownTheLine(shot)) w *= 1.2;
      } else if (isCrossCourt(shot)) {
        w *= 1.3;
      }
    }

    return { item: shot, weight: w };
  }).filter(o => o.weight > 0);
}

export function chooseShot(
  opponent: PlayerState, ctx: PolicyContext, rng: Rng, tuning: Tuning = DEFAULT_TUNING,
): ShotType {
  const options = shotWeights(opponent, ctx, tuning);
  if (options.length === 0) return 'forehand_cross_court';
  return pickWeighted(options, rng);
}
