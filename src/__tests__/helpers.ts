import type { Rng } from '../engine/utils';
import type { PlayerId, PlayerProfile, PlayerState, ShotType } from '../engine/types';

/** Returns the given draws in order; fails loudly when the script runs out. */
export function scriptedRng(draws: number[]): Rng & { remaining: () => number } {
  let i = 0;
  const rng = () => {
    if (i >= draws.length) throw new Error(`scripted rng exhausted after ${draws.length} draws`);
    return draws[i++];
  };
  return Object.assign(rng, { remaining: () => draws.length - i });
}

export function flatSkills(v: number): Record<ShotType, number> {
  return {
    first_serve: v, second_serve: v,
    forehand_cross_court: v, forehand_down_the_line: v,
    backhand_cross_court: v, backhand_down_the_line: v,
    drop_shot: v, lob: v, slice: v, approach: v, volley: v,
  };
}

export function makeProfile(overrides: Partial<PlayerProfile> = {}): PlayerProfile {
  return {
    name: 'Tester',
    skills: flatSkills(0.8),
    strengths: [],
    movement: 0.5,
    stamina: 1,
    ...overrides,
  };
}

export function makePlayer(id: PlayerId, overrides: Partial<PlayerState> = {}, profile: Partial<PlayerProfile> = {}): PlayerState {
  return {
    id,
    profile: makeProfile(profile),
    stamina: 1,
    zone: 'baseline',
    ...overrides,
  };
}
