import { z } from 'zod';
import { OPPONENT_STYLES, SHOT_TYPES } from './types';
import type { OpponentStyle, PlayerId, PlayerProfile, ShotType } from './types';
import { MalformedProfile } from './errors';
import type { Rng } from './utils';

const unit = z.number().min(0).max(1);

const skillsSchema = z.object({
  first_serve: unit,
  second_serve: unit,
  forehand_cross_court: unit,
  forehand_down_the_line: unit,
  backhand_cross_court: unit,
  backhand_down_the_line: unit,
  drop_shot: unit,
  lob: unit,
  slice: unit,
  approach: unit,
  volley: unit,
});

export const profileSchema = z.object({
  name: z.string().min(1),
  skills: skillsSchema,
  strengths: z.array(z.enum(SHOT_TYPES)).default([]),
  movement: unit.default(0.5),
  stamina: unit.default(1),
  style: z.enum(OPPONENT_STYLES).optional(),
});

export type PlayerProfileInput = z.input<typeof profileSchema>;

export function parseProfile(input: unknown, side: PlayerId): PlayerProfile {
  const parsed = profileSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new MalformedProfile(side, issues);
  }
  if (side === 'opponent' && !parsed.data.style) {
    throw new MalformedProfile(side, ['style: Required']);
  }
  return { ...parsed.data, strengths: [...new Set(parsed.data.strengths)] };
}

// Skill on the 1-10 scale the sample profiles are written in.
interface Ratings {
  serve: number;
  forehand: number;
  backhand: number;
  volley: number;
  dropShot: number;
  lob: number;
  movement: number;
}

function skillsFromRatings(r: Ratings): Record<ShotType, number> {
  const u = (v: number) => Math.round(v * 10) / 100;
  return {
    first_serve: u(r.serve),
    second_serve: u(Math.min(10, r.serve + 1)),
    forehand_cross_court: u(r.forehand),
    forehand_down_the_line: u(r.forehand),
    backhand_cross_court: u(r.backhand),
    backhand_down_the_line: u(r.backhand),
    drop_shot: u(r.dropShot),
    lob: u(r.lob),
    // slice leans on the backhand
    slice: u((r.backhand + 5) / 2),
    approach: u((Math.max(r.forehand, r.backhand) + r.volley) / 2),
    volley: u(r.volley),
  };
}

export const defaultPlayerProfile: PlayerProfile = {
  name: 'You',
  skills: skillsFromRatings({ serve: 5, forehand: 8, backhand: 5, volley: 3, dropShot: 7, lob: 5, movement: 5 }),
  strengths: ['forehand_cross_court', 'forehand_down_the_line', 'drop_shot'],
  movement: 0.5,
  stamina: 1,
};

export const sampleOpponents: Record<OpponentStyle, PlayerProfile> = {
  aggressive_baseliner: {
    name: 'Nico Varga', style: 'aggressive_baseliner',
    skills: skillsFromRatings({ serve: 7, forehand: 8, backhand: 7, volley: 4, dropShot: 4, lob: 4, movement: 6 }),
    strengths: ['forehand_down_the_line', 'first_serve'], movement: 0.6, stamina: 1,
  },
  counter_puncher: {
    name: 'Tomas Leclerc', style: 'counter_puncher',
    skills: skillsFromRatings({ serve: 5, forehand: 7, backhand: 7, volley: 4, dropShot: 5, lob: 8, movement: 9 }),
    strengths: ['lob', 'backhand_cross_court'], movement: 0.9, stamina: 1,
  },
  net_rusher: {
    name: 'Ari Sandoval', style: 'net_rusher',
    skills: skillsFromRatings({ serve: 8, forehand: 6, backhand: 5, volley: 9, dropShot: 6, lob: 4, movement: 6 }),
    strengths: ['volley', 'approach', 'first_serve'], movement: 0.6, stamina: 1,
  },
  all_rounder: {
    name: 'Kai Brennan', style: 'all_rounder',
    skills: skillsFromRatings({ serve: 6, forehand: 6, backhand: 6, volley: 6, dropShot: 6, lob: 6, movement: 6 }),
    strengths: [], movement: 0.6, stamina: 1,
  },
  forehand_dominant: {
    name: 'Luca Moretti', style: 'forehand_dominant',
    skills: skillsFromRatings({ serve: 6, forehand: 9, backhand: 4, volley: 5, dropShot: 5, lob: 5, movement: 5 }),
    strengths: ['forehand_cross_court', 'forehand_down_the_line'], movement: 0.5, stamina: 1,
  },
  backhand_dominant: {
    name: 'Emil Novak', style: 'backhand_dominant',
    skills: skillsFromRatings({ serve: 6, forehand: 5, backhand: 9, volley: 5, dropShot: 5, lob: 5, movement: 5 }),
    strengths: ['backhand_cross_court', 'backhand_down_the_line', 'slice'], movement: 0.5, stamina: 1,
  },
};

const RATING_TERMS: Record<number, string> = {
  1: 'Very Poor', 2: 'Poor', 3: 'Below Average', 4: 'Slightly Below Average', 5: 'Average',
  6: 'Slightly Above Average', 7: 'Above Average', 8: 'Good', 9: 'Excellent', 10: 'Outstanding',
};

/** Term for a rating on the 1-10 scale; 'Unknown' off the scale. */
export function describeRating(rating: number): string {
  return RATING_TERMS[rating] ?? 'Unknown';
}

export function describeSkills(profile: PlayerProfile): Record<ShotType, string> {
  const t = (shot: ShotType) => describeRating(Math.round(profile.skills[shot] * 10));
  return {
    first_serve: t('first_serve'),
    second_serve: t('second_serve'),
    forehand_cross_court: t('forehand_cross_court'),
    forehand_down_the_line: t('forehand_down_the_line'),
    backhand_cross_court: t('backhand_cross_court'),
    backhand_down_the_line: t('backhand_down_the_line'),
    drop_shot: t('drop_shot'),
    lob: t('lob'),
    slice: t('slice'),
    approach: t('approach'),
    volley: t('volley'),
  };
}

function randomRating(rng: Rng): number {
  return 3 + Math.floor(rng() * 7);
}

/** Random opponent in the 3-9 rating band with a random style. */
export function generateOpponentProfile(rng: Rng, name = 'Opponent'): PlayerProfile {
  const ratings: Ratings = {
    serve: randomRating(rng),
    forehand: randomRating(rng),
    backhand: randomRating(rng),
    volley: randomRating(rng),
    dropShot: randomRating(rng),
    lob: randomRating(rng),
    movement: randomRating(rng),
  };
  const style = OPPONENT_STYLES[Math.floor(rng() * OPPONENT_STYLES.length)];
  const skills = skillsFromRatings(ratings);
  const strengths = SHOT_TYPES.filter(s => skills[s] >= 0.8);
  return { name, style, skills, strengths, movement: ratings.movement / 10, stamina: 1 };
}
