import type { OpponentStyle, ShotType } from './types';

export interface ShotProfile {
  // Multiplier on success; higher is safer.
  risk: number;
  // Share of successful shots that end the point outright (aces for serves).
  winnerChance: number;
}

export interface FatigueTuning {
  staminaFloor: number;
  baseShotCost: number;
  serveCost: number;
  specialShotCost: number;
  longRallyThreshold: number;
  longRallyCost: number;
  recoveryPerPoint: number;
  minFatigueFactor: number;
}

export interface PositionTuning {
  volleyAtNet: number;
  volleyFromMidcourt: number;
  dropVsBaseline: number;
  dropVsNet: number;
  dropMovementDefense: number;
  lobVsNet: number;
  approachFromBack: number;
  offBalanceFromWide: number;
  lobAfterDrop: number;
  volleyAfterLob: number;
}

export type StyleWeights = Partial<Record<ShotType, number>>;

export interface Tuning {
  shots: Record<ShotType, ShotProfile>;
  minSuccess: number;
  maxSuccess: number;
  strengthBonus: number;
  fatigue: FatigueTuning;
  position: PositionTuning;
  styles: Record<OpponentStyle, StyleWeights>;
}

export interface TuningOverrides {
  shots?: Partial<Record<ShotType, ShotProfile>>;
  minSuccess?: number;
  maxSuccess?: number;
  strengthBonus?: number;
  fatigue?: Partial<FatigueTuning>;
  position?: Partial<PositionTuning>;
  styles?: Partial<Record<OpponentStyle, StyleWeights>>;
}

// Baseline safety: cross-court > slice > down-the-line > approach > lob > drop shot.
const SHOTS: Record<ShotType, ShotProfile> = {
  first_serve:            { risk: 0.78, winnerChance: 0.15 },
  second_serve:           { risk: 0.95, winnerChance: 0.05 },
  forehand_cross_court:   { risk: 0.92, winnerChance: 0 },
  backhand_cross_court:   { risk: 0.9,  winnerChance: 0 },
  slice:                  { risk: 0.88, winnerChance: 0 },
  forehand_down_the_line: { risk: 0.82, winnerChance: 0.15 },
  backhand_down_the_line: { risk: 0.8,  winnerChance: 0.15 },
  approach:               { risk: 0.78, winnerChance: 0.05 },
  volley:                 { risk: 0.85, winnerChance: 0.25 },
  lob:                    { risk: 0.72, winnerChance: 0.15 },
  drop_shot:              { risk: 0.68, winnerChance: 0.2 },
};

const STYLES: Record<OpponentStyle, StyleWeights> = {
  aggressive_baseliner: {
    forehand_cross_court: 1.0, backhand_cross_court: 0.9,
    forehand_down_the_line: 1.5, backhand_down_the_line: 1.3,
    drop_shot: 0.5, lob: 0.4, slice: 0.5, approach: 0.8, volley: 0.8,
  },
  counter_puncher: {
    forehand_cross_court: 1.5, backhand_cross_court: 1.5,
    forehand_down_the_line: 0.6, backhand_down_the_line: 0.6,
    drop_shot: 0.6, lob: 1.2, slice: 1.3, approach: 0.3, volley: 0.6,
  },
  net_rusher: {
    forehand_cross_court: 0.9, backhand_cross_court: 0.8,
    forehand_down_the_line: 0.9, backhand_down_the_line: 0.8,
    drop_shot: 0.7, lob: 0.4, slice: 0.8, approach: 2.0, volley: 2.0,
  },
  all_rounder: {
    forehand_cross_court: 1.0, backhand_cross_court: 1.0,
    forehand_down_the_line: 1.0, backhand_down_the_line: 1.0,
    drop_shot: 1.0, lob: 1.0, slice: 1.0, approach: 1.0, volley: 1.0,
  },
  forehand_dominant: {
    forehand_cross_court: 1.8, backhand_cross_court: 0.7,
    forehand_down_the_line: 1.8, backhand_down_the_line: 0.6,
    drop_shot: 0.8, lob: 0.7, slice: 0.8, approach: 1.0, volley: 0.9,
  },
  backhand_dominant: {
    forehand_cross_court: 0.7, backhand_cross_court: 1.8,
    forehand_down_the_line: 0.6, backhand_down_the_line: 1.8,
    drop_shot: 0.8, lob: 0.7, slice: 1.2, approach: 1.0, volley: 0.9,
  },
};

export const DEFAULT_TUNING: Tuning = {
  shots: SHOTS,
  minSuccess: 0.05,
  maxSuccess: 0.95,
  strengthBonus: 1.15,
  fatigue: {
    staminaFloor: 0.2,
    baseShotCost: 0.02,
    serveCost: 0.015,
    specialShotCost: 0.01,
    longRallyThreshold: 4,
    longRallyCost: 0.005,
    recoveryPerPoint: 0.1,
    minFatigueFactor: 0.6,
  },
  position: {
    volleyAtNet: 1.1,
    volleyFromMidcourt: 0.8,
    dropVsBaseline: 1.15,
    dropVsNet: 0.6,
    dropMovementDefense: 0.15,
    lobVsNet: 1.2,
    approachFromBack: 0.9,
    offBalanceFromWide: 0.92,
    lobAfterDrop: 1.1,
    volleyAfterLob: 1.1,
  },
  styles: STYLES,
};

export function resolveTuning(overrides: TuningOverrides = {}): Tuning {
  return {
    shots: { ...DEFAULT_TUNING.shots, ...overrides.shots },
    minSuccess: overrides.minSuccess ?? DEFAULT_TUNING.minSuccess,
    maxSuccess: overrides.maxSuccess ?? DEFAULT_TUNING.maxSuccess,
    strengthBonus: overrides.strengthBonus ?? DEFAULT_TUNING.strengthBonus,
    fatigue: { ...DEFAULT_TUNING.fatigue, ...overrides.fatigue },
    position: { ...DEFAULT_TUNING.position, ...overrides.position },
    styles: { ...DEFAULT_TUNING.styles, ...overrides.styles },
  };
}
