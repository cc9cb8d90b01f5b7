import type { ShotType } from './types';
import type { FatigueTuning } from './constants';
import { DEFAULT_TUNING } from './constants';
import { clamp } from './utils';

export function shotCost(
  rallyLength: number, shotType: ShotType, movement: number,
  tuning: FatigueTuning = DEFAULT_TUNING.fatigue,
): number {
  const isServe = shotType === 'first_serve' || shotType === 'second_serve';
  let cost = isServe ? tuning.serveCost : tuning.baseShotCost;
  if (shotType === 'drop_shot' || shotType === 'lob') cost += tuning.specialShotCost;
  cost += Math.max(0, rallyLength - tuning.longRallyThreshold) * tuning.longRallyCost;
  // movement 0.5 → ×1.0, 1.0 → ×0.75, 0 → ×1.25
  return cost * (1.25 - 0.5 * clamp(movement, 0, 1));
}

/** Stamina after hitting the `rallyLength`-th shot of a point. Never rises, never drops below the floor. */
export function applyShot(
  stamina: number, rallyLength: number, shotType: ShotType, movement: number,
  tuning: FatigueTuning = DEFAULT_TUNING.fatigue,
): number {
  const next = stamina - shotCost(rallyLength, shotType, movement, tuning);
  return Math.max(tuning.staminaFloor, Math.min(stamina, next));
}

export function recover(stamina: number, tuning: FatigueTuning = DEFAULT_TUNING.fatigue): number {
  return Math.min(1, stamina + tuning.recoveryPerPoint);
}

export function fatigueFactor(stamina: number, tuning: FatigueTuning = DEFAULT_TUNING.fatigue): number {
  const s = clamp(stamina, 0, 1);
  return tuning.minFatigueFactor + (1 - tuning.minFatigueFactor) * s;
}

export function describeStamina(stamina: number): string {
  const tired = (1 - stamina) * 100;
  if (tired < 20) return 'Fresh';
  if (tired < 40) return 'Slightly tired';
  if (tired < 60) return 'Tiring';
  if (tired < 80) return 'Very tired';
  return 'Exhausted';
}
