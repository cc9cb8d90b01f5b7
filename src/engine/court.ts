import type { CourtZone, ShotType } from './types';

const GROUNDSTROKES: ShotType[] = [
  'forehand_cross_court', 'forehand_down_the_line',
  'backhand_cross_court', 'backhand_down_the_line',
];

// Serves never appear here: they are only struck through the serve path.
const LEGAL: Record<CourtZone, ShotType[]> = {
  baseline: [...GROUNDSTROKES, 'drop_shot', 'lob', 'slice', 'approach'],
  midcourt: [...GROUNDSTROKES, 'drop_shot', 'slice', 'approach', 'volley'],
  net: ['forehand_cross_court', 'backhand_cross_court', 'drop_shot', 'volley'],
  wide_left: [...GROUNDSTROKES, 'lob', 'slice'],
  wide_right: [...GROUNDSTROKES, 'lob', 'slice'],
};

export function legalShots(zone: CourtZone): ShotType[] {
  return LEGAL[zone];
}

export function isLegalShot(zone: CourtZone, shotType: ShotType): boolean {
  return LEGAL[zone].includes(shotType);
}

export function isServe(shotType: ShotType): boolean {
  return shotType === 'first_serve' || shotType === 'second_serve';
}

export function isBackCourt(zone: CourtZone): boolean {
  return zone === 'baseline' || zone === 'wide_left' || zone === 'wide_right';
}

function stepTowardNet(zone: CourtZone): CourtZone {
  if (isBackCourt(zone)) return 'midcourt';
  return 'net';
}

/** Where the hitter ends up after playing `shotType` from `zone`. */
export function nextZone(zone: CourtZone, shotType: ShotType): CourtZone {
  switch (shotType) {
    case 'first_serve':
    case 'second_serve':
      return 'baseline';
    case 'forehand_down_the_line':
    case 'backhand_down_the_line':
      return stepTowardNet(zone);
    case 'approach':
    case 'volley':
      return 'net';
    case 'drop_shot':
      return isBackCourt(zone) ? 'midcourt' : zone;
    case 'forehand_cross_court':
    case 'backhand_cross_court':
    case 'slice':
    case 'lob':
      return zone === 'wide_left' || zone === 'wide_right' ? 'baseline' : zone;
  }
}

/** Where a successful, returnable `shotType` sends the receiver. */
export function opponentZone(zone: CourtZone, shotType: ShotType): CourtZone {
  switch (shotType) {
    case 'first_serve':
    case 'second_serve':
      return 'baseline';
    case 'drop_shot':
      return stepTowardNet(zone);
    case 'lob':
      return zone === 'net' || zone === 'midcourt' ? 'baseline' : zone;
    case 'forehand_cross_court':
    case 'backhand_down_the_line':
      return isBackCourt(zone) ? 'wide_left' : zone;
    case 'forehand_down_the_line':
    case 'backhand_cross_court':
      return isBackCourt(zone) ? 'wide_right' : zone;
    case 'slice':
    case 'approach':
    case 'volley':
      return zone;
  }
}
