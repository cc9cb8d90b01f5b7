import type { CourtZone, ShotType } from './types';

export type MatchErrorCode = 'INVALID_SHOT_FOR_ZONE' | 'INVALID_OPERATION' | 'MALFORMED_PROFILE';

export class MatchEngineError extends Error {
  readonly code: MatchErrorCode;

  constructor(code: MatchErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidShotForZone extends MatchEngineError {
  readonly shotType: ShotType;
  readonly zone: CourtZone;

  constructor(shotType: ShotType, zone: CourtZone, reason?: string) {
    super('INVALID_SHOT_FOR_ZONE', reason ?? `${shotType} cannot be played from ${zone}`);
    this.shotType = shotType;
    this.zone = zone;
  }
}

export class InvalidOperation extends MatchEngineError {
  constructor(message: string) {
    super('INVALID_OPERATION', message);
  }
}

export class MalformedProfile extends MatchEngineError {
  readonly issues: string[];

  constructor(label: string, issues: string[]) {
    super('MALFORMED_PROFILE', `${label} profile is malformed: ${issues.join('; ')}`);
    this.issues = issues;
  }
}
