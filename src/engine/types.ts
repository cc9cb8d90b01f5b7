export const SHOT_TYPES = [
  'first_serve',
  'second_serve',
  'forehand_cross_court',
  'forehand_down_the_line',
  'backhand_cross_court',
  'backhand_down_the_line',
  'drop_shot',
  'lob',
  'slice',
  'approach',
  'volley',
] as const;

export type ShotType = typeof SHOT_TYPES[number];

export const SHOT_LABELS: Record<ShotType, string> = {
  first_serve: 'first serve',
  second_serve: 'second serve',
  forehand_cross_court: 'forehand cross-court',
  forehand_down_the_line: 'forehand down the line',
  backhand_cross_court: 'backhand cross-court',
  backhand_down_the_line: 'backhand down the line',
  drop_shot: 'drop shot',
  lob: 'lob',
  slice: 'slice',
  approach: 'approach shot',
  volley: 'volley',
};

export type ServeType = 'first' | 'second';

export const COURT_ZONES = ['baseline', 'midcourt', 'net', 'wide_left', 'wide_right'] as const;

export type CourtZone = typeof COURT_ZONES[number];

export type PlayerId = 'player' | 'opponent';

export const OPPONENT_STYLES = [
  'aggressive_baseliner',
  'counter_puncher',
  'net_rusher',
  'all_rounder',
  'forehand_dominant',
  'backhand_dominant',
] as const;

export type OpponentStyle = typeof OPPONENT_STYLES[number];

export type ShotSkills = Record<ShotType, number>;

export interface PlayerProfile {
  name: string;
  skills: ShotSkills;
  strengths: ShotType[];
  movement: number;
  stamina: number;
  style?: OpponentStyle;
}

export interface PlayerState {
  id: PlayerId;
  profile: PlayerProfile;
  stamina: number;
  zone: CourtZone;
}

export type ShotOutcome =
  | 'in_play'
  | 'winner'
  | 'ace'
  | 'error'
  | 'forced_error'
  | 'fault'
  | 'double_fault';

export interface ShotEvent {
  readonly type: ShotType;
  readonly hitter: PlayerId;
  readonly success: boolean;
  readonly outcome: ShotOutcome;
  readonly beneficiary: PlayerId;
  readonly probability: number;
  readonly resultingZone: CourtZone;
  readonly receiverZone: CourtZone;
}

export interface Rally {
  shots: ShotEvent[];
  currentHitter: PlayerId;
  ballZone: CourtZone;
  expecting: 'second_serve' | 'shot';
}

export type SideScore = Record<PlayerId, number>;

export interface CompletedSet {
  games: SideScore;
  tiebreak: SideScore | null;
  winner: PlayerId;
}

export interface MatchScore {
  points: SideScore;
  games: SideScore;
  sets: SideScore;
  currentSet: number;
  server: PlayerId;
  completedSets: CompletedSet[];
  isTiebreak: boolean;
  isDeuce: boolean;
  advantage: PlayerId | null;
  tiebreakFirstServer: PlayerId | null;
  winner: PlayerId | null;
}

export type ScoreStatus = 'point_over' | 'game_over' | 'set_over' | 'match_over';

// 'ready' only appears on snapshots taken between points.
export type RallyStatus = 'ready' | 'in_progress' | ScoreStatus;

export type ScoreCall =
  | { kind: 'deuce' }
  | { kind: 'tiebreak' }
  | { kind: 'advantage'; side: PlayerId }
  | { kind: 'game'; side: PlayerId }
  | { kind: 'set'; side: PlayerId; games: SideScore }
  | { kind: 'match'; side: PlayerId };

export type NextTurn = 'player_serve' | 'player_shot' | 'opponent_serve' | 'opponent_shot' | 'none';

export interface MatchLogEntry {
  set: number;
  games: SideScore;
  text: string;
}

export interface RallyUpdate {
  matchId: string;
  zones: Record<PlayerId, CourtZone>;
  stamina: Record<PlayerId, number>;
  condition: Record<PlayerId, string>;
  ballZone: CourtZone | null;
  lastShot: ShotEvent | null;
  score: MatchScore;
  scoreLine: string;
  status: RallyStatus;
  pointWinner: PlayerId | null;
  nextTurn: NextTurn;
  log: MatchLogEntry[];
}
