export * from './engine/types';
export * from './engine/errors';
export { DEFAULT_TUNING, resolveTuning } from './engine/constants';
export type { Tuning, TuningOverrides, ShotProfile, StyleWeights } from './engine/constants';
export { parseProfile, profileSchema, defaultPlayerProfile, sampleOpponents, generateOpponentProfile, describeRating, describeSkills } from './engine/profiles';
export type { PlayerProfileInput } from './engine/profiles';
export { applyShot, recover, fatigueFactor, describeStamina } from './engine/fatigue';
export { legalShots, isLegalShot, nextZone, opponentZone } from './engine/court';
export { successProbability, resolveShot } from './engine/shots';
export { chooseShot, shotWeights, styleWeights } from './engine/styles';
export { awardPoint, createScore, formatScore, formatPoints, isPressurePoint } from './engine/scoring';
export { startMatch, serveChoice, playShot, continueRally, snapshot, nextTurn } from './engine/match';
export type { MatchConfig, MatchHandle } from './engine/match';
export { createRng } from './engine/utils';
export type { Rng } from './engine/utils';
export { createAppStore } from './store';
export type { AppStore, RootState, AppDispatch, AppThunk } from './store';
export { matchOpened, rallyUpdated, matchClosed, selectMatch, selectMatchIds } from './store/matchesSlice';
export { beginMatch, submitServe, submitShot, advanceRally } from './store/matchThunks';
