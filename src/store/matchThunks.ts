import type { RallyUpdate, ServeType, ShotType } from '../engine/types';
import type { MatchConfig, MatchHandle } from '../engine/match';
import { continueRally, playShot, serveChoice, snapshot, startMatch } from '../engine/match';
import { matchOpened, rallyUpdated } from './matchesSlice';
import type { AppThunk } from './index';

// The caller keeps the handle; the store only keeps what the screens read.

export const beginMatch = (player: unknown, opponent: unknown, config: MatchConfig): AppThunk<MatchHandle> =>
  dispatch => {
    const handle = startMatch(player, opponent, config);
    dispatch(matchOpened({
      names: { player: handle.players.player.profile.name, opponent: handle.players.opponent.profile.name },
      update: snapshot(handle),
    }));
    return handle;
  };

export const submitServe = (handle: MatchHandle, serveType: ServeType): AppThunk<RallyUpdate> =>
  dispatch => {
    const update = serveChoice(handle, serveType);
    dispatch(rallyUpdated(update));
    return update;
  };

export const submitShot = (handle: MatchHandle, shotType: ShotType): AppThunk<RallyUpdate> =>
  dispatch => {
    const update = playShot(handle, shotType);
    dispatch(rallyUpdated(update));
    return update;
  };

export const advanceRally = (handle: MatchHandle): AppThunk<RallyUpdate> =>
  dispatch => {
    const update = continueRally(handle);
    dispatch(rallyUpdated(update));
    return update;
  };
