import { createSlice } from '@reduxjs/toolkit';
import type { PayloadAction } from '@reduxjs/toolkit';
import type { MatchLogEntry, PlayerId, RallyUpdate } from '../engine/types';

export interface MatchView {
  id: string;
  names: Record<PlayerId, string>;
  update: RallyUpdate;
  log: MatchLogEntry[];
}

interface MatchesState {
  byId: Record<string, MatchView>;
  order: string[];
}

const initialState: MatchesState = {
  byId: {},
  order: [],
};

export const matchesSlice = createSlice({
  name: 'matches',
  initialState,
  reducers: {
    matchOpened: (state, action: PayloadAction<{ names: Record<PlayerId, string>; update: RallyUpdate }>) => {
      const { names, update } = action.payload;
      if (!state.byId[update.matchId]) state.order.push(update.matchId);
      state.byId[update.matchId] = { id: update.matchId, names, update, log: [...update.log] };
    },
    rallyUpdated: (state, action: PayloadAction<RallyUpdate>) => {
      const view = state.byId[action.payload.matchId];
      if (!view) return;
      view.update = action.payload;
      view.log.push(...action.payload.log);
    },
    matchClosed: (state, action: PayloadAction<string>) => {
      delete state.byId[action.payload];
      state.order = state.order.filter(id => id !== action.payload);
    },
  },
});

export const { matchOpened, rallyUpdated, matchClosed } = matchesSlice.actions;

export const selectMatch = (state: { matches: MatchesState }, id: string): MatchView | undefined => state.matches.byId[id];
export const selectMatchIds = (state: { matches: MatchesState }): string[] => state.matches.order;

export default matchesSlice.reducer;
