import React, { useMemo, useReducer, type ReactNode } from 'react';
import { TranscriberApi } from '../services/TranscriberApi';
import { SessionService } from '../services/SessionService';
import { AppStateContext } from './context';
import { initialState, sessionReducer } from './sessionReducer';

export { ActionType } from './types';
export type { Action, AppState, PendingAction } from './types';

interface AppStateProviderProps {
  children: ReactNode;
  api?: TranscriberApi;
  sessionService?: SessionService;
}

export const AppStateProvider: React.FC<AppStateProviderProps> = ({ children, api, sessionService }) => {
  const [state, dispatch] = useReducer(sessionReducer, initialState);

  // Created once so the hooks' callbacks and effects stay stable across renders
  const services = useMemo(
    () => ({
      api: api ?? new TranscriberApi(),
      sessionService: sessionService ?? new SessionService(),
    }),
    [api, sessionService]
  );

  const value = useMemo(() => ({ state, dispatch, ...services }), [state, services]);

  return <AppStateContext.Provider value={value}>{children}</AppStateContext.Provider>;
};
