import { createContext, useContext, type Dispatch } from 'react';
import type { TranscriberApi } from '../services/TranscriberApi';
import type { SessionService } from '../services/SessionService';
import type { Action, AppState } from './types';

export type AppStateContextType = {
  state: AppState;
  dispatch: Dispatch<Action>;
  api: TranscriberApi;
  sessionService: SessionService;
};

export const AppStateContext = createContext<AppStateContextType | undefined>(undefined);

export function useAppState(): AppStateContextType {
  const context = useContext(AppStateContext);
  if (context === undefined) {
    throw new Error('Transcriber hooks must be used within an AppStateProvider');
  }
  return context;
}
