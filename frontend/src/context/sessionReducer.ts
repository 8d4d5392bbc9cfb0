import { ActionType, type Action, type AppState } from './types';

export const initialState: AppState = {
  sessionId: null,
  session: null,
  languages: [],
  pendingAction: null,
  error: null,
  notice: null,
};

/**
 * Applies backend responses to the page state. The session snapshot always
 * comes from the server; a failed request only replaces it when the error
 * response carries one.
 */
export function sessionReducer(state: AppState, action: Action): AppState {
  switch (action.type) {
    case ActionType.LANGUAGES_LOADED:
      return { ...state, languages: action.languages };

    case ActionType.SESSION_STARTED:
      return {
        ...state,
        sessionId: action.sessionId,
        session: action.session,
        pendingAction: null,
        error: null,
      };

    case ActionType.REQUEST_STARTED:
      return { ...state, pendingAction: action.action, error: null, notice: null };

    case ActionType.SESSION_UPDATED:
      return {
        ...state,
        session: action.session,
        pendingAction: null,
        error: null,
        notice: action.notice ?? null,
      };

    case ActionType.REQUEST_FAILED:
      return {
        ...state,
        session: action.session ?? state.session,
        pendingAction: null,
        error: action.error,
        notice: null,
      };

    case ActionType.SHOW_NOTICE:
      return { ...state, notice: action.notice, error: null };

    case ActionType.SHOW_ERROR:
      return { ...state, error: action.error, notice: null };

    case ActionType.CLEAR_MESSAGES:
      return { ...state, error: null, notice: null };

    case ActionType.SESSION_ENDED:
      return { ...initialState, languages: state.languages };

    default:
      return state;
  }
}
