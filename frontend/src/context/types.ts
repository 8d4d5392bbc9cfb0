import type { LanguageOption, SessionSnapshot } from '../types/ApiResponse';

/**
 * The user actions that wait on the backend
 */
export type PendingAction = 'start' | 'languages' | 'upload' | 'transcribe' | 'translate' | 'end';

export interface AppState {
  sessionId: string | null;
  session: SessionSnapshot | null;
  languages: LanguageOption[];
  pendingAction: PendingAction | null;
  error: string | null;
  notice: string | null;
}

export enum ActionType {
  LANGUAGES_LOADED = 'LANGUAGES_LOADED',
  SESSION_STARTED = 'SESSION_STARTED',
  REQUEST_STARTED = 'REQUEST_STARTED',
  SESSION_UPDATED = 'SESSION_UPDATED',
  REQUEST_FAILED = 'REQUEST_FAILED',
  SHOW_NOTICE = 'SHOW_NOTICE',
  SHOW_ERROR = 'SHOW_ERROR',
  CLEAR_MESSAGES = 'CLEAR_MESSAGES',
  SESSION_ENDED = 'SESSION_ENDED'
}

export type Action =
  | { type: ActionType.LANGUAGES_LOADED; languages: LanguageOption[] }
  | { type: ActionType.SESSION_STARTED; sessionId: string; session: SessionSnapshot }
  | { type: ActionType.REQUEST_STARTED; action: PendingAction }
  | { type: ActionType.SESSION_UPDATED; session: SessionSnapshot; notice?: string }
  | { type: ActionType.REQUEST_FAILED; error: string; session?: SessionSnapshot | null }
  | { type: ActionType.SHOW_NOTICE; notice: string }
  | { type: ActionType.SHOW_ERROR; error: string }
  | { type: ActionType.CLEAR_MESSAGES }
  | { type: ActionType.SESSION_ENDED };
