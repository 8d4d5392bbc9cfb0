import type { Dispatch } from 'react';
import { ActionType, type Action, type PendingAction } from '../context/types';
import { ApiError } from '../services/TranscriberApi';
import type { SessionSnapshot } from '../types/ApiResponse';

export const SESSION_EXPIRED_MESSAGE = 'Your session has expired. Start a new session to continue.';

export function describeFailure(error: unknown): string {
  if (error instanceof ApiError && error.kind === 'session_not_found') {
    return SESSION_EXPIRED_MESSAGE;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs one backend call for a user action and reports the outcome to the reducer.
 * Resolves with the new snapshot, or null when the call failed.
 */
export async function runSessionRequest(
  dispatch: Dispatch<Action>,
  action: PendingAction,
  request: () => Promise<SessionSnapshot>,
  notice?: string
): Promise<SessionSnapshot | null> {
  dispatch({ type: ActionType.REQUEST_STARTED, action });
  try {
    const session = await request();
    dispatch({ type: ActionType.SESSION_UPDATED, session, notice });
    return session;
  } catch (error) {
    dispatch({
      type: ActionType.REQUEST_FAILED,
      error: describeFailure(error),
      session: error instanceof ApiError ? error.session : null,
    });
    return null;
  }
}
