import { useCallback, useEffect } from 'react';
import { ActionType } from '../context/types';
import { useAppState } from '../context/context';
import { describeFailure } from './sessionRequest';

/**
 * Hook for the backend session lifecycle: restore or start on mount, start over, end
 */
export const useSession = () => {
  const { state, dispatch, api, sessionService } = useAppState();

  const startSession = useCallback(async () => {
    dispatch({ type: ActionType.REQUEST_STARTED, action: 'start' });
    try {
      const { sessionId, session } = await api.createSession();
      sessionService.saveSession(sessionId);
      dispatch({ type: ActionType.SESSION_STARTED, sessionId, session });
    } catch (error) {
      dispatch({ type: ActionType.REQUEST_FAILED, error: describeFailure(error) });
    }
  }, [api, dispatch, sessionService]);

  const endSession = useCallback(async () => {
    const { sessionId } = state;
    sessionService.clearSession();
    if (sessionId !== null) {
      dispatch({ type: ActionType.REQUEST_STARTED, action: 'end' });
      try {
        await api.endSession(sessionId);
      } catch (error) {
        // The server may already have expired it; the local session is gone either way
        console.warn('Failed to end session on the server:', error);
      }
    }
    dispatch({ type: ActionType.SESSION_ENDED });
  }, [api, dispatch, sessionService, state]);

  const startOver = useCallback(async () => {
    await endSession();
    await startSession();
  }, [endSession, startSession]);

  // Restore session on mount
  useEffect(() => {
    let cancelled = false;

    const restore = async () => {
      try {
        const languages = await api.listLanguages();
        if (!cancelled) dispatch({ type: ActionType.LANGUAGES_LOADED, languages });
      } catch (error) {
        if (!cancelled) dispatch({ type: ActionType.SHOW_ERROR, error: describeFailure(error) });
        return;
      }

      const stored = sessionService.loadSession();
      if (stored && sessionService.isValidSession(stored)) {
        try {
          const session = await api.getSession(stored.id);
          if (!cancelled) dispatch({ type: ActionType.SESSION_STARTED, sessionId: stored.id, session });
          return;
        } catch (error) {
          console.info('Stored session could not be restored, starting a new one:', error);
          sessionService.clearSession();
        }
      }
      if (!cancelled) await startSession();
    };

    void restore();
    return () => {
      cancelled = true;
    };
  }, [api, dispatch, sessionService, startSession]);

  return {
    sessionId: state.sessionId,
    sessionStarted: state.sessionId !== null,
    startSession,
    endSession,
    startOver,
  };
};
