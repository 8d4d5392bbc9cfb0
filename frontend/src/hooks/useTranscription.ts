import { useCallback } from 'react';
import { ActionType, type AppState } from '../context/types';
import { useAppState } from '../context/context';
import { copyToClipboard } from '../utils/clipboard';
import { runSessionRequest } from './sessionRequest';

/**
 * Which buttons are enabled. Translation needs a non-empty transcript.
 */
export function availableActions({ sessionId, session, pendingAction }: AppState) {
  return {
    canUpload: sessionId !== null && idle,
    canTranscribe: idle && workflowState !== 'idle',
    canTranslate: idle && hasTranscript && (workflowState === 'transcribed' || workflowState === 'translated'),
  };
}

/**
 * Hook for the upload, transcribe, translate and copy actions
 */
export const useTranscription = () => {
  const { state, dispatch, api } = useAppState();
  const { sessionId, session, pendingAction } = state;

  const uploadAudio = useCallback(
    async (file: File): Promise<boolean> => {
      if (sessionId === null) return false;
      const uploaded = await runSessionRequest(dispatch, 'upload', () => api.uploadAudio(sessionId, file, file.name));
      return uploaded !== null;
    },
    [api, dispatch, sessionId]
  );

  const transcribe = useCallback(async () => {
    if (sessionId === null) return;
    await runSessionRequest(dispatch, 'transcribe', () => api.transcribe(sessionId), 'Transcription completed!');
  }, [api, dispatch, sessionId]);

  const translate = useCallback(async () => {
    if (sessionId === null) return;
    await runSessionRequest(dispatch, 'translate', () => api.translate(sessionId), 'Translation completed!');
  }, [api, dispatch, sessionId]);

  const copy = useCallback(
    async (text: string, label: string) => {
      const result = await copyToClipboard(text);
      if (result.ok) {
        dispatch({ type: ActionType.SHOW_NOTICE, notice: `${label} copied to clipboard!` });
      } else {
        dispatch({ type: ActionType.SHOW_ERROR, error: result.error.message });
      }
    },
    [dispatch]
  );

  const clearMessages = useCallback(() => {
    dispatch({ type: ActionType.CLEAR_MESSAGES });
  }, [dispatch]);

  return {
    session,
    pendingAction,
    error: state.error,
    notice: state.notice,
    ...availableActions(state),
    uploadAudio,
    transcribe,
    translate,
    copy,
    clearMessages,
  };
};
