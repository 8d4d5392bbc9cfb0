import { useCallback } from 'react';
import { useAppState } from '../context/context';
import type { LanguageSelection } from '../types/ApiResponse';
import { runSessionRequest } from './sessionRequest';

/**
 * Hook for the source and target language pickers
 */
export const useLanguage = () => {
  const { state, dispatch, api } = useAppState();
  const { sessionId, session } = state;

  const select = useCallback(
    async (selection: LanguageSelection) => {
      if (sessionId === null) return;
      await runSessionRequest(dispatch, 'languages', () => api.selectLanguages(sessionId, selection));
    },
    [api, dispatch, sessionId]
  );

  const setSourceLanguage = useCallback(
    (language: string) => select({ sourceLanguage: language }),
    [select]
  );

  const setTargetLanguage = useCallback(
    (language: string) => select({ targetLanguage: language }),
    [select]
  );

  return {
    languages: state.languages,
    sourceLanguage: session?.sourceLanguage.name ?? null,
    targetLanguage: session?.targetLanguage.name ?? null,
    targetLanguages: session?.targetLanguages ?? [],
    setSourceLanguage,
    setTargetLanguage,
  };
};
