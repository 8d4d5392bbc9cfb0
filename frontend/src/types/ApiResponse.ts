export interface LanguageOption {
  name: string;
  code: string;
}

export type WorkflowState = 'idle' | 'uploaded' | 'transcribed' | 'translated';

export interface SessionSnapshot {
  workflowState: WorkflowState;
  transcription: string | null;
  translation: string | null;
  sourceLanguage: LanguageOption;
  targetLanguage: LanguageOption;
  targetLanguages: LanguageOption[];
  audio: { fileName: string; size: number } | null;
  stats: { transcriptionLength: number; transcriptionWordCount: number } | null;
  lastError: { kind: string; message: string } | null;
  busy: boolean;
}

export interface CreatedSession {
  sessionId: string;
  session: SessionSnapshot;
}

export interface ApiErrorBody {
  error: { kind: string; message: string };
  session?: SessionSnapshot;
}

export interface LanguageSelection {
  sourceLanguage?: string;
  targetLanguage?: string;
}
