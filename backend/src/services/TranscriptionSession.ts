import {
  DEFAULT_SOURCE_LANGUAGE,
  audioExtensionOf,
  findLanguage,
  targetLanguagesFor,
  ACCEPTED_AUDIO_EXTENSIONS,
  type Language,
} from '../constants/languages';
import type { AudioSummary, AudioUpload } from '../types/audio';
import {
  AppError,
  InvalidRequestError,
  SessionBusyError,
  type ErrorKind,
  type SessionError,
  type TranscriptionError,
  type TranslationError,
} from '../types/errors';
import { err, ok, type Result } from '../types/Result';
import { WorkflowEvent, WorkflowState } from '../types/WorkflowEnums';
import { WorkflowStateMachine } from '../types/WorkflowStateMachine';
import { Logger, silentLogger } from '../utils/logger';
import type { Transcriber } from './TranscriptionService';
import type { Translator } from './TranslationService';

export interface TranscriptionStats {
  transcriptionLength: number;
  transcriptionWordCount: number;
}

export interface SessionSnapshot {
  workflowState: WorkflowState;
  transcription: string | null;
  translation: string | null;
  sourceLanguage: Language;
  targetLanguage: Language;
  targetLanguages: Language[];
  audio: AudioSummary | null;
  stats: TranscriptionStats | null;
  lastError: { kind: ErrorKind; message: string } | null;
  busy: boolean;
}

export type SessionResult = Result<SessionSnapshot, SessionError>;

export interface LanguageSelection {
  sourceLanguage?: string;
  targetLanguage?: string;
}

export interface SessionDependencies {
  transcriber: Transcriber;
  translator: Translator;
  logger?: Logger;
  now?: () => number;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

export function validateAudioUpload(upload: AudioUpload): InvalidRequestError | null {
  if (!audioExtensionOf(upload.fileName)) {
    return new InvalidRequestError(
      `Unsupported file type: ${upload.fileName}. Accepted types: ${ACCEPTED_AUDIO_EXTENSIONS.join(', ')}`
    );
  }
  if (upload.content.byteLength === 0) {
    return new InvalidRequestError(`Uploaded file ${upload.fileName} is empty`);
  }
  return null;
}

/**
 * State of one user's session: the current upload, the last transcript and
 * translation, and the selected languages. Results only change when the
 * matching service call succeeds; a failed call leaves them as they were.
 */
export class TranscriptionSession {
  readonly id: string;

  private readonly transcriber: Transcriber;
  private readonly translator: Translator;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly workflow: WorkflowStateMachine;

  private audio: AudioUpload | null = null;
  private transcription: string | null = null;
  private translation: string | null = null;
  private stats: TranscriptionStats | null = null;
  private sourceLanguage: Language = DEFAULT_SOURCE_LANGUAGE;
  private targetLanguage: Language = targetLanguagesFor(DEFAULT_SOURCE_LANGUAGE)[0];
  private lastError: AppError | null = null;
  private busy = false;
  private lastActivityAt: number;

  constructor(id: string, dependencies: SessionDependencies) {
    this.id = id;
    this.transcriber = dependencies.transcriber;
    this.translator = dependencies.translator;
    this.logger = dependencies.logger ?? silentLogger;
    this.now = dependencies.now ?? Date.now;
    this.workflow = new WorkflowStateMachine(WorkflowState.IDLE, this.logger);
    this.lastActivityAt = this.now();
  }

  get lastActivity(): number {
    return this.lastActivityAt;
  }

  isBusy(): boolean {
    return this.busy;
  }

  snapshot(): SessionSnapshot {
    return {
      workflowState: this.workflow.getState(),
      transcription: this.transcription,
      translation: this.translation,
      sourceLanguage: this.sourceLanguage,
      targetLanguage: this.targetLanguage,
      targetLanguages: targetLanguagesFor(this.sourceLanguage),
      audio: this.audio ? { fileName: this.audio.fileName, size: this.audio.size } : null,
      stats: this.stats,
      lastError: this.lastError ? this.lastError.toJSON() : null,
      busy: this.busy,
    };
  }

  selectSourceLanguage(name: string): SessionResult {
    return this.selectLanguages({ sourceLanguage: name });
  }

  selectTargetLanguage(name: string): SessionResult {
    return this.selectLanguages({ targetLanguage: name });
  }

  /**
   * Applies a source and/or target change as one update: both names are
   * checked against each other first, and nothing changes when either fails.
   */
  selectLanguages(selection: LanguageSelection): SessionResult {
    this.touch();
    let source = this.sourceLanguage;
    if (selection.sourceLanguage !== undefined) {
      const language = findLanguage(selection.sourceLanguage);
      if (!language) {
        return this.fail(new InvalidRequestError(`Unsupported language: ${selection.sourceLanguage}`));
      }
      source = language;
    }

    let target = this.targetLanguage;
    if (selection.targetLanguage !== undefined) {
      const language = findLanguage(selection.targetLanguage);
      if (!language) {
        return this.fail(new InvalidRequestError(`Unsupported language: ${selection.targetLanguage}`));
      }
      if (language.code === source.code) {
        return this.fail(new InvalidRequestError('Target language must differ from the transcription language'));
      }
      target = language;
    } else if (target.code === source.code) {
      target = targetLanguagesFor(source)[0];
      this.logger.debug(`Target language reset to ${target.name}`);
    }

    this.sourceLanguage = source;
    this.targetLanguage = target;
    return this.succeed();
  }

  /**
   * Replaces the current upload. Transcript and translation of the previous
   * upload are cleared so they are never shown next to a different clip.
   */
  uploadAudio(upload: AudioUpload): SessionResult {
    this.touch();
    if (this.busy) {
      return err(new SessionBusyError());
    }
    const invalid = validateAudioUpload(upload);
    if (invalid) {
      return this.fail(invalid);
    }

    this.audio = upload;
    this.transcription = null;
    this.translation = null;
    this.stats = null;
    this.workflow.dispatch(WorkflowEvent.UPLOAD_AUDIO);
    this.logger.info(`Uploaded file: ${upload.fileName}, Size: ${upload.size} bytes`);
    return this.succeed();
  }

  async transcribe(): Promise<SessionResult> {
    this.touch();
    if (this.busy) {
      return err(new SessionBusyError());
    }
    const audio = this.audio;
    if (!audio) {
      return this.fail(new InvalidRequestError('Upload an audio file before starting transcription'));
    }
    const language = this.sourceLanguage;

    this.busy = true;
    this.logger.debug(`Initializing transcription of ${audio.fileName} (${language.code})`);
    let result: Result<string, TranscriptionError>;
    try {
      result = await this.transcriber.transcribe(audio, language);
    } finally {
      this.busy = false;
      this.touch();
    }
    if (!result.ok) {
      return this.fail(result.error);
    }

    this.transcription = result.value;
    // A translation of the previous transcript no longer matches what is shown
    this.translation = null;
    this.stats = {
      // Code points, so characters outside the BMP count once
      transcriptionLength: [...result.value].length,
      transcriptionWordCount: countWords(result.value),
    };
    this.workflow.dispatch(WorkflowEvent.TRANSCRIPTION_SUCCEEDED);
    this.logger.info(`Transcription completed: ${this.stats.transcriptionWordCount} words`);
    return this.succeed();
  }

  async translate(): Promise<SessionResult> {
    this.touch();
    if (this.busy) {
      return err(new SessionBusyError());
    }
    const text = this.transcription;
    if (text === null) {
      return this.fail(new InvalidRequestError('Transcribe an audio file before translating'));
    }
    if (text.trim() === '') {
      return this.fail(new InvalidRequestError('The transcript is empty, there is nothing to translate'));
    }
    const sourceLanguage = this.sourceLanguage;
    const targetLanguage = this.targetLanguage;
    if (sourceLanguage.code === targetLanguage.code) {
      return this.fail(new InvalidRequestError('Target language must differ from the transcription language'));
    }

    this.busy = true;
    let result: Result<string, TranslationError>;
    try {
      result = await this.translator.translate({ text, sourceLanguage, targetLanguage });
    } finally {
      this.busy = false;
      this.touch();
    }
    if (!result.ok) {
      return this.fail(result.error);
    }

    this.translation = result.value;
    this.workflow.dispatch(WorkflowEvent.TRANSLATION_SUCCEEDED);
    this.logger.info(`Translation to ${targetLanguage.name} completed`);
    return this.succeed();
  }

  /**
   * Marks the session as used now; idle sessions expire.
   */
  touch(): void {
    this.lastActivityAt = this.now();
  }

  private succeed(): SessionResult {
    this.lastError = null;
    return ok(this.snapshot());
  }

  private fail(error: SessionError): SessionResult {
    this.lastError = error;
    this.logger.warn(error.message);
    return err(error);
  }
}
