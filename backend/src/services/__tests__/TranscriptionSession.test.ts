import { languages } from '../../constants/languages';
import { TranscriptionError, TranslationError } from '../../types/errors';
import { err, ok, type Result } from '../../types/Result';
import { WorkflowState } from '../../types/WorkflowEnums';
import {
  audioUpload,
  languageNamed,
  stubTranscriber,
  stubTranslator,
  unwrap,
  unwrapErr,
} from '../../testing/fixtures';
import { TranscriptionSession, countWords } from '../TranscriptionSession';

function createSession() {
  const { transcriber, transcribe } = stubTranscriber();
  const { translator, translate } = stubTranslator();
  const session = new TranscriptionSession('session-1', { transcriber, translator });
  return { session, transcribe, translate };
}

describe('countWords', () => {
  it('should split on any run of whitespace', () => {
    expect(countWords('hello world')).toBe(2);
    expect(countWords('  one\ttwo\n\nthree  ')).toBe(3);
    expect(countWords('')).toBe(0);
  });
});

describe('TranscriptionSession', () => {
  it('should start empty with English as source and the first other language as target', () => {
    const { session } = createSession();

    expect(session.snapshot()).toEqual({
      workflowState: WorkflowState.IDLE,
      transcription: null,
      translation: null,
      sourceLanguage: { name: 'English', code: 'en' },
      targetLanguage: { name: 'Turkish', code: 'tr' },
      targetLanguages: languages.slice(1),
      audio: null,
      stats: null,
      lastError: null,
      busy: false,
    });
  });

  describe('transcription', () => {
    it('should store the transcript of a 5,000 byte English upload', async () => {
      const { session, transcribe } = createSession();
      transcribe.mockResolvedValue(ok('hello world'));
      const upload = audioUpload('meeting.m4a', 5000);

      unwrap(session.selectSourceLanguage('English'));
      unwrap(session.uploadAudio(upload));
      const snapshot = unwrap(await session.transcribe());

      expect(transcribe).toHaveBeenCalledWith(upload, languageNamed('English'));
      expect(snapshot.transcription).toBe('hello world');
      expect(snapshot.stats).toEqual({ transcriptionLength: 11, transcriptionWordCount: 2 });
      expect(snapshot.audio).toEqual({ fileName: 'meeting.m4a', size: 5000 });
      expect(snapshot.workflowState).toBe(WorkflowState.TRANSCRIBED);
      expect(snapshot.busy).toBe(false);
    });

    it('should count characters outside the basic plane once', async () => {
      const { session, transcribe } = createSession();
      transcribe.mockResolvedValue(ok('a 😀'));
      unwrap(session.uploadAudio(audioUpload()));

      const snapshot = unwrap(await session.transcribe());

      expect(snapshot.stats).toEqual({ transcriptionLength: 3, transcriptionWordCount: 2 });
    });

    it('should keep the transcript empty and record the error when the service fails', async () => {
      const { session, transcribe } = createSession();
      transcribe.mockResolvedValue(err(new TranscriptionError(new Error('socket hang up'))));
      unwrap(session.uploadAudio(audioUpload()));

      const error = unwrapErr(await session.transcribe());

      expect(error.kind).toBe('transcription_failed');
      const snapshot = session.snapshot();
      expect(snapshot.transcription).toBeNull();
      expect(snapshot.workflowState).toBe(WorkflowState.UPLOADED);
      expect(snapshot.lastError).toEqual({
        kind: 'transcription_failed',
        message: 'An error occurred during transcription: socket hang up',
      });
    });

    it('should keep the previous transcript when a later attempt fails', async () => {
      const { session, transcribe } = createSession();
      transcribe
        .mockResolvedValueOnce(ok('first take'))
        .mockResolvedValueOnce(err(new TranscriptionError(new Error('timeout'))));
      unwrap(session.uploadAudio(audioUpload()));
      unwrap(await session.transcribe());

      unwrapErr(await session.transcribe());

      expect(session.snapshot().transcription).toBe('first take');
      expect(session.snapshot().workflowState).toBe(WorkflowState.TRANSCRIBED);
    });

    it('should refuse to transcribe without an upload', async () => {
      const { session, transcribe } = createSession();

      const error = unwrapErr(await session.transcribe());

      expect(error.kind).toBe('invalid_request');
      expect(transcribe).not.toHaveBeenCalled();
    });

    it('should clear the previous translation when the clip is transcribed again', async () => {
      const { session, transcribe, translate } = createSession();
      transcribe.mockResolvedValueOnce(ok('hello world')).mockResolvedValueOnce(ok('second take'));
      translate.mockResolvedValue(ok('merhaba dunya'));
      unwrap(session.uploadAudio(audioUpload()));
      unwrap(await session.transcribe());
      unwrap(await session.translate());

      const snapshot = unwrap(await session.transcribe());

      expect(snapshot.transcription).toBe('second take');
      expect(snapshot.translation).toBeNull();
      expect(snapshot.workflowState).toBe(WorkflowState.TRANSCRIBED);
    });
  });

  describe('translation', () => {
    async function transcribedSession() {
      const context = createSession();
      context.transcribe.mockResolvedValue(ok('hello world'));
      unwrap(context.session.uploadAudio(audioUpload()));
      unwrap(await context.session.transcribe());
      return context;
    }

    it('should translate the current transcript into the selected target language', async () => {
      const { session, translate } = await transcribedSession();
      translate.mockResolvedValue(ok('hallo welt'));

      unwrap(session.selectTargetLanguage('German'));
      const snapshot = unwrap(await session.translate());

      expect(translate).toHaveBeenCalledWith({
        text: 'hello world',
        sourceLanguage: languageNamed('English'),
        targetLanguage: languageNamed('German'),
      });
      expect(snapshot.translation).toBe('hallo welt');
      expect(snapshot.workflowState).toBe(WorkflowState.TRANSLATED);
    });

    it('should keep the previous translation when a later attempt fails', async () => {
      const { session, translate } = await transcribedSession();
      translate
        .mockResolvedValueOnce(ok('hallo welt'))
        .mockResolvedValueOnce(err(new TranslationError(new Error('quota exceeded'))));
      unwrap(session.selectTargetLanguage('German'));
      unwrap(await session.translate());

      const error = unwrapErr(await session.translate());

      expect(error.message).toBe('An error occurred during translation: quota exceeded');
      expect(session.snapshot().translation).toBe('hallo welt');
      expect(session.snapshot().transcription).toBe('hello world');
      expect(session.snapshot().lastError?.kind).toBe('translation_failed');
    });

    it('should refuse to translate before a transcript exists', async () => {
      const { session, translate } = createSession();
      unwrap(session.uploadAudio(audioUpload()));

      const error = unwrapErr(await session.translate());

      expect(error.kind).toBe('invalid_request');
      expect(translate).not.toHaveBeenCalled();
    });

    it('should refuse to translate an empty transcript', async () => {
      const { session, transcribe, translate } = createSession();
      transcribe.mockResolvedValue(ok(''));
      unwrap(session.uploadAudio(audioUpload()));
      const transcribed = unwrap(await session.transcribe());

      const error = unwrapErr(await session.translate());

      expect(transcribed.transcription).toBe('');
      expect(error.message).toBe('The transcript is empty, there is nothing to translate');
      expect(translate).not.toHaveBeenCalled();
      expect(session.snapshot().workflowState).toBe(WorkflowState.TRANSCRIBED);
    });

    it('should translate the transcript and languages as they were when triggered', async () => {
      const { session, translate } = await transcribedSession();
      let finish: (result: Result<string, TranslationError>) => void = () => undefined;
      translate.mockReturnValue(
        new Promise((resolve) => {
          finish = resolve;
        })
      );

      const pending = session.translate();

      unwrap(session.selectTargetLanguage('German'));
      expect(unwrapErr(await session.transcribe()).kind).toBe('session_busy');
      expect(unwrapErr(session.uploadAudio(audioUpload('other.m4a'))).kind).toBe('session_busy');
      expect(unwrapErr(await session.translate()).kind).toBe('session_busy');

      finish(ok('merhaba dunya'));
      const snapshot = unwrap(await pending);

      expect(translate).toHaveBeenCalledTimes(1);
      expect(translate).toHaveBeenCalledWith({
        text: 'hello world',
        sourceLanguage: languageNamed('English'),
        targetLanguage: languageNamed('Turkish'),
      });
      expect(snapshot.translation).toBe('merhaba dunya');
      expect(snapshot.targetLanguage.name).toBe('German');
      expect(snapshot.transcription).toBe('hello world');
      expect(snapshot.audio?.fileName).toBe('meeting.m4a');
      expect(snapshot.busy).toBe(false);
    });
  });

  describe('language selection', () => {
    it('should never list the source language as a target', () => {
      const { session } = createSession();

      for (const language of languages) {
        const snapshot = unwrap(session.selectSourceLanguage(language.name));
        expect(snapshot.targetLanguages.map((l) => l.name)).not.toContain(language.name);
        expect(snapshot.targetLanguage.code).not.toBe(language.code);
      }
    });

    it('should move the target when the source takes its place', () => {
      const { session } = createSession();

      const snapshot = unwrap(session.selectSourceLanguage('Turkish'));

      expect(snapshot.targetLanguage.name).toBe('English');
    });

    it('should reject a target equal to the source and unknown names', () => {
      const { session } = createSession();

      expect(unwrapErr(session.selectTargetLanguage('English')).message).toBe(
        'Target language must differ from the transcription language'
      );
      expect(unwrapErr(session.selectSourceLanguage('Klingon')).message).toBe('Unsupported language: Klingon');
      expect(session.snapshot().targetLanguage.name).toBe('Turkish');
    });

    it('should apply a source and target change together', () => {
      const { session } = createSession();

      const snapshot = unwrap(session.selectLanguages({ sourceLanguage: 'German', targetLanguage: 'English' }));

      expect(snapshot.sourceLanguage.name).toBe('German');
      expect(snapshot.targetLanguage.name).toBe('English');
    });

    it('should leave both languages unchanged when either one is rejected', () => {
      const { session } = createSession();

      const unknownTarget = unwrapErr(session.selectLanguages({ sourceLanguage: 'German', targetLanguage: 'Klingon' }));
      const sameAsSource = unwrapErr(session.selectLanguages({ sourceLanguage: 'Turkish', targetLanguage: 'Turkish' }));

      expect(unknownTarget.message).toBe('Unsupported language: Klingon');
      expect(sameAsSource.message).toBe('Target language must differ from the transcription language');
      expect(session.snapshot().sourceLanguage.name).toBe('English');
      expect(session.snapshot().targetLanguage.name).toBe('Turkish');
    });
  });

  describe('uploads', () => {
    it('should clear the results of the previous clip', async () => {
      const { session, transcribe, translate } = createSession();
      transcribe.mockResolvedValue(ok('hello world'));
      translate.mockResolvedValue(ok('merhaba dunya'));
      unwrap(session.uploadAudio(audioUpload('first.m4a')));
      unwrap(await session.transcribe());
      unwrap(await session.translate());

      const snapshot = unwrap(session.uploadAudio(audioUpload('second.mp3', 10)));

      expect(snapshot.transcription).toBeNull();
      expect(snapshot.translation).toBeNull();
      expect(snapshot.stats).toBeNull();
      expect(snapshot.audio).toEqual({ fileName: 'second.mp3', size: 10 });
      expect(snapshot.workflowState).toBe(WorkflowState.UPLOADED);
    });

    it('should reject unsupported and empty files', () => {
      const { session } = createSession();

      expect(unwrapErr(session.uploadAudio(audioUpload('notes.wav'))).message).toBe(
        'Unsupported file type: notes.wav. Accepted types: m4a, mp3'
      );
      expect(unwrapErr(session.uploadAudio(audioUpload('empty.m4a', 0))).message).toBe(
        'Uploaded file empty.m4a is empty'
      );
      expect(session.snapshot().workflowState).toBe(WorkflowState.IDLE);
    });
  });

  it('should reject other actions while a transcription is in flight', async () => {
    const { session, transcribe } = createSession();
    let finish: (result: Result<string, TranscriptionError>) => void = () => undefined;
    transcribe.mockReturnValue(
      new Promise((resolve) => {
        finish = resolve;
      })
    );
    unwrap(session.uploadAudio(audioUpload()));

    const pending = session.transcribe();

    expect(session.snapshot().busy).toBe(true);
    expect(unwrapErr(await session.transcribe()).kind).toBe('session_busy');
    expect(unwrapErr(await session.translate()).kind).toBe('session_busy');
    expect(unwrapErr(session.uploadAudio(audioUpload('other.m4a'))).kind).toBe('session_busy');

    finish(ok('hello world'));
    const snapshot = unwrap(await pending);

    expect(snapshot.transcription).toBe('hello world');
    expect(snapshot.busy).toBe(false);
    expect(snapshot.audio?.fileName).toBe('meeting.m4a');
  });
});
