import { useState } from 'react';
import { FileAudio, Languages, RotateCcw } from 'lucide-react';
import { Button } from './ui/button';
import AudioUploader from './AudioUploader';
import DebugPanel from './DebugPanel';
import LanguageSelector from './LanguageSelector';
import { ResultPanel } from './ResultPanel';
import { SessionDialog } from './SessionDialog';
import StatusDisplay from './StatusDisplay';
import { useSession } from '../hooks/useSession';
import { useLanguage } from '../hooks/useLanguage';
import { useTranscription } from '../hooks/useTranscription';

export const TranscriberApp = () => {
  const session = useSession();
  const language = useLanguage();
  const transcription = useTranscription();
  const [confirmStartOver, setConfirmStartOver] = useState(false);

  const snapshot = transcription.session;
  const busy = transcription.pendingAction !== null;

  const handleStartOver = () => {
    setConfirmStartOver(false);
    void session.startOver();
  };

  return (
    <div className="mx-auto max-w-2xl p-6">
      <header className="mb-6 flex items-center justify-between">
        <h1 className="text-2xl font-semibold">Audio Transcriber &amp; Translator</h1>
        <Button variant="outline" onClick={() => setConfirmStartOver(true)} disabled={!session.sessionStarted || busy}>
          <RotateCcw className="h-4 w-4" />
          Start over
        </Button>
      </header>

      <StatusDisplay
        pendingAction={transcription.pendingAction}
        error={transcription.error}
        notice={transcription.notice}
        onDismiss={transcription.clearMessages}
      />

      {!session.sessionStarted && !busy && (
        <Button size="lg" onClick={() => void session.startSession()}>
          New session
        </Button>
      )}

      {snapshot && (
        <>
          <div className="grid grid-cols-1 gap-4 sm:grid-cols-2">
            <LanguageSelector
              id="source-language"
              label="Transcription language"
              value={language.sourceLanguage}
              languages={language.languages}
              onChange={(name) => void language.setSourceLanguage(name)}
              disabled={busy}
            />
            <LanguageSelector
              id="target-language"
              label="Translate to"
              value={language.targetLanguage}
              languages={language.targetLanguages}
              onChange={(name) => void language.setTargetLanguage(name)}
              disabled={busy}
            />
          </div>

          <AudioUploader
            audio={snapshot.audio}
            disabled={!transcription.canUpload}
            onUpload={transcription.uploadAudio}
          />

          <div className="mb-6 flex gap-2">
            <Button onClick={() => void transcription.transcribe()} disabled={!transcription.canTranscribe}>
              <FileAudio className="h-4 w-4" />
              Transcribe
            </Button>
            <Button onClick={() => void transcription.translate()} disabled={!transcription.canTranslate}>
              <Languages className="h-4 w-4" />
              Translate
            </Button>
          </div>

          {snapshot.transcription && (
            <ResultPanel
              id="transcription"
              title="Transcription"
              text={snapshot.transcription}
              onCopy={(text) => void transcription.copy(text, 'Transcription')}
            />
          )}

          {snapshot.translation !== null && (
            <ResultPanel
              id="translation"
              title="Translation"
              text={snapshot.translation}
              onCopy={(text) => void transcription.copy(text, 'Translation')}
            />
          )}

          <DebugPanel session={snapshot} />
        </>
      )}

      {confirmStartOver && (
        <SessionDialog onCancel={() => setConfirmStartOver(false)} onConfirm={handleStartOver} />
      )}
    </div>
  );
};
