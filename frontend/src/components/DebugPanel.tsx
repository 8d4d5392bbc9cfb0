import React from 'react';
import type { SessionSnapshot } from '../types/ApiResponse';

interface DebugPanelProps {
  session: SessionSnapshot;
}

const DebugPanel: React.FC<DebugPanelProps> = ({ session }) => {
  const { audio, stats, sourceLanguage, workflowState } = session;

  return (
    <details className="mt-6 rounded-md bg-gray-50 p-4 text-sm text-gray-700">
      <summary className="cursor-pointer font-medium">Details</summary>
      <dl className="mt-2 grid grid-cols-2 gap-1">
        <dt>State</dt>
        <dd>{workflowState}</dd>
        {audio && (
          <>
            <dt>File name</dt>
            <dd>{audio.fileName}</dd>
            <dt>File size</dt>
            <dd>{audio.size} bytes</dd>
          </>
        )}
        <dt>Language</dt>
        <dd>
          {sourceLanguage.name} ({sourceLanguage.code})
        </dd>
        {stats && (
          <>
            <dt>Transcription length</dt>
            <dd>{stats.transcriptionLength} characters</dd>
            <dt>Word count</dt>
            <dd>{stats.transcriptionWordCount}</dd>
          </>
        )}
      </dl>
    </details>
  );
};

export default DebugPanel;
