import React from 'react';
import { Loader2 } from 'lucide-react';
import { Alert } from './ui/alert';
import type { PendingAction } from '../context/types';

interface StatusDisplayProps {
  pendingAction: PendingAction | null;
  error: string | null;
  notice: string | null;
  onDismiss: () => void;
}

const pendingMessages: Record<PendingAction, string> = {
  start: 'Starting session...',
  languages: 'Updating languages...',
  upload: 'Uploading audio...',
  transcribe: 'Transcribing...',
  translate: 'Translating...',
  end: 'Ending session...',
};

// Spinner while a request runs, then the error or the success notice
const StatusDisplay: React.FC<StatusDisplayProps> = ({ pendingAction, error, notice, onDismiss }) => (
  <>
    {pendingAction && (
      <div className="mb-4 flex items-center gap-2 text-gray-600">
        <Loader2 className="h-4 w-4 animate-spin" />
        {pendingMessages[pendingAction]}
      </div>
    )}

    {error && (
      <Alert variant="destructive" title="Error" className="mb-4" onDismiss={onDismiss}>
        {error}
      </Alert>
    )}

    {notice && (
      <Alert variant="success" className="mb-4" onDismiss={onDismiss}>
        {notice}
      </Alert>
    )}
  </>
);

export default StatusDisplay;
