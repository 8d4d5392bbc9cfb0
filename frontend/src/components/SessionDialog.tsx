import React from 'react';
import { Button } from './ui/button';

interface SessionDialogProps {
  onCancel: () => void;
  onConfirm: () => void;
}

export const SessionDialog: React.FC<SessionDialogProps> = ({ onCancel, onConfirm }) => (
  <div className="fixed inset-0 z-50 flex items-center justify-center bg-black bg-opacity-40">
    <div className="w-full max-w-sm rounded-lg bg-white p-6 shadow-lg" role="dialog" aria-modal="true">
      <h2 className="mb-4 text-lg font-semibold">Start over?</h2>
      <p className="mb-6">The uploaded audio, transcript and translation of this session will be discarded.</p>
      <div className="flex justify-end gap-2">
        <Button onClick={onCancel} variant="outline">
          Cancel
        </Button>
        <Button onClick={onConfirm} variant="destructive">
          Start over
        </Button>
      </div>
    </div>
  </div>
);
