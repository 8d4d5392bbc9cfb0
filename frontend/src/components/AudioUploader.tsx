import React, { useEffect, useState } from 'react';
import { Upload } from 'lucide-react';
import type { SessionSnapshot } from '../types/ApiResponse';

interface AudioUploaderProps {
  audio: SessionSnapshot['audio'];
  disabled: boolean;
  onUpload: (file: File) => Promise<boolean>;
}

/**
 * Uploads the clip and resolves with a preview URL once the server accepted it,
 * or null when the upload was rejected
 */
export async function uploadWithPreview(
  file: File,
  onUpload: (file: File) => Promise<boolean>,
  createObjectUrl: (file: File) => string = (blob) => URL.createObjectURL(blob)
): Promise<string | null> {
  return (await onUpload(file)) ? createObjectUrl(file) : null;
}

const AudioUploader: React.FC<AudioUploaderProps> = ({ audio, disabled, onUpload }) => {
  const [previewUrl, setPreviewUrl] = useState<string | null>(null);

  // Release the object URL when the preview changes or the uploader unmounts
  useEffect(() => {
    if (!previewUrl) return;
    return () => URL.revokeObjectURL(previewUrl);
  }, [previewUrl]);

  const handleChange = async (event: React.ChangeEvent<HTMLInputElement>) => {
    const input = event.target;
    const file = input.files?.[0];
    if (!file) return;
    input.value = '';
    // A rejected clip keeps the previous preview, matching the file name shown
    const url = await uploadWithPreview(file, onUpload);
    if (url) {
      setPreviewUrl(url);
    }
  };

  return (
    <div className="mb-6">
      <label
        htmlFor="audio-file"
        className="flex cursor-pointer items-center justify-center gap-2 rounded-lg border-2 border-dashed border-gray-300 p-6 text-gray-600 hover:border-blue-400"
      >
        <Upload className="h-5 w-5" />
        Choose an audio file (m4a, mp3)
      </label>
      <input
        id="audio-file"
        type="file"
        accept=".m4a,.mp3,audio/mp4,audio/mpeg"
        className="sr-only"
        disabled={disabled}
        onChange={(event) => void handleChange(event)}
      />

      {audio && (
        <div className="mt-3 space-y-2">
          {previewUrl && <audio controls src={previewUrl} className="w-full" />}
          <p className="text-sm text-gray-600">
            Uploaded file: {audio.fileName}, Size: {audio.size} bytes
          </p>
        </div>
      )}
    </div>
  );
};

export default AudioUploader;
