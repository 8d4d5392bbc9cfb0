/**
 * Where a session is in the upload → transcribe → translate flow
 */
export enum WorkflowState {
  IDLE = 'idle',               // No audio uploaded yet
  UPLOADED = 'uploaded',       // Audio present, no transcript
  TRANSCRIBED = 'transcribed', // Transcript present, no translation for it
  TRANSLATED = 'translated'    // Transcript and its translation present
}

/**
 * Events that move a session between workflow states
 */
export enum WorkflowEvent {
  UPLOAD_AUDIO = 'upload_audio',
  TRANSCRIPTION_SUCCEEDED = 'transcription_succeeded',
  TRANSLATION_SUCCEEDED = 'translation_succeeded'
}
