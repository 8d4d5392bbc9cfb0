/**
 * An uploaded audio clip held in memory for the duration of one request
 */
export interface AudioUpload {
  fileName: string;
  content: Uint8Array;
  size: number;
}

export interface AudioSummary {
  fileName: string;
  size: number;
}
