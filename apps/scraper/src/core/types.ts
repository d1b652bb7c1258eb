import type { IsoTimestamp } from './branded-types.js';

export interface ExtractedPair {
  temperature: Element;
  timestamp: Element;
}

export interface WaterReading {
  time: IsoTimestamp;
  temperature: number;
}

export interface BackendResponse {
  ok: boolean;
  status: number;
  body: string;
}

// response is absent when the backend could not be reached at all
export interface ForwardResult {
  response?: BackendResponse;
  url: string;
}

export interface PipelineOutcome {
  success: boolean;
  message: string;
}
