import { JsonValue } from './Json';
import { IntOrUnbounded } from './IntOrUnbounded';

export interface InputAudioTranscription {
  model: string;
}

export interface InputAudioNoiseReduction {
  type: string;
}

export interface TurnDetection {
  type: string;
  threshold?: number;
  prefixPaddingMs?: number;
  silenceDurationMs?: number;
  createResponse?: boolean;
  interruptResponse?: boolean;
  eagerness?: string;
}

export interface ToolDescriptor {
  type?: string;
  name?: string;
  description?: string;
  // Opaque JSON schema, passed through untouched.
  parameters?: JsonValue;
}

export interface SessionConfig {
  model: string;
  modalities?: string[];
  instructions?: string;
  voice?: string;
  inputAudioFormat?: string;
  outputAudioFormat?: string;
  inputAudioTranscription?: InputAudioTranscription;
  inputAudioNoiseReduction?: InputAudioNoiseReduction;
  turnDetection?: TurnDetection;
  tools?: ToolDescriptor[];
  toolChoice?: string;
  temperature?: number;
  maxResponseOutputTokens?: IntOrUnbounded;
}

export interface ClientSecret {
  value: string;
  expiresAt: Date;
}

export interface SessionResult {
  id: string;
  object: string;
  model: string;
  modalities: string[];
  instructions: string;
  voice: string;
  inputAudioFormat: string;
  outputAudioFormat: string;
  inputAudioTranscription?: InputAudioTranscription;
  inputAudioNoiseReduction?: InputAudioNoiseReduction;
  turnDetection?: TurnDetection;
  tools: ToolDescriptor[];
  toolChoice: string;
  temperature: number;
  maxResponseOutputTokens: IntOrUnbounded;
  clientSecret: ClientSecret;
}
