import { DecodeError } from '../models/Errors';
import { JsonObject, JsonValue } from '../models/Json';
import { Result } from '../models/Result';
import {
  ClientSecret,
  InputAudioNoiseReduction,
  InputAudioTranscription,
  SessionConfig,
  SessionResult,
  ToolDescriptor,
  TurnDetection,
} from '../models/Session';
import { IntOrUnboundedUtils } from './IntOrUnboundedUtils';
import { JsonReader } from './JsonReader';

type WireEntry = [key: string, value: JsonValue | undefined];

function buildObject(entries: WireEntry[]): JsonObject {
  const present = entries.filter((entry): entry is [string, JsonValue] => entry[1] !== undefined);
  return Object.fromEntries(present);
}

function mapOptional<T, R>(value: T | undefined, map: (value: T) => R): R | undefined {
  return value === undefined ? undefined : map(value);
}

/**
 * Wire codec for the session-creation endpoint. Absent optional fields are
 * left out of the encoded object, never sent as null.
 */
export class SessionCodec {
  static encode(config: SessionConfig): JsonObject {
    return buildObject([
      ['model', config.model],
      ...SessionCodec.sharedEntries(config),
    ]);
  }

  /**
   * Encode a decoded session back to its wire form, client secret included.
   */
  static encodeResult(result: SessionResult): JsonObject {
    return buildObject([
      ['id', result.id],
      ['object', result.object],
      ['model', result.model],
      ...SessionCodec.sharedEntries(result),
      ['client_secret', SessionCodec.encodeClientSecret(result.clientSecret)],
    ]);
  }

  static decode(json: unknown): Result<SessionResult, DecodeError> {
    try {
      return { success: true, value: SessionCodec.readSession(JsonReader.root(json)) };
    } catch (error) {
      if (error instanceof DecodeError) {
        return { success: false, error };
      }
      throw error;
    }
  }

  private static sharedEntries(session: Omit<SessionConfig, 'model'>): WireEntry[] {
    return [
      ['modalities', session.modalities],
      ['instructions', session.instructions],
      ['voice', session.voice],
      ['input_audio_format', session.inputAudioFormat],
      ['output_audio_format', session.outputAudioFormat],
      ['input_audio_transcription', mapOptional(session.inputAudioTranscription, SessionCodec.encodeTranscription)],
      ['input_audio_noise_reduction', mapOptional(session.inputAudioNoiseReduction, SessionCodec.encodeNoiseReduction)],
      ['turn_detection', mapOptional(session.turnDetection, SessionCodec.encodeTurnDetection)],
      ['tools', mapOptional(session.tools, (tools) => tools.map(SessionCodec.encodeTool))],
      ['tool_choice', session.toolChoice],
      ['temperature', session.temperature],
      ['max_response_output_tokens', mapOptional(session.maxResponseOutputTokens, IntOrUnboundedUtils.encode)],
    ];
  }

  private static encodeTranscription(transcription: InputAudioTranscription): JsonObject {
    return { model: transcription.model };
  }

  private static encodeNoiseReduction(noiseReduction: InputAudioNoiseReduction): JsonObject {
    return { type: noiseReduction.type };
  }

  private static encodeTurnDetection(turnDetection: TurnDetection): JsonObject {
    return buildObject([
      ['type', turnDetection.type],
      ['threshold', turnDetection.threshold],
      ['prefix_padding_ms', turnDetection.prefixPaddingMs],
      ['silence_duration_ms', turnDetection.silenceDurationMs],
      ['create_response', turnDetection.createResponse],
      ['interrupt_response', turnDetection.interruptResponse],
      ['eagerness', turnDetection.eagerness],
    ]);
  }

  private static encodeTool(tool: ToolDescriptor): JsonObject {
    return buildObject([
      ['type', tool.type],
      ['name', tool.name],
      ['description', tool.description],
      ['parameters', tool.parameters],
    ]);
  }

  private static encodeClientSecret(secret: ClientSecret): JsonObject {
    return {
      value: secret.value,
      expires_at: secret.expiresAt.getTime(),
    };
  }

  private static readSession(reader: JsonReader): SessionResult {
    return {
      id: reader.string('id'),
      object: reader.string('object'),
      model: reader.string('model'),
      modalities: reader.stringList('modalities'),
      instructions: reader.string('instructions'),
      voice: reader.string('voice'),
      inputAudioFormat: reader.string('input_audio_format'),
      outputAudioFormat: reader.string('output_audio_format'),
      inputAudioTranscription: mapOptional(reader.optionalObject('input_audio_transcription'), SessionCodec.readTranscription),
      inputAudioNoiseReduction: mapOptional(reader.optionalObject('input_audio_noise_reduction'), SessionCodec.readNoiseReduction),
      turnDetection: mapOptional(reader.optionalObject('turn_detection'), SessionCodec.readTurnDetection),
      tools: reader.objectList('tools', SessionCodec.readTool),
      toolChoice: reader.string('tool_choice'),
      temperature: reader.number('temperature'),
      maxResponseOutputTokens: reader.custom('max_response_output_tokens', IntOrUnboundedUtils.decode),
      clientSecret: SessionCodec.readClientSecret(reader.object('client_secret')),
    };
  }

  private static readTranscription(reader: JsonReader): InputAudioTranscription {
    return { model: reader.string('model') };
  }

  private static readNoiseReduction(reader: JsonReader): InputAudioNoiseReduction {
    return { type: reader.string('type') };
  }

  private static readTurnDetection(reader: JsonReader): TurnDetection {
    return {
      type: reader.string('type'),
      threshold: reader.optionalNumber('threshold'),
      prefixPaddingMs: reader.optionalInteger('prefix_padding_ms'),
      silenceDurationMs: reader.optionalInteger('silence_duration_ms'),
      createResponse: reader.optionalBoolean('create_response'),
      interruptResponse: reader.optionalBoolean('interrupt_response'),
      eagerness: reader.optionalString('eagerness'),
    };
  }

  private static readTool(reader: JsonReader): ToolDescriptor {
    return {
      type: reader.optionalString('type'),
      name: reader.optionalString('name'),
      description: reader.optionalString('description'),
      parameters: reader.optionalJson('parameters'),
    };
  }

  // expires_at travels as Unix milliseconds.
  private static readClientSecret(reader: JsonReader): ClientSecret {
    const value = reader.string('value');
    const expiresAtMs = reader.integer('expires_at');
    const expiresAt = new Date(expiresAtMs);
    if (Number.isNaN(expiresAt.getTime())) {
      throw new DecodeError(`${reader.path}.expires_at`, 'Unix milliseconds within Date range', `number ${expiresAtMs}`);
    }
    return { value, expiresAt };
  }
}
