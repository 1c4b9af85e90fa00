import { describe, it, expect } from 'vitest';
import { ErrorCode } from 'pack-shared';
import { SessionCodec } from '../src/core/impls/SessionCodec';
import { DecodeError } from '../src/core/models/Errors';
import { SessionResult } from '../src/core/models/Session';
import { Result } from '../src/core/models/Result';
import { SessionCodecTestCases } from './SessionCodecTestCases';
import { SAMPLE_RESPONSE_BODY, fullConfig, sampleResponse } from './SessionFixtures';

function expectSuccess(result: Result<SessionResult, DecodeError>): SessionResult {
  if (!result.success) {
    throw new Error(`Expected decode success, got ${result.error.message}`);
  }
  return result.value;
}

function expectFailure(result: Result<SessionResult, DecodeError>): DecodeError {
  if (result.success) {
    throw new Error('Expected decode failure');
  }
  return result.error;
}

describe('SessionCodec', () => {
  describe('encode', () => {
    it('should encode model and empty tools exactly', () => {
      const body = SessionCodec.encode({ model: 'gpt-4o-realtime', tools: [] });
      expect(JSON.stringify(body), SessionCodecTestCases.EXPECT_EXACT_MINIMAL_BODY)
        .toBe('{"model":"gpt-4o-realtime","tools":[]}');
    });

    it('should omit every unset optional field', () => {
      const body = SessionCodec.encode({ model: 'gpt-4o-realtime' });
      expect(Object.keys(body), SessionCodecTestCases.EXPECT_UNSET_KEYS_OMITTED).toEqual(['model']);
    });

    it('should encode a full config in wire form', () => {
      expect(SessionCodec.encode(fullConfig()), SessionCodecTestCases.EXPECT_FULL_WIRE_SHAPE).toEqual({
        model: 'gpt-4o-realtime',
        modalities: ['audio', 'text'],
        instructions: 'Answer briefly.',
        voice: 'verse',
        input_audio_format: 'pcm16',
        output_audio_format: 'g711_ulaw',
        input_audio_transcription: { model: 'whisper-1' },
        input_audio_noise_reduction: { type: 'near_field' },
        turn_detection: {
          type: 'server_vad',
          threshold: 0.6,
          prefix_padding_ms: 300,
          silence_duration_ms: 500,
          create_response: true,
          interrupt_response: false,
          eagerness: 'auto',
        },
        tools: [
          {
            type: 'function',
            name: 'lookup_order',
            description: 'Find an order by id',
            parameters: { type: 'object', properties: { id: { type: 'string' } }, required: ['id'] },
          },
        ],
        tool_choice: 'auto',
        temperature: 0.7,
        max_response_output_tokens: 1024,
      });
    });

    it('should encode unbounded token limit as "inf"', () => {
      const body = SessionCodec.encode({ model: 'm', maxResponseOutputTokens: { kind: 'unbounded' } });
      expect(body).toEqual({ model: 'm', max_response_output_tokens: 'inf' });
    });

    it('should encode turn detection with only its type', () => {
      const body = SessionCodec.encode({ model: 'm', turnDetection: { type: 'server_vad' } });
      expect(body.turn_detection, SessionCodecTestCases.EXPECT_TURN_DETECTION_TYPE_ONLY).toEqual({ type: 'server_vad' });
    });

    it('should encode tools by presence of each field', () => {
      const body = SessionCodec.encode({ model: 'm', tools: [{ name: 'lookup' }, {}] });
      expect(body.tools, SessionCodecTestCases.EXPECT_TOOL_FIELDS_BY_PRESENCE).toEqual([{ name: 'lookup' }, {}]);
    });

    it('should keep false and zero values', () => {
      const body = SessionCodec.encode({
        model: 'm',
        temperature: 0,
        turnDetection: { type: 'server_vad', createResponse: false, silenceDurationMs: 0 },
      });
      expect(body).toEqual({
        model: 'm',
        turn_detection: { type: 'server_vad', silence_duration_ms: 0, create_response: false },
        temperature: 0,
      });
    });
  });

  describe('decode', () => {
    it('should decode the sample response', () => {
      const session = expectSuccess(SessionCodec.decode(JSON.parse(SAMPLE_RESPONSE_BODY)));
      expect(session.id, SessionCodecTestCases.EXPECT_DECODE_SUCCESS).toBe('sess_1');
      expect(session.object).toBe('realtime.session');
      expect(session.modalities).toEqual(['audio', 'text']);
      expect(session.instructions).toBe('');
      expect(session.temperature).toBe(0.8);
      expect(session.tools).toEqual([]);
      expect(session.inputAudioTranscription).toBeUndefined();
      expect(session.turnDetection).toBeUndefined();
      expect(session.maxResponseOutputTokens, SessionCodecTestCases.EXPECT_UNBOUNDED_TOKENS)
        .toEqual({ kind: 'unbounded' });
      expect(session.clientSecret.value).toBe('sk_abc');
      expect(session.clientSecret.expiresAt.getTime(), SessionCodecTestCases.EXPECT_EXPIRY_INSTANT)
        .toBe(1700000000000);
      expect(session.clientSecret.expiresAt.toISOString()).toBe('2023-11-14T22:13:20.000Z');
    });

    it('should decode an integer token limit as finite', () => {
      const session = expectSuccess(SessionCodec.decode({ ...sampleResponse(), max_response_output_tokens: 42 }));
      expect(session.maxResponseOutputTokens).toEqual({ kind: 'finite', value: 42 });
    });

    it('should fail with the path of a missing id', () => {
      const { id: _, ...withoutId } = sampleResponse();
      const error = expectFailure(SessionCodec.decode(withoutId));
      expect(error, SessionCodecTestCases.EXPECT_MISSING_ID_PATH).toBeInstanceOf(DecodeError);
      expect(error.path, SessionCodecTestCases.EXPECT_MISSING_ID_PATH).toBe('$.id');
      expect(error.code).toBe(ErrorCode.DECODE_MISSING_FIELD);
      expect(error.message).toBe('Failed to decode $.id: expected a value, got missing');
    });

    it('should report expected and actual types on mismatch', () => {
      const error = expectFailure(SessionCodec.decode({ ...sampleResponse(), temperature: 'warm' }));
      expect(error.path, SessionCodecTestCases.EXPECT_TYPE_MISMATCH).toBe('$.temperature');
      expect(error.expected, SessionCodecTestCases.EXPECT_TYPE_MISMATCH).toBe('number');
      expect(error.actual, SessionCodecTestCases.EXPECT_TYPE_MISMATCH).toBe('string');
      expect(error.code).toBe(ErrorCode.DECODE_TYPE_MISMATCH);
    });

    it('should reject null for a required field', () => {
      const error = expectFailure(SessionCodec.decode({ ...sampleResponse(), voice: null }));
      expect(error.message).toBe('Failed to decode $.voice: expected string, got null');
    });

    it('should report nested paths inside tools', () => {
      const response = { ...sampleResponse(), tools: [{ name: 'ok' }, { name: 7 }] };
      const error = expectFailure(SessionCodec.decode(response));
      expect(error.path, SessionCodecTestCases.EXPECT_NESTED_PATH).toBe('$.tools[1].name');
    });

    it('should reject a fractional expires_at', () => {
      const response = { ...sampleResponse(), client_secret: { value: 'sk_abc', expires_at: 1.5 } };
      const error = expectFailure(SessionCodec.decode(response));
      expect(error.path, SessionCodecTestCases.EXPECT_NESTED_PATH).toBe('$.client_secret.expires_at');
      expect(error.actual).toBe('number 1.5');
    });

    it('should reject an expires_at outside the Date range', () => {
      const response = { ...sampleResponse(), client_secret: { value: 'sk_abc', expires_at: 1e16 } };
      const error = expectFailure(SessionCodec.decode(response));
      expect(error.path, SessionCodecTestCases.EXPECT_EXPIRY_IN_RANGE).toBe('$.client_secret.expires_at');
      expect(error.expected, SessionCodecTestCases.EXPECT_EXPIRY_IN_RANGE).toBe('Unix milliseconds within Date range');
      expect(error.actual).toBe('number 10000000000000000');
      expect(error.code).toBe(ErrorCode.DECODE_TYPE_MISMATCH);
    });

    it('should fail when client_secret is missing', () => {
      const { client_secret: _, ...withoutSecret } = sampleResponse();
      const error = expectFailure(SessionCodec.decode(withoutSecret));
      expect(error.path).toBe('$.client_secret');
    });

    it('should fail when the token limit is neither integer nor string', () => {
      const error = expectFailure(SessionCodec.decode({ ...sampleResponse(), max_response_output_tokens: true }));
      expect(error.path).toBe('$.max_response_output_tokens');
      expect(error.actual).toBe('boolean');
    });

    it('should reject a non-object document', () => {
      const error = expectFailure(SessionCodec.decode(['sess_1']));
      expect(error.path).toBe('$');
      expect(error.actual).toBe('array');
    });

    it('should decode null optional objects as absent', () => {
      const response = { ...sampleResponse(), turn_detection: null, input_audio_transcription: null };
      const session = expectSuccess(SessionCodec.decode(response));
      expect(session.turnDetection, SessionCodecTestCases.EXPECT_NULL_AS_ABSENT).toBeUndefined();
      expect(session.inputAudioTranscription, SessionCodecTestCases.EXPECT_NULL_AS_ABSENT).toBeUndefined();
    });

    it('should decode present optional objects', () => {
      const response = {
        ...sampleResponse(),
        input_audio_transcription: { model: 'whisper-1' },
        turn_detection: { type: 'server_vad', threshold: 0.5, prefix_padding_ms: 300, silence_duration_ms: 200 },
      };
      const session = expectSuccess(SessionCodec.decode(response));
      expect(session.inputAudioTranscription).toEqual({ model: 'whisper-1' });
      expect(session.turnDetection).toEqual({
        type: 'server_vad',
        threshold: 0.5,
        prefixPaddingMs: 300,
        silenceDurationMs: 200,
      });
    });
  });

  describe('round trip', () => {
    it('should recover every shared field from an encoded config', () => {
      const config = fullConfig();
      const response = {
        ...SessionCodec.encode(config),
        id: 'sess_9',
        object: 'realtime.session',
        client_secret: { value: 'ek_test', expires_at: 1700000000000 },
      };
      const session = expectSuccess(SessionCodec.decode(JSON.parse(JSON.stringify(response))));
      expect(session, SessionCodecTestCases.EXPECT_ROUND_TRIP).toEqual({
        ...config,
        id: 'sess_9',
        object: 'realtime.session',
        clientSecret: { value: 'ek_test', expiresAt: new Date(1700000000000) },
      });
    });

    it('should pass tool parameters through unchanged', () => {
      const body = SessionCodec.encode({ model: 'm', tools: [{ name: 'count', parameters: { a: 1 } }] });
      expect(body.tools, SessionCodecTestCases.EXPECT_PARAMETERS_PASSTHROUGH).toEqual([{ name: 'count', parameters: { a: 1 } }]);
      const session = expectSuccess(SessionCodec.decode({ ...sampleResponse(), tools: body.tools }));
      expect(session.tools[0].parameters, SessionCodecTestCases.EXPECT_PARAMETERS_PASSTHROUGH).toEqual({ a: 1 });
    });

    it('should encode a decoded result back to its response', () => {
      const response = sampleResponse();
      const session = expectSuccess(SessionCodec.decode(response));
      expect(SessionCodec.encodeResult(session), SessionCodecTestCases.EXPECT_RESULT_RE_ENCODES).toEqual(response);
    });
  });
});
