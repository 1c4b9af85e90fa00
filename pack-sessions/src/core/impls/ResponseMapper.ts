import { DecodeError, SessionClientError, TransportError } from '../models/Errors';
import { RawResponse } from '../models/HttpRequest';
import { isRecord } from '../models/Json';
import { Result } from '../models/Result';
import { JsonReader } from './JsonReader';

interface ApiErrorBody {
  message: string;
  type?: string;
  code?: string;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Maps a raw transport response onto a decoded value: non-2xx statuses become
 * TransportErrors, everything else goes through JSON parsing and `decode`.
 */
export class ResponseMapper {
  static isSuccessStatus(status: number): boolean {
    return status >= 200 && status < 300;
  }

  static map<T>(raw: RawResponse, decode: (json: unknown) => Result<T, DecodeError>): Result<T, SessionClientError> {
    if (!ResponseMapper.isSuccessStatus(raw.status)) {
      return { success: false, error: ResponseMapper.toTransportError(raw) };
    }
    const parsed = JsonReader.parse(raw.body);
    if (!parsed.success) {
      return parsed;
    }
    return decode(parsed.value);
  }

  static toTransportError(raw: RawResponse): TransportError {
    const apiError = ResponseMapper.readApiError(raw.body);
    const detail = apiError?.message ?? raw.statusText;
    return new TransportError('http', `Realtime API error: ${raw.status} ${detail}`, {
      status: raw.status,
      type: apiError?.type,
      apiCode: apiError?.code,
    });
  }

  // Error bodies look like {"error": {"message": ..., "type": ..., "code": ...}}.
  private static readApiError(body: string): ApiErrorBody | undefined {
    const parsed = JsonReader.parse(body);
    if (!parsed.success || !isRecord(parsed.value)) {
      return undefined;
    }
    const error = parsed.value.error;
    if (!isRecord(error) || typeof error.message !== 'string') {
      return undefined;
    }
    return {
      message: error.message,
      type: optionalString(error.type),
      code: optionalString(error.code),
    };
  }
}
