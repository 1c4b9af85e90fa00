import { ErrorCode } from 'pack-shared';
import { DecodeError } from '../models/Errors';
import { JsonValue, describeJson, isJsonValue, isRecord } from '../models/Json';
import { Result } from '../models/Result';

export type ValueDecoder<T> = (value: unknown, path: string) => T;

/**
 * Typed field access over a decoded JSON object. Every accessor throws a
 * DecodeError naming the full path of the field it rejects; SessionCodec turns
 * that into a failed Result at the boundary.
 *
 * Optional accessors treat a missing key and an explicit `null` the same way.
 */
export class JsonReader {
  private readonly fields: Record<string, unknown>;
  readonly path: string;

  private constructor(fields: Record<string, unknown>, path: string) {
    this.fields = fields;
    this.path = path;
  }

  static parse(body: string): Result<unknown, DecodeError> {
    try {
      const value: unknown = JSON.parse(body);
      return { success: true, value };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return {
        success: false,
        error: new DecodeError('$', 'a JSON document', `unparseable body (${reason})`, ErrorCode.DECODE_INVALID_JSON),
      };
    }
  }

  static at(value: unknown, path: string): JsonReader {
    if (!isRecord(value)) {
      throw new DecodeError(path, 'object', describeJson(value));
    }
    return new JsonReader(value, path);
  }

  static root(value: unknown): JsonReader {
    return JsonReader.at(value, '$');
  }

  private childPath(key: string): string {
    return `${this.path}.${key}`;
  }

  private required(key: string): unknown {
    const value = this.fields[key];
    if (value === undefined) {
      throw new DecodeError(this.childPath(key), 'a value', 'missing');
    }
    return value;
  }

  private optional(key: string): unknown {
    const value = this.fields[key];
    return value === null ? undefined : value;
  }

  custom<T>(key: string, decode: ValueDecoder<T>): T {
    return decode(this.required(key), this.childPath(key));
  }

  optionalCustom<T>(key: string, decode: ValueDecoder<T>): T | undefined {
    const value = this.optional(key);
    return value === undefined ? undefined : decode(value, this.childPath(key));
  }

  string(key: string): string {
    return this.custom(key, JsonReader.asString);
  }

  optionalString(key: string): string | undefined {
    return this.optionalCustom(key, JsonReader.asString);
  }

  number(key: string): number {
    return this.custom(key, JsonReader.asNumber);
  }

  optionalNumber(key: string): number | undefined {
    return this.optionalCustom(key, JsonReader.asNumber);
  }

  integer(key: string): number {
    return this.custom(key, JsonReader.asInteger);
  }

  optionalInteger(key: string): number | undefined {
    return this.optionalCustom(key, JsonReader.asInteger);
  }

  optionalBoolean(key: string): boolean | undefined {
    return this.optionalCustom(key, JsonReader.asBoolean);
  }

  stringList(key: string): string[] {
    return this.custom(key, JsonReader.listOf(JsonReader.asString));
  }

  object(key: string): JsonReader {
    return this.custom(key, JsonReader.at);
  }

  optionalObject(key: string): JsonReader | undefined {
    return this.optionalCustom(key, JsonReader.at);
  }

  objectList<T>(key: string, read: (item: JsonReader) => T): T[] {
    return this.custom(key, JsonReader.listOf((item, path) => read(JsonReader.at(item, path))));
  }

  optionalJson(key: string): JsonValue | undefined {
    return this.optionalCustom(key, JsonReader.asJson);
  }

  static asString(value: unknown, path: string): string {
    if (typeof value !== 'string') {
      throw new DecodeError(path, 'string', describeJson(value));
    }
    return value;
  }

  static asNumber(value: unknown, path: string): number {
    if (typeof value !== 'number') {
      throw new DecodeError(path, 'number', describeJson(value));
    }
    return value;
  }

  static asInteger(value: unknown, path: string): number {
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new DecodeError(path, 'integer', typeof value === 'number' ? `number ${value}` : describeJson(value));
    }
    return value;
  }

  static asBoolean(value: unknown, path: string): boolean {
    if (typeof value !== 'boolean') {
      throw new DecodeError(path, 'boolean', describeJson(value));
    }
    return value;
  }

  static asJson(value: unknown, path: string): JsonValue {
    if (!isJsonValue(value)) {
      throw new DecodeError(path, 'JSON value', describeJson(value));
    }
    return value;
  }

  static listOf<T>(decodeItem: ValueDecoder<T>): ValueDecoder<T[]> {
    return (value, path) => {
      if (!Array.isArray(value)) {
        throw new DecodeError(path, 'array', describeJson(value));
      }
      return value.map((item: unknown, index) => decodeItem(item, `${path}[${index}]`));
    };
  }
}
