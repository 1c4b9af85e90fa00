import { DecodeError } from '../models/Errors';
import { describeJson } from '../models/Json';
import { Finite, IntOrUnbounded, UNBOUNDED_WIRE_VALUE, Unbounded } from '../models/IntOrUnbounded';

export class IntOrUnboundedUtils {
  static finite(value: number): Finite {
    return { kind: 'finite', value };
  }

  static unbounded(): Unbounded {
    return { kind: 'unbounded' };
  }

  static encode(limit: IntOrUnbounded): number | string {
    return limit.kind === 'finite' ? limit.value : UNBOUNDED_WIRE_VALUE;
  }

  /**
   * Integers decode as finite. Any string decodes as unbounded, not only
   * "inf" ("5" included).
   */
  static decode(value: unknown, path: string): IntOrUnbounded {
    if (typeof value === 'number' && Number.isInteger(value)) {
      return IntOrUnboundedUtils.finite(value);
    }
    if (typeof value === 'string') {
      return IntOrUnboundedUtils.unbounded();
    }
    throw new DecodeError(path, `integer or "${UNBOUNDED_WIRE_VALUE}"`, describeJson(value));
  }
}
