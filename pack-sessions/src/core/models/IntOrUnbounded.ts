export interface Finite {
  kind: 'finite';
  value: number;
}

export interface Unbounded {
  kind: 'unbounded';
}

export type IntOrUnbounded = Finite | Unbounded;

export const UNBOUNDED_WIRE_VALUE = 'inf';
