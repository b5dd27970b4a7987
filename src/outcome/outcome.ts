// src/outcome/outcome.ts
// Result values handed across the CLI boundary

import type { Failure } from "./failure";

export interface OutcomeMeta {
  durationMs?: number;
  /** Source line the outcome refers to, when there is one. */
  line?: number;
}

export interface Done<A> {
  readonly tag: "Done";
  readonly value: A;
  readonly meta: OutcomeMeta;
}

export interface Fail {
  readonly tag: "Fail";
  readonly failure: Failure;
  readonly meta: OutcomeMeta;
}

export type Outcome<A> = Done<A> | Fail;
export type Ok<A> = Done<A>;
export type Err = Fail;

export function isDone<A>(o: Outcome<A>): o is Done<A> {
  return o.tag === "Done";
}

export function isFail<A>(o: Outcome<A>): o is Fail {
  return o.tag === "Fail";
}
