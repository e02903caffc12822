// Client-side call state and the pending-call registry.

import type { Shape } from "@strand/binary";
import type { CompletionQueue } from "./completion.ts";

/** Shapes used to encode a call's arguments and decode its reply. */
export interface CallTypes<A, R> {
  args: Shape<A>;
  reply: Shape<R>;
}

/**
 * One outstanding invocation.
 *
 * The receive path (or the send path, on failure) fills in `reply` or
 * `error` exactly once and then posts the call to `done`.
 */
export class Call<A, R> {
  /** 0n until the call is registered. */
  seq = 0n;
  reply: R | undefined = undefined;
  error: Error | null = null;
  private completed = false;

  constructor(
    readonly serviceMethod: string,
    readonly args: A,
    readonly types: CallTypes<A, R>,
    readonly done: CompletionQueue<AnyCall>,
  ) {}

  get isDone(): boolean {
    return this.completed;
  }

  /**
   * Mark the call finished.
   *
   * Returns false if it already was; the caller must not touch it then.
   */
  markDone(): boolean {
    if (this.completed) return false;
    this.completed = true;
    return true;
  }
}

export type AnyCall = Call<unknown, unknown>;

/**
 * Outstanding calls keyed by sequence number.
 *
 * Sequence numbers start at 1n and are never reused.
 */
export class PendingCalls {
  private nextSeq = 1n;
  private calls = new Map<bigint, AnyCall>();

  get size(): number {
    return this.calls.size;
  }

  /** Assign the next sequence number to `call` and track it. */
  register(call: AnyCall): bigint {
    const seq = this.nextSeq++;
    call.seq = seq;
    this.calls.set(seq, call);
    return seq;
  }

  /** Remove and return the call for `seq`, if it is still pending. */
  remove(seq: bigint): AnyCall | undefined {
    const call = this.calls.get(seq);
    if (call) this.calls.delete(seq);
    return call;
  }

  /** Remove and return every pending call, in registration order. */
  drain(): AnyCall[] {
    const calls = [...this.calls.values()];
    this.calls.clear();
    return calls;
  }
}
