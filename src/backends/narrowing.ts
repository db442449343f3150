import type { PartialAuthorizationError } from "../utils/errors.js";

// ── States ───────────────────────────────────────────────────────────────────

/**
 * Bucket-set narrowing after a partial authorization failure.
 *
 *   full ──403──▶ narrowed(1) ──403──▶ … narrowed(k) ──403──▶ failed
 *
 * Each transition drops exactly one bucket, which is never re-added. The
 * machine fails when retries are exhausted or one bucket would remain
 * unreadable.
 */
export type NarrowingState =
  | { readonly kind: "full"; readonly buckets: readonly string[] }
  | {
      readonly kind: "narrowed";
      readonly buckets: readonly string[];
      readonly dropped: readonly string[];
      readonly attempt: number;
    }
  | {
      readonly kind: "failed";
      readonly buckets: readonly string[];
      readonly dropped: readonly string[];
      readonly reason: string;
    };

export const DEFAULT_MAX_NARROWING_RETRIES = 3;

export function initialNarrowingState(buckets: readonly string[]): NarrowingState {
  return { kind: "full", buckets: [...buckets] };
}

export function droppedBuckets(state: NarrowingState): readonly string[] {
  return state.kind === "full" ? [] : state.dropped;
}

// ── Transitions ──────────────────────────────────────────────────────────────

/**
 * Bucket to exclude next: one the error message names (as a bucket or its
 * package index), else the last bucket in the working set.
 */
export function pickBucketToDrop(buckets: readonly string[], message: string, suffix: string): string {
  const tokens = new Set(
    message
      .split(/[\s,;[\]()"'`]+/)
      .filter((t) => t.length > 0)
      .map((t) => (t.endsWith(suffix) ? t.slice(0, -suffix.length) : t)),
  );
  const named = buckets.find((b) => tokens.has(b));
  return named ?? buckets[buckets.length - 1] ?? "";
}

/** Advance one step after `failure`. A failed state is terminal. */
export function narrow(
  state: NarrowingState,
  failure: PartialAuthorizationError,
  maxRetries: number,
  suffix: string,
): Exclude<NarrowingState, { kind: "full" }> {
  if (state.kind === "failed") return state;

  const dropped = droppedBuckets(state);
  const attempt = state.kind === "full" ? 1 : state.attempt + 1;

  if (attempt > maxRetries) {
    return {
      kind: "failed",
      buckets: state.buckets,
      dropped,
      reason: `${failure.message} (gave up after ${maxRetries} narrowing retries)`,
    };
  }
  if (state.buckets.length <= 1) {
    return {
      kind: "failed",
      buckets: state.buckets,
      dropped,
      reason: `${failure.message} (no readable buckets left)`,
    };
  }

  // The pattern itself names every bucket, so only the rest of the message can single one out.
  const detail = failure.message.split(failure.indexPattern).join(" ");
  const victim = pickBucketToDrop(state.buckets, detail, suffix);
  return {
    kind: "narrowed",
    buckets: state.buckets.filter((b) => b !== victim),
    dropped: [...dropped, victim],
    attempt,
  };
}
