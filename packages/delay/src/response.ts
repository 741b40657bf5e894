import { DelayPostponeRejectedError } from "@postponable/errors";

/**
 * Outcome of a postpone request.
 *
 * - `Ok`: the target was moved (or kept) and the delay will honour it
 * - `AlreadyResolved`: the delay has completed, nothing can move anymore
 * - `CantResolveEarlier`: the requested instant is before the current target
 *
 * The value carries the whole result of a postpone call. Callers should
 * inspect it: a dropped `CantResolveEarlier` silently leaves the old target.
 */
export const PostponeResponse = {
  Ok: "ok",
  AlreadyResolved: "already-resolved",
  CantResolveEarlier: "cant-resolve-earlier",
} as const;

export type PostponeResponse = (typeof PostponeResponse)[keyof typeof PostponeResponse];

/** Check whether a postpone request was applied */
export function isPostponed(response: PostponeResponse): response is typeof PostponeResponse.Ok {
  return response === PostponeResponse.Ok;
}

/**
 * Assert that a postpone request was applied.
 *
 * For tests and explicit assumptions only, never for control flow.
 *
 * @throws {DelayPostponeRejectedError} for any response other than `Ok`
 */
export function assertPostponed(
  response: PostponeResponse,
): asserts response is typeof PostponeResponse.Ok {
  if (response !== PostponeResponse.Ok) {
    throw new DelayPostponeRejectedError(response);
  }
}
