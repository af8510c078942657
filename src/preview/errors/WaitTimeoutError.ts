import { StepError } from "./StepError.js";

/**
 * The distribution did not reach a disabled, deployed steady state before the
 * wait ceiling. Unlike a rejected mutation, a later poll or re-run may still
 * succeed once CloudFront finishes propagating.
 */
export class WaitTimeoutError extends Error {
  constructor(
    readonly distributionId: string,
    readonly waitedMs: number,
    readonly lastStatus: string
  ) {
    super(
      `distribution ${distributionId} was not disabled after ${Math.round(
        waitedMs / 1000
      )}s (last status: ${lastStatus})`
    );
    this.name = "WaitTimeoutError";
  }
}

export function isWaitTimeout(error: unknown): boolean {
  if (error instanceof WaitTimeoutError) {
    return true;
  }
  return error instanceof StepError && error.cause instanceof WaitTimeoutError;
}
