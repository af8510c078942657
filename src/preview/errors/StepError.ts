import { errorMessage } from "../utils/logger.utils.js";

/**
 * Wraps a failure with the name of the controller step that produced it.
 */
export class StepError extends Error {
  constructor(readonly step: string, cause: unknown) {
    super(`${step} failed: ${errorMessage(cause)}`, { cause });
    this.name = "StepError";
  }
}
