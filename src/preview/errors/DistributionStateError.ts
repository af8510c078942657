import { DistributionState } from "../models/distribution-state.model.js";

export class DistributionStateError extends Error {
  constructor(
    readonly distributionId: string,
    readonly from: DistributionState,
    readonly to: DistributionState,
    message: string = `Invalid distribution state transition: ${from} -> ${to}`
  ) {
    super(message);
    this.name = "DistributionStateError";
  }
}
