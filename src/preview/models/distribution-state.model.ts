/**
 * Lifecycle of a preview distribution as driven by this tool.
 *
 * CloudFront only accepts a delete once the distribution is disabled and fully
 * deployed, so teardown has to walk every state in order.
 */
export enum DistributionState {
  Absent = "absent",
  Creating = "creating",
  Enabled = "enabled",
  Disabling = "disabling",
  Disabled = "disabled",
  Deleting = "deleting",
}

export const VALID_DISTRIBUTION_TRANSITIONS: Readonly<
  Record<DistributionState, ReadonlyArray<DistributionState>>
> = {
  [DistributionState.Absent]: [DistributionState.Creating],
  [DistributionState.Creating]: [DistributionState.Enabled],
  [DistributionState.Enabled]: [DistributionState.Disabling],
  [DistributionState.Disabling]: [DistributionState.Disabled],
  [DistributionState.Disabled]: [DistributionState.Deleting],
  [DistributionState.Deleting]: [DistributionState.Absent],
};

export type DistributionTransition = Readonly<{
  distributionId: string;
  from: DistributionState;
  to: DistributionState;
}>;

export function canTransition(
  from: DistributionState,
  to: DistributionState
): boolean {
  return VALID_DISTRIBUTION_TRANSITIONS[from].includes(to);
}
