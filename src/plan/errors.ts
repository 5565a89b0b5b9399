export class PlanNotFoundError extends Error {
  constructor(public readonly planId: string) {
    super(`Plan not found: ${planId}`);
    this.name = "PlanNotFoundError";
  }
}

export class ActionNotFoundError extends Error {
  constructor(
    public readonly planId: string,
    public readonly actionId: string,
  ) {
    super(`Action ${actionId} not found in plan ${planId}`);
    this.name = "ActionNotFoundError";
  }
}

/** A review change the action's current status does not allow. */
export class InvalidTransitionError extends Error {
  constructor(actionId: string, from: string, to: string) {
    super(`Cannot change action ${actionId} from ${from} to ${to}`);
    this.name = "InvalidTransitionError";
  }
}
