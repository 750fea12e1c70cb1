export enum ShipperState {
  RUNNING = "running",
  SHUTTING_DOWN = "shutting-down",
  STOPPED = "stopped",
}

const validTransitions: Record<ShipperState, ShipperState[]> = {
  [ShipperState.RUNNING]: [ShipperState.SHUTTING_DOWN],
  [ShipperState.SHUTTING_DOWN]: [ShipperState.STOPPED],
  [ShipperState.STOPPED]: [],
};

export class ShipperStateValidator {
  public static isValidTransition(from: ShipperState, to: ShipperState): boolean {
    return validTransitions[from].includes(to);
  }

  public static getAllowedTransitions(from: ShipperState): ShipperState[] {
    return [...validTransitions[from]];
  }

  public static acceptsRecords(state: ShipperState): boolean {
    return state !== ShipperState.STOPPED;
  }
}
