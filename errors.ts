
export enum SimulationErrorKind {
  /** Probabilities don't sum to 1, or contain negative/degenerate weights */
  INVALID_DISTRIBUTION = 'InvalidDistribution',
  /** Structural setup errors in a BuildingConfig */
  INVALID_CONFIGURATION = 'InvalidConfiguration',
  /** A requested floor is outside the building */
  INVALID_FLOOR = 'InvalidFloor',
  /** A Person was removed from an owner that does not hold it */
  PERSON_NOT_FOUND = 'PersonNotFound',
  /** A Leave was sampled off the ground floor */
  INVALID_TRANSITION = 'InvalidTransition',
  /** Door weighting was asked for with no elevators */
  EMPTY_ELEVATOR_SET = 'EmptyElevatorSet'
}

export type SimulationErrorDetails = Record<string, string | number | boolean | null>;

/**
 * Every failure raised by the engine. Branch on `kind`, not on the message.
 */
export class SimulationError extends Error {
  public readonly kind: SimulationErrorKind;
  public readonly details: SimulationErrorDetails;

  constructor(kind: SimulationErrorKind, message: string, details: SimulationErrorDetails = {}, options?: { cause?: unknown }) {
    super(`${kind}: ${message}`, options);
    this.name = 'SimulationError';
    this.kind = kind;
    this.details = details;
  }
}

export const isSimulationError = (err: unknown, kind?: SimulationErrorKind): err is SimulationError => {
  if (!(err instanceof SimulationError)) return false;
  return kind === undefined || err.kind === kind;
};
