/**
 * Raised while building players, teams or a league from a snapshot.
 * Bad input is reported, never coerced.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public field?: string,
    public recordId?: string
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Raised when a move sequence breaks an internal invariant (a move with
 * neither source nor destination, a committed unassign, a player that is not
 * where the move says it is). Always a logic bug, never user input.
 */
export class InvalidMoveSequenceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidMoveSequenceError';
  }
}
