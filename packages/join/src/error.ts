/**
 * Join Errors
 */

/**
 * Carried by the result of a race over zero futures, which has no
 * first finisher.
 */
export class EmptyRaceError extends Error {
  constructor(message = `Cannot race an empty list of futures`) {
    super(message)
    this.name = `EmptyRaceError`
  }
}
