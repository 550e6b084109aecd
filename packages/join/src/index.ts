/**
 * @handoff/join
 *
 * Combinators that wait on several futures at once.
 *
 * @packageDocumentation
 */

// Combinator functions
export { joinAll, joinAllWith, joinArray, joinInto, joinRace } from "./join"

// Contexts
export {
  ArrayJoinContext,
  RaceJoinContext,
  SinkJoinContext,
  TupleJoinContext,
} from "./contexts"

// Types
export type {
  FutureTuple,
  JoinOptions,
  RaceResult,
  TryTuple,
} from "./contexts"

// Errors
export { EmptyRaceError } from "./error"
