/** A future was polled or dropped in a state that doesn't allow it */
export class InvalidPollError extends Error {
  override readonly name = "InvalidPollError";
}
