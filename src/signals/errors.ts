/**
 * The caller broke the input contract (bad user address, a sent subset that
 * is not part of the batch, sent mail from someone else). Not recoverable
 * by retrying with the same input.
 */
export class SignalInputError extends Error {
  constructor(
    message: string,
    readonly details: string[] = []
  ) {
    super(details.length > 0 ? `${message}: ${details.join(", ")}` : message);
    this.name = "SignalInputError";
  }
}
