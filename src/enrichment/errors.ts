export class RateLimitExceededError extends Error {
  constructor(
    readonly window: "day",
    readonly limit: number
  ) {
    super(`Daily LLM request limit of ${limit} reached`);
    this.name = "RateLimitExceededError";
  }
}

export class EnrichmentResponseError extends Error {
  constructor(
    message: string,
    readonly responseText: string
  ) {
    super(message);
    this.name = "EnrichmentResponseError";
  }
}
