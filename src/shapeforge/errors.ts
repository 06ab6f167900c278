import type { z } from "zod";

/**
 * Base class for every error raised by a Forge.
 */
export class ForgeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** No candidate substring was found in the model's response. */
export class PatternNotFoundError extends ForgeError {
  readonly code = "PATTERN_NOT_FOUND" as const;
}

/** A single candidate failed to parse as JSON or to match the schema. */
export class CandidateError extends ForgeError {
  readonly code = "CANDIDATE_INVALID" as const;
  readonly candidate: string;
  readonly issues: readonly z.ZodIssue[];

  constructor(
    candidate: string,
    message: string,
    options: ErrorOptions & { issues?: readonly z.ZodIssue[] } = {}
  ) {
    super(message, { cause: options.cause });
    this.candidate = candidate;
    this.issues = options.issues ?? [];
  }
}

/**
 * Candidates were found but none validated. Carries every candidate's error in
 * the order the candidates were tried.
 */
export class CombinedValidationError extends ForgeError {
  readonly code = "VALIDATION_FAILED" as const;
  readonly errors: readonly CandidateError[];

  constructor(errors: readonly CandidateError[]) {
    super(errors.map((e) => e.message).join(", "));
    this.errors = errors;
  }
}

/** Failures the retry loop turns into feedback for the next attempt. */
export type AttemptError = PatternNotFoundError | CombinedValidationError;

/**
 * Raised when every attempt failed and the Forge was asked to raise.
 */
export class ResponseNotDerivedError extends ForgeError {
  readonly code = "RESPONSE_NOT_DERIVED" as const;
  /** The last prompt sent, including the feedback of the final attempt. */
  readonly prompt: string;
  readonly attempts: number;

  constructor(prompt: string, attempts: number, options?: ErrorOptions) {
    super(
      `Could not derive a response from the model after ${attempts} attempt(s).`,
      options
    );
    this.prompt = prompt;
    this.attempts = attempts;
  }
}
