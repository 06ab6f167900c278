import { z } from "zod";

import {
  CandidateError,
  CombinedValidationError,
  PatternNotFoundError,
  type AttemptError,
} from "./errors.js";
import type { ResponseModel } from "./response-model.js";
import type { CandidateErrorFormatter } from "./types.js";

export interface CandidateValidatorOptions {
  /** Custom error formatter */
  formatError?: CandidateErrorFormatter;
}

export type ValidationResult<T> =
  | { success: true; data: T; candidate: string }
  | { success: false; error: AttemptError };

type CandidateResult<T> =
  | { success: true; data: T }
  | { success: false; error: CandidateError };

/**
 * Default error formatter.
 */
export function defaultFormatError(error: Error | z.ZodError): string {
  if (error instanceof z.ZodError) {
    return error.issues
      .map(
        (issue) =>
          `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`
      )
      .join("; ");
  }
  return `Invalid JSON: ${error.message}`;
}

/**
 * Validates candidate JSON strings against a response model.
 *
 * Candidates are tried in order and the first that parses and validates wins;
 * the rest are never looked at. If none validates, every candidate's error is
 * reported together.
 */
export class CandidateValidator<T> {
  private readonly formatError: CandidateErrorFormatter;

  constructor(
    private readonly responseModel: ResponseModel<T>,
    options: CandidateValidatorOptions = {}
  ) {
    this.formatError = options.formatError || defaultFormatError;
  }

  validate(candidates: readonly string[]): ValidationResult<T> {
    if (candidates.length === 0) {
      return {
        success: false,
        error: new PatternNotFoundError("No JSON output found."),
      };
    }

    const errors: CandidateError[] = [];
    for (const candidate of candidates) {
      const result = this.validateOne(candidate);
      if (result.success) {
        return { success: true, data: result.data, candidate };
      }
      errors.push(result.error);
    }

    return { success: false, error: new CombinedValidationError(errors) };
  }

  private validateOne(candidate: string): CandidateResult<T> {
    let data: unknown;
    try {
      data = JSON.parse(candidate);
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      return {
        success: false,
        error: new CandidateError(candidate, this.formatError(error, candidate), {
          cause: error,
        }),
      };
    }

    const parsed = this.responseModel.safeParse(data);
    if (parsed.success) {
      return { success: true, data: parsed.data };
    }

    return {
      success: false,
      error: new CandidateError(
        candidate,
        this.formatError(parsed.error, candidate),
        { cause: parsed.error, issues: parsed.error.issues }
      ),
    };
  }
}
