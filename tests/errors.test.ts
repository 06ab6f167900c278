import { describe, it, expect } from "vitest";
import {
  CandidateError,
  CombinedValidationError,
  ForgeError,
  PatternNotFoundError,
  ResponseNotDerivedError,
} from "../src/shapeforge/errors.js";

describe("errors", () => {
  it("should name errors after their class", () => {
    const error = new PatternNotFoundError("No JSON output found.");
    expect(error.name).toBe("PatternNotFoundError");
    expect(error).toBeInstanceOf(ForgeError);
    expect(error).toBeInstanceOf(Error);
  });

  it("should keep candidate errors in order", () => {
    const first = new CandidateError("{a", "Invalid JSON: oops");
    const second = new CandidateError("{}", "value: Required");
    const combined = new CombinedValidationError([first, second]);

    expect(combined.code).toBe("VALIDATION_FAILED");
    expect(combined.errors).toEqual([first, second]);
    expect(combined.message).toBe("Invalid JSON: oops, value: Required");
  });

  it("should default candidate issues to an empty list", () => {
    const error = new CandidateError("{a", "Invalid JSON: oops");
    expect(error.code).toBe("CANDIDATE_INVALID");
    expect(error.issues).toEqual([]);
    expect(error.cause).toBeUndefined();
  });

  it("should carry the final prompt and the last failure", () => {
    const cause = new PatternNotFoundError("No JSON output found.");
    const error = new ResponseNotDerivedError("final prompt", 3, { cause });

    expect(error.code).toBe("RESPONSE_NOT_DERIVED");
    expect(error.prompt).toBe("final prompt");
    expect(error.attempts).toBe(3);
    expect(error.cause).toBe(cause);
    expect(error.message).toBe(
      "Could not derive a response from the model after 3 attempt(s)."
    );
  });
});
