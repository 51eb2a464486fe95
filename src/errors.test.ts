/**
 * errors.test.ts - Unit tests for the error taxonomy
 */

import { describe, it, expect } from "vitest";
import {
  InternalError,
  InvalidArgumentError,
  NotFoundError,
  UnavailableError,
  errorMessage,
  toErrorResponse,
} from "./errors";

describe("error classes", () => {
  it("carry their kind and class name", () => {
    const error = new NotFoundError("Image 'totenbilder/a.jpg' not found");

    expect(error.kind).toBe("NOT_FOUND");
    expect(error.name).toBe("NotFoundError");
    expect(error).toBeInstanceOf(Error);
  });

  it("name the dependency in UnavailableError", () => {
    const cause = new Error("connect ECONNREFUSED");
    const error = new UnavailableError("vector index", "connect ECONNREFUSED", { cause });

    expect(error.message).toBe("vector index is unavailable: connect ECONNREFUSED");
    expect(error.dependency).toBe("vector index");
    expect(error.cause).toBe(cause);
  });
});

describe("toErrorResponse", () => {
  it("keeps the kind of project errors", () => {
    expect(toErrorResponse(new InvalidArgumentError("bad"))).toEqual({
      kind: "INVALID_ARGUMENT",
      message: "bad",
    });
    expect(toErrorResponse(new InternalError("boom"))).toEqual({
      kind: "INTERNAL",
      message: "boom",
    });
  });

  it("maps foreign errors to INTERNAL", () => {
    expect(toErrorResponse(new TypeError("x is undefined"))).toEqual({
      kind: "INTERNAL",
      message: "x is undefined",
    });
  });

  it("maps thrown non-errors to INTERNAL", () => {
    expect(toErrorResponse("plain string")).toEqual({ kind: "INTERNAL", message: "plain string" });
  });
});

describe("errorMessage", () => {
  it("reads Error messages and stringifies anything else", () => {
    expect(errorMessage(new Error("nope"))).toBe("nope");
    expect(errorMessage(42)).toBe("42");
  });
});
