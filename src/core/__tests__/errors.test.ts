/**
 * Error Hierarchy Tests
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import {
  AuthGraphError,
  ErrorCode,
  KeyParseError,
  UnsupportedFormatError,
  isAuthGraphError,
  wrapError,
} from "../errors.js";

describe("wrapError", () => {
  it("passes AuthGraphErrors through", () => {
    const error = new UnsupportedFormatError("pdf");
    expect(wrapError(error)).toBe(error);
    expect(isAuthGraphError(error)).toBe(true);
  });

  it("wraps plain errors with the unknown code", () => {
    const wrapped = wrapError(new TypeError("boom"));
    expect(wrapped).toBeInstanceOf(AuthGraphError);
    expect(wrapped.code).toBe(ErrorCode.UNKNOWN_ERROR);
    expect(wrapped.message).toBe("boom");
    expect(wrapped.context?.originalError).toBe("TypeError");
  });

  it("uses string rejections as the message", () => {
    expect(wrapError("plain failure").message).toBe("plain failure");
    expect(wrapError(42, "fallback").message).toBe("fallback");
  });
});

describe("AuthGraphError", () => {
  it("formats code, name and message", () => {
    const error = new KeyParseError("unterminated parenthesis", ErrorCode.KEY_PARSE_FAILED, { line: 3 });
    expect(error.line).toBe(3);
    expect(error.toJSON()).toMatchObject({ name: "KeyParseError", code: ErrorCode.KEY_PARSE_FAILED });
    expect(error.toString()).toBe(`[${ErrorCode.KEY_PARSE_FAILED}] KeyParseError: unterminated parenthesis (line 3)`);
  });
});
