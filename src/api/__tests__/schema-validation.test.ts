import { describe, expect, it } from "@jest/globals";
import { ValidationError } from "../../runtime/errors";
import { createExtractRequestValidator } from "../schema-validation";

const validate = createExtractRequestValidator({ minMs: 1000, maxMs: 60000, defaultMs: 30000 });

const issuesOf = (payload: unknown): unknown => {
  try {
    validate(payload);
  } catch (error) {
    if (error instanceof ValidationError) return error.details?.issues;
    throw error;
  }
  return [];
};

describe("createExtractRequestValidator", () => {
  it("normalizes a full payload", () => {
    expect(
      validate({
        url: " https://phimmoi.net/phim/x/tap-1/ ",
        requester_id: " chat-1 ",
        validate_links: false,
        timeout_ms: 5000,
      }),
    ).toEqual({
      url: "https://phimmoi.net/phim/x/tap-1/",
      requesterId: "chat-1",
      validateLinks: false,
      timeoutMs: 5000,
    });
  });

  it("fills optional fields", () => {
    expect(validate({ url: "https://phimmoi.net/phim/x/tap-1/" })).toEqual({
      url: "https://phimmoi.net/phim/x/tap-1/",
      requesterId: null,
      validateLinks: null,
      timeoutMs: 30000,
    });
  });

  it("names missing and unknown fields", () => {
    expect(issuesOf({})).toEqual(["/ missing required field 'url'."]);
    expect(issuesOf({ url: "https://phimmoi.net/phim/x/", mode: "fast" })).toEqual(["/ has unknown field 'mode'."]);
  });

  it("enforces the timeout window", () => {
    expect(issuesOf({ url: "https://phimmoi.net/phim/x/", timeout_ms: 500 })).toEqual(["/timeout_ms must be >= 1000."]);
    expect(issuesOf({ url: "https://phimmoi.net/phim/x/", timeout_ms: 90000 })).toEqual([
      "/timeout_ms must be <= 60000.",
    ]);
  });

  it("rejects non-object bodies", () => {
    expect(() => validate("https://phimmoi.net/phim/x/")).toThrow("Request payload failed schema validation.");
    expect(() => validate({ url: "   " })).toThrow(ValidationError);
  });
});
