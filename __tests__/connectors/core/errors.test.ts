import { describe, expect, it } from "vitest";
import {
  classifyError,
  httpStatusOf,
  MalformedContentError,
  NotFoundError,
  StoreWriteFailedError,
  TransientError,
} from "../../../src/connectors/core/errors.js";

describe("classifyError", () => {
  it("uses the kind of taxonomy errors", () => {
    expect(classifyError(new TransientError("x"))).toBe("transient");
    expect(classifyError(new NotFoundError("m1"))).toBe("permanent");
    expect(classifyError(new MalformedContentError("x"))).toBe("permanent");
    expect(classifyError(new StoreWriteFailedError("x"))).toBe("permanent");
  });

  it("treats rate limiting and server errors as transient", () => {
    expect(classifyError({ status: 429 })).toBe("transient");
    expect(classifyError({ code: 500 })).toBe("transient");
    expect(classifyError({ response: { status: 503 } })).toBe("transient");
    expect(classifyError({ status: 408 })).toBe("transient");
  });

  it("treats auth, permission and validation errors as permanent", () => {
    expect(classifyError({ status: 400 })).toBe("permanent");
    expect(classifyError({ status: 401 })).toBe("permanent");
    expect(classifyError({ status: 403 })).toBe("permanent");
    expect(classifyError({ status: 404 })).toBe("permanent");
  });

  it("treats 403 quota reasons as transient", () => {
    expect(
      classifyError({ status: 403, errors: [{ reason: "userRateLimitExceeded" }] }),
    ).toBe("transient");
    expect(
      classifyError({ status: 403, errors: [{ reason: "insufficientPermissions" }] }),
    ).toBe("permanent");
  });

  it("treats network failures as transient", () => {
    expect(classifyError(Object.assign(new Error("boom"), { code: "ETIMEDOUT" }))).toBe(
      "transient",
    );
    expect(classifyError(new Error("socket hang up"))).toBe("transient");
    expect(classifyError(new Error("read ECONNRESET"))).toBe("transient");
  });

  it("defaults to permanent", () => {
    expect(classifyError(new Error("something odd"))).toBe("permanent");
    expect(classifyError("nope")).toBe("permanent");
  });
});

describe("httpStatusOf", () => {
  it("ignores string codes", () => {
    expect(httpStatusOf({ code: "ECONNRESET" })).toBeUndefined();
    expect(httpStatusOf(null)).toBeUndefined();
  });
});

describe("error classes", () => {
  it("carry their class name and cause", () => {
    const cause = new Error("root");
    const err = new NotFoundError("m1", { cause });
    expect(err.name).toBe("NotFoundError");
    expect(err.message).toBe("Item m1 not found at source");
    expect(err.itemId).toBe("m1");
    expect(err.cause).toBe(cause);
  });
});
