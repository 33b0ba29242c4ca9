import { describe, expect, it } from "vitest";
import { classifyProcessError } from "./process-error-handlers";

describe("classifyProcessError", () => {
  it("treats polling network failures as recoverable", () => {
    const err = Object.assign(new Error("getaddrinfo EAI_AGAIN api.telegram.org"), {
      code: "EAI_AGAIN",
    });
    expect(classifyProcessError(err)).toBe("recoverable");
  });

  it("treats a competing getUpdates poller as recoverable", () => {
    expect(
      classifyProcessError({
        error_code: 409,
        description: "Conflict: terminated by other getUpdates request",
      }),
    ).toBe("recoverable");
  });

  it("treats programming errors as fatal", () => {
    expect(classifyProcessError(new TypeError("cannot read properties of undefined"))).toBe("fatal");
  });
});
