// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { afterEach, describe, expect, it, vi } from "vitest";
import { describeError, envVar, maskKey, requireEnvVar } from "../../src/utils/security.js";
import { ConfigurationError } from "../../src/exceptions.js";

describe("security utils", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("maskKey keeps a short prefix", () => {
    expect(maskKey("sk-or-v1-abc123xyz")).toBe("sk-or-***");
    expect(maskKey("")).toBe("(empty)");
  });

  it("envVar trims and treats blanks as unset", () => {
    vi.stubEnv("EDUGATE_TEST_KEY", "  test-secret  ");
    expect(envVar("EDUGATE_TEST_KEY")).toBe("test-secret");
    vi.stubEnv("EDUGATE_TEST_KEY", "   ");
    expect(envVar("EDUGATE_TEST_KEY")).toBeUndefined();
  });

  it("requireEnvVar throws ConfigurationError when unset", () => {
    vi.stubEnv("EDUGATE_TEST_KEY", "");
    expect(() => requireEnvVar("EDUGATE_TEST_KEY")).toThrow(ConfigurationError);
  });

  it("describeError names the error class", () => {
    expect(describeError(new TypeError("bad"))).toBe("TypeError: bad");
    expect(describeError("plain")).toBe("plain");
  });
});
