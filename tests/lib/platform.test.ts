import { describe, it, expect } from "vitest";
import { detectOs } from "../../src/lib/platform.js";
import { SetupError } from "../../src/lib/errors.js";

describe("detectOs", () => {
  it("maps linux and darwin", () => {
    expect(detectOs("linux")).toBe("linux");
    expect(detectOs("darwin")).toBe("mac");
  });

  it("rejects other platforms", () => {
    expect(() => detectOs("win32")).toThrow(SetupError);
  });
});
