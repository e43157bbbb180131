import { describe, it, expect } from "vitest";
import { expandEnvVarsDeep } from "../expand-env.js";

describe("expandEnvVarsDeep", () => {
  it("expands nested strings and leaves other values alone", () => {
    const out = expandEnvVarsDeep(
      { a: "${X}/bin", list: ["${Y}", 3], flag: true },
      { X: "/usr", Y: "why" },
    );
    expect(out).toEqual({ a: "/usr/bin", list: ["why", 3], flag: true });
  });

  it("uses the fallback for unset or empty vars", () => {
    expect(expandEnvVarsDeep("${MISSING:-sudo}", {})).toBe("sudo");
    expect(expandEnvVarsDeep("${EMPTY:-doas}", { EMPTY: "" })).toBe("doas");
    expect(expandEnvVarsDeep("${MISSING}", {})).toBe("");
  });
});
