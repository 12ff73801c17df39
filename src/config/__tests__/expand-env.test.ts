import { describe, it, expect } from "vitest";
import { expandEnvVars, expandEnvVarsDeep } from "../expand-env.js";

describe("expandEnvVars", () => {
  const env = { HOST: "127.0.0.1", EMPTY: "" };

  it("substitutes set variables", () => {
    expect(expandEnvVars("ws://${HOST}:3001", env)).toBe("ws://127.0.0.1:3001");
  });

  it("uses the fallback for unset or empty variables", () => {
    expect(expandEnvVars("${PORT:-3000}", env)).toBe("3000");
    expect(expandEnvVars("${EMPTY:-x}", env)).toBe("x");
    expect(expandEnvVars("${HOST:-localhost}", env)).toBe("127.0.0.1");
  });

  it("expands unset variables without a fallback to nothing", () => {
    expect(expandEnvVars("a${MISSING}b", env)).toBe("ab");
  });

  it("leaves plain dollar signs alone", () => {
    expect(expandEnvVars("$HOST costs $5", env)).toBe("$HOST costs $5");
  });
});

describe("expandEnvVarsDeep", () => {
  it("walks objects and arrays and keeps non-strings", () => {
    expect(
      expandEnvVarsDeep(
        { url: "http://${HOST}", list: ["${HOST}", 3, true], nested: { n: null, id: "${ID:-7}" } },
        { HOST: "h" },
      ),
    ).toEqual({ url: "http://h", list: ["h", 3, true], nested: { n: null, id: "7" } });
  });
});
