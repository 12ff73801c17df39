import { describe, it, expect } from "vitest";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";

describe("entry", () => {
  it("should declare the CLI commands", async () => {
    // Verify the entry file declares the expected CLI structure without executing it.
    const entryPath = resolve(process.cwd(), "src", "entry.ts");
    const content = await readFile(entryPath, "utf-8");

    expect(content).toContain('.name("murmur")');
    expect(content).toContain('.command("start")');
    expect(content).toContain('.command("init")');
    expect(content).toContain('.command("check")');
    expect(content).toContain(
      '.description("Validate the config and print the permission policy it declares (stored policy is not read)")',
    );
  });
});
