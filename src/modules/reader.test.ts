import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { rm, writeFile } from "fs/promises";
import { join } from "node:path";
import { parseLabels, readLabels } from "./reader";
import { createTempDir } from "../test/context";

describe("readLabels", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("skips blank and comment lines", async () => {
    const file = join(dir, "labels.txt");
    await writeFile(file, "guitar\n\n# comment\ne.guitar\n", "utf-8");

    expect(await readLabels(file)).toEqual(["guitar", "e.guitar"]);
  });

  it("rejects when the file does not exist", async () => {
    await expect(readLabels(join(dir, "missing.txt"))).rejects.toThrow(
      "ENOENT",
    );
  });
});

describe("parseLabels", () => {
  it("trims lines and handles CRLF endings", () => {
    expect(parseLabels("  piano \r\n  # indented comment\r\n\tbass\r\n")).toEqual(
      ["piano", "bass"],
    );
  });

  it("keeps a hash that is not at the start of the line", () => {
    expect(parseLabels("c# minor")).toEqual(["c# minor"]);
  });
});
