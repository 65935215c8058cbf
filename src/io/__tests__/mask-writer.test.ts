import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createFileMaskWriter, joinLines } from "../mask-writer";

describe("joinLines", () => {
  it("terminates every line", () => {
    expect(joinLines(["a", "b"])).toBe("a\nb\n");
  });

  it("is empty for no lines", () => {
    expect(joinLines([])).toBe("");
  });
});

describe("createFileMaskWriter", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "edge-mask-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("overwrites an existing file", async () => {
    const path = join(dir, "edge_mask.mac");
    await writeFile(path, "old content that is longer\n", "utf8");

    await createFileMaskWriter().write(path, ["dc rejectrect 0 0 1 1"]);

    expect(await readFile(path, "utf8")).toBe("dc rejectrect 0 0 1 1\n");
  });

  it("passes file system errors through", async () => {
    const path = join(dir, "missing", "edge_mask.mac");

    await expect(createFileMaskWriter().write(path, [])).rejects.toMatchObject({ code: "ENOENT" });
  });
});
