/**
 * @fileoverview Tests for prior-artifact loading.
 *
 * Covers: loadSeenSet over real temporary directories (missing directory,
 * exclusions, malformed files) and readArtifact for resumable output.
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadSeenSet, readArtifact } from "../../src/store/dedup-store.js";

let dir: string;

beforeEach(async () => {
  vi.spyOn(console, "error").mockImplementation(() => {});
  dir = await mkdtemp(path.join(tmpdir(), "dedup-store-"));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

function record(url: string) {
  return { title: `T ${url}`, url, question: "Q", answer: "A" };
}

async function put(name: string, content: unknown): Promise<string> {
  const filePath = path.join(dir, name);
  await writeFile(filePath, typeof content === "string" ? content : JSON.stringify(content), "utf8");
  return filePath;
}

// ---------------------------------------------------------------------------
// loadSeenSet
// ---------------------------------------------------------------------------

describe("loadSeenSet — directory handling", () => {
  it("returns an empty set for a missing directory", async () => {
    const seen = await loadSeenSet(path.join(dir, "does-not-exist"));

    expect(seen.size).toBe(0);
  });

  it("returns an empty set when the path is a file", async () => {
    const filePath = await put("plain.txt", "hello");

    const seen = await loadSeenSet(filePath);

    expect(seen.size).toBe(0);
  });

  it("returns an empty set for an empty directory", async () => {
    expect((await loadSeenSet(dir)).size).toBe(0);
  });
});

describe("loadSeenSet — artifacts", () => {
  it("unions urls across every json artifact", async () => {
    await put("answered_forum_2025-01-06.json", [record("a"), record("b"), record("c")]);
    await put("answered_forum_2025-01-13.json", [record("c"), record("d")]);

    const seen = await loadSeenSet(dir);

    expect([...seen].sort()).toEqual(["a", "b", "c", "d"]);
  });

  it("ignores files without the json extension", async () => {
    await put("notes.txt", JSON.stringify([record("x")]));
    await put("run.json", [record("y")]);

    expect([...(await loadSeenSet(dir))]).toEqual(["y"]);
  });

  it("leaves out excluded paths", async () => {
    await put("old.json", [record("old")]);
    const current = await put("current.json", [record("current")]);

    const seen = await loadSeenSet(dir, { exclude: [current] });

    expect([...seen]).toEqual(["old"]);
  });

  it("skips files that are not valid JSON", async () => {
    await put("broken.json", "[{");
    await put("good.json", [record("ok")]);

    expect([...(await loadSeenSet(dir))]).toEqual(["ok"]);
  });

  it("skips files that are not arrays", async () => {
    await put("object.json", { url: "nope" });
    await put("good.json", [record("ok")]);

    expect([...(await loadSeenSet(dir))]).toEqual(["ok"]);
  });

  it("ignores entries without a non-empty string url", async () => {
    await put("mixed.json", [record("kept"), { url: "" }, { url: 7 }, { title: "no url" }, null]);

    expect([...(await loadSeenSet(dir))]).toEqual(["kept"]);
  });
});

// ---------------------------------------------------------------------------
// readArtifact
// ---------------------------------------------------------------------------

describe("readArtifact", () => {
  it("returns null for a missing file", async () => {
    expect(await readArtifact(path.join(dir, "missing.json"))).toBeNull();
  });

  it("returns complete records and drops partial ones", async () => {
    const filePath = await put("out.json", [record("a"), { url: "b" }, record("c")]);

    expect(await readArtifact(filePath)).toEqual([record("a"), record("c")]);
  });

  it("rejects invalid JSON", async () => {
    const filePath = await put("bad.json", "not json");

    await expect(readArtifact(filePath)).rejects.toBeInstanceOf(SyntaxError);
  });

  it("rejects JSON that is not an array", async () => {
    const filePath = await put("obj.json", { records: [] });

    await expect(readArtifact(filePath)).rejects.toThrow(`Artifact ${filePath} is not a JSON array`);
  });
});
