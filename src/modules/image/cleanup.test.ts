import fs from "node:fs";
import path from "node:path";
import { afterAll, describe, expect, it } from "vitest";
import { cleanupOldImages } from "./cleanup";
import { tempDir } from "../../testing/images";

const dir = tempDir();

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("cleanupOldImages", () => {
  it("removes only images older than the cutoff", async () => {
    const now = Date.now();
    const old = path.join(dir, "old.jpg");
    const fresh = path.join(dir, "fresh.png");
    const notes = path.join(dir, "notes.txt");
    for (const f of [old, fresh, notes]) fs.writeFileSync(f, "x");

    const tenDaysAgo = new Date(now - 10 * 24 * 60 * 60 * 1000);
    fs.utimesSync(old, tenDaysAgo, tenDaysAgo);
    fs.utimesSync(notes, tenDaysAgo, tenDaysAgo);

    expect(await cleanupOldImages(dir, 7 * 24 * 60 * 60 * 1000, now)).toBe(1);
    expect(fs.existsSync(old)).toBe(false);
    expect(fs.existsSync(fresh)).toBe(true);
    expect(fs.existsSync(notes)).toBe(true);
  });

  it("returns 0 for a missing directory", async () => {
    expect(await cleanupOldImages(path.join(dir, "missing"))).toBe(0);
  });
});
