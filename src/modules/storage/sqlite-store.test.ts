import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { openDb, type Db } from "../../db/connection";
import { getCurrentVersion, runMigrations } from "../../db/migrate";
import { SqliteStorage } from "./sqlite-store";

let db: Db;
let now: number;
let store: SqliteStorage;

beforeEach(() => {
  db = openDb(":memory:");
  runMigrations(db);
  now = 1_000_000;
  store = new SqliteStorage(db, () => now);
});

afterEach(() => {
  db.close();
});

describe("migrations", () => {
  it("records the last applied file and applies nothing twice", () => {
    expect(getCurrentVersion(db)).toBe("0003_meal_planning.sql");
    expect(runMigrations(db)).toEqual([]);
  });
});

describe("SqliteStorage key-value", () => {
  it("round-trips JSON documents and overwrites", async () => {
    await store.saveData("index", { keys: ["a"] });
    await store.saveData("index", { keys: ["b", "a"] });
    expect(await store.getData("index")).toEqual({ keys: ["b", "a"] });

    await store.removeData("index");
    expect(await store.getData("index")).toBeNull();
  });
});

describe("SqliteStorage blobs", () => {
  it("reads back within the validity window only", async () => {
    await store.write("image:a", Buffer.from("abc"), 100);
    expect((await store.read("image:a"))?.data.toString()).toBe("abc");
    expect(await store.size("image:a")).toBe(3);

    now += 100;
    expect(await store.read("image:a")).not.toBeNull();
    now += 1;
    expect(await store.read("image:a")).toBeNull();
  });

  it("lists and clears by prefix, newest first", async () => {
    await store.write("recipes:1", Buffer.from("x"), 1000);
    now += 1;
    await store.write("recipes:2", Buffer.from("y"), 1000);
    await store.write("vision:1", Buffer.from("z"), 1000);

    expect(await store.keys("recipes:")).toEqual(["recipes:2", "recipes:1"]);

    await store.clear("recipes:");
    expect(await store.keys()).toEqual(["vision:1"]);
  });

  it("treats LIKE wildcards in a prefix literally", async () => {
    await store.write("a_b:1", Buffer.from("x"), 1000);
    await store.write("axb:1", Buffer.from("y"), 1000);
    expect(await store.keys("a_b")).toEqual(["a_b:1"]);
  });

  it("purges expired rows", async () => {
    await store.write("old", Buffer.from("x"), 10);
    await store.write("fresh", Buffer.from("y"), 1000);
    now += 500;

    expect(store.purgeExpired()).toBe(1);
    expect(await store.keys()).toEqual(["fresh"]);
  });
});
