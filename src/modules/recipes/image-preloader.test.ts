import { beforeEach, describe, expect, it, vi } from "vitest";
import { ImagePreloader, recipeImageKey } from "./image-preloader";
import { MemoryStorage } from "../storage/memory-store";
import { StaticConnectivity } from "../connectivity/monitor";

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

function setup(respond: (url: string) => Response | Promise<Response>, status: "online" | "offline" = "online") {
  const blobs = new MemoryStorage();
  const connectivity = new StaticConnectivity(status);
  const fetchImpl = vi.fn(async (input: string | URL | Request) => respond(String(input)));
  const preloader = new ImagePreloader({ blobs, connectivity, fetchImpl });
  return { preloader, fetchImpl, blobs, connectivity };
}

const png = (n = 4) => new Response(new Uint8Array(n).fill(7));

describe("ImagePreloader", () => {
  it("downloads each distinct url once and caches the bytes", async () => {
    const { preloader, fetchImpl } = setup(() => png());

    const loaded = await preloader.preloadRecipes([
      { imageUrl: "https://img.example.test/a.png" },
      { imageUrl: "https://img.example.test/a.png" },
      { imageUrl: null },
      { imageUrl: "https://img.example.test/b.png" },
    ]);

    expect(loaded).toBe(2);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect((await preloader.getCached("https://img.example.test/a.png"))?.byteLength).toBe(4);
    expect(await preloader.sizeBytes()).toBe(8);

    await preloader.preload("https://img.example.test/a.png");
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it("shares a download between concurrent callers", async () => {
    const { preloader, fetchImpl } = setup(() => png());
    const [a, b] = await Promise.all([preloader.preload("https://x.test/1"), preloader.preload("https://x.test/1")]);

    expect(a && b).toBe(true);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("reports failures as not loaded", async () => {
    const { preloader } = setup((url) => {
      if (url.endsWith("404")) return new Response("missing", { status: 404 });
      throw new TypeError("fetch failed");
    });

    expect(await preloader.preload("https://x.test/404")).toBe(false);
    expect(await preloader.preload("https://x.test/down")).toBe(false);
    expect(await preloader.sizeBytes()).toBe(0);
  });

  it("skips empty images", async () => {
    const { preloader } = setup(() => png(0));
    expect(await preloader.preload("https://x.test/empty")).toBe(false);
  });

  it("does not fetch while offline", async () => {
    const { preloader, fetchImpl } = setup(() => png(), "offline");
    expect(await preloader.preload("https://x.test/1")).toBe(false);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("clears only its own blobs", async () => {
    const { preloader, blobs } = setup(() => png());
    await blobs.write("image:other", Buffer.from("keep"), 1000);
    await preloader.preload("https://x.test/1");

    await preloader.clear();
    expect(await blobs.keys()).toEqual(["image:other"]);
    expect(await blobs.read(recipeImageKey("https://x.test/1"))).toBeNull();
  });
});
