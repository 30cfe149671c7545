import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, jest } from "@jest/globals";
import { silentLogger } from "../../src/lib/logger";
import { ThumbnailAcquirer, pickExtension } from "../../src/lib/thumbnails";
import { drip, encoder, routedFetch, singleAttemptClient, type Route } from "../helpers";

function image(body: string, contentType: string): Route {
  return () => new Response(body, { status: 200, headers: { "content-type": contentType } });
}

describe("pickExtension", () => {
  it("keeps a recognized image extension from the URL", () => {
    expect(pickExtension("https://img.example.com/a/photo.png", "image/jpeg")).toBe(".png");
    expect(pickExtension("https://img.example.com/a/photo.JPEG?w=450", null)).toBe(".jpeg");
  });

  it("lets the content type decide for other extensions", () => {
    expect(pickExtension("https://img.example.com/a/photo.gif", "image/jpeg")).toBe(".jpg");
    expect(pickExtension("https://img.example.com/a/clip", "video/webm")).toBe(".mp4");
    expect(pickExtension("https://img.example.com/a/clip.webm", "video/webm")).toBe(".webm");
  });

  it("falls back to a generic extension", () => {
    expect(pickExtension("https://img.example.com/a/blob", "application/octet-stream")).toBe(".dat");
    expect(pickExtension("https://img.example.com/a/blob.bin", null)).toBe(".dat");
  });
});

describe("ThumbnailAcquirer", () => {
  let dir: string;

  beforeEach(async () => {
    dir = path.join(await fs.mkdtemp(path.join(os.tmpdir(), "thumbs-")), "thumbnails");
  });

  afterEach(async () => {
    await fs.rm(path.dirname(dir), { recursive: true, force: true });
  });

  function acquirerFor(routes: Record<string, Route>, maxThumbnails = 5, timeoutMs = 1000, target = dir) {
    return new ThumbnailAcquirer({
      http: singleAttemptClient(routedFetch(routes)),
      dir: target,
      timeoutMs,
      maxThumbnails,
      logger: silentLogger,
    });
  }

  it("streams the body to <id><ext> in a directory it creates", async () => {
    const url = "https://img.example.com/a/photo.png";
    const acquirer = acquirerFor({ [url]: image("png-bytes", "image/jpeg") });

    const asset = await acquirer.acquire(url, "A0001_T1");

    expect(asset).toEqual({ remote_url: url, local_path: path.join(dir, "A0001_T1.png") });
    await expect(fs.readFile(asset.local_path, "utf8")).resolves.toBe("png-bytes");
  });

  it("keeps the remote URL and an empty path when the download fails", async () => {
    const url = "https://img.example.com/missing.jpg";
    const acquirer = acquirerFor({});

    await expect(acquirer.acquire(url, "A0001_T1")).resolves.toEqual({ remote_url: url, local_path: "" });
  });

  it("finishes a transfer longer than the timeout while chunks keep arriving", async () => {
    const url = "https://img.example.com/clip.mp4";
    const acquirer = acquirerFor(
      { [url]: () => new Response(drip(["aa", "bb", "cc", "dd"], 60), { headers: { "content-type": "video/mp4" } }) },
      5,
      150
    );

    const asset = await acquirer.acquire(url, "A0001_T1");

    expect(asset.local_path).toBe(path.join(dir, "A0001_T1.mp4"));
    await expect(fs.readFile(asset.local_path, "utf8")).resolves.toBe("aabbccdd");
  });

  it("drops a stalled transfer, cancels the body and leaves no partial file", async () => {
    const url = "https://img.example.com/stuck.mp4";
    const cancel = jest.fn<(reason?: unknown) => void>();
    let pulls = 0;
    const stalled = () =>
      new Response(
        new ReadableStream<Uint8Array>({
          pull(controller) {
            pulls += 1;
            if (pulls === 1) {
              controller.enqueue(encoder.encode("partial"));
              return;
            }
            return new Promise<void>(() => undefined);
          },
          cancel,
        }),
        { headers: { "content-type": "video/mp4" } }
      );
    const acquirer = acquirerFor({ [url]: stalled }, 5, 50);

    await expect(acquirer.acquire(url, "A0001_T1")).resolves.toEqual({ remote_url: url, local_path: "" });
    expect(cancel).toHaveBeenCalled();
    await expect(fs.readdir(dir)).resolves.toEqual([]);
  });

  it("cancels the body when the target directory cannot be created", async () => {
    const url = "https://img.example.com/photo.png";
    const blocker = path.join(path.dirname(dir), "blocker");
    await fs.writeFile(blocker, "", "utf8");
    const cancel = jest.fn<(reason?: unknown) => void>();
    const acquirer = acquirerFor(
      { [url]: () => new Response(drip(["png"], 0, cancel), { headers: { "content-type": "image/png" } }) },
      5,
      1000,
      path.join(blocker, "thumbnails")
    );

    await expect(acquirer.acquire(url, "A0001_T1")).resolves.toEqual({ remote_url: url, local_path: "" });
    expect(cancel).toHaveBeenCalled();
  });

  it("caps the list and makes the first successful download primary", async () => {
    const urls = [
      "https://img.example.com/broken",
      "https://img.example.com/ok-1",
      "https://img.example.com/ok-2",
    ];
    const acquirer = acquirerFor(
      {
        [urls[1]]: image("one", "image/webp"),
        [urls[2]]: image("two", "image/webp"),
      },
      2
    );

    const set = await acquirer.acquireAll(urls, "A0003");

    const local = path.join(dir, "A0003_T2.jpg");
    expect(set).toEqual({
      thumbnail: urls[1],
      thumbnail_local: local,
      thumbnails_all: [urls[0], urls[1]],
      thumbnails_local: [local],
    });
  });

  it("returns an empty set when nothing downloads", async () => {
    const acquirer = acquirerFor({});

    const set = await acquirer.acquireAll(["https://img.example.com/x.png"], "A0004");

    expect(set).toEqual({
      thumbnail: "https://img.example.com/x.png",
      thumbnail_local: "",
      thumbnails_all: ["https://img.example.com/x.png"],
      thumbnails_local: [],
    });
  });
});
