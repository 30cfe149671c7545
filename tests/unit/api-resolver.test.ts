import { describe, expect, it } from "@jest/globals";
import { resolveFromApi, type ResolverDeps } from "../../src/lib/api-resolver";
import { DEFAULT_CONFIG } from "../../src/lib/config";
import { ResolutionError } from "../../src/lib/errors";
import { jsonResponse, routedFetch, singleAttemptClient, type Route } from "../helpers";

const API = DEFAULT_CONFIG.apiBaseUrl;

const version = {
  id: 222,
  modelId: 111,
  name: "v2.0",
  baseModel: "SDXL 1.0",
  baseModelType: "Standard",
  trainedWords: ["foo", "bar baz"],
  description: "<p>Desc</p>",
  createdAt: "2024-03-05T10:00:00.000Z",
  model: { name: "Test Model", type: "LORA" },
  files: [
    {
      sizeKB: 2048,
      downloadUrl: "https://civitai.com/api/download/models/222",
      hashes: { SHA256: "ABC123", AutoV2: "ABC" },
    },
  ],
  images: [1, 2, 3, 4, 5, 6].map((n) => ({ url: `https://image.example.com/${n}.jpeg` })),
};

function depsFor(routes: Record<string, Route>) {
  const fetchImpl = routedFetch(routes);
  const deps: ResolverDeps = { http: singleAttemptClient(fetchImpl), config: DEFAULT_CONFIG };
  return { deps, fetchImpl };
}

describe("resolveFromApi", () => {
  it("uses the newest version when the link has no version id", async () => {
    const { deps, fetchImpl } = depsFor({
      [`${API}/models/111`]: () => jsonResponse({ modelVersions: [{ id: 222 }, { id: 200 }] }),
      [`${API}/model-versions/222`]: () => jsonResponse(version),
    });

    const resolved = await resolveFromApi("test-model", "https://civitai.com/models/111/test-model", deps);

    expect(fetchImpl.mock.calls.map(([url]) => url)).toEqual([`${API}/models/111`, `${API}/model-versions/222`]);
    expect(resolved.fields).toEqual({
      filename: "test-model",
      title: "Test Model - v2.0",
      type: "lora",
      base_model: "SDXL 1.0",
      base_model_type: "Standard",
      size: "2 MB",
      model_link: "https://civitai.com/models/111",
      metadata: {
        trained_words: "foo, bar baz",
        hashes: { SHA256: "ABC123", AutoV2: "ABC" },
        description: "<p>Desc</p>",
        download_link: "https://civitai.com/api/download/models/222",
        published_on: "2024-03-05",
      },
    });
    expect(resolved.imageUrls).toEqual([1, 2, 3, 4, 5].map((n) => `https://image.example.com/${n}.jpeg`));
  });

  it("goes straight to the version named in the link", async () => {
    const { deps, fetchImpl } = depsFor({
      [`${API}/model-versions/200`]: () => jsonResponse({ ...version, id: 200, name: "v1.0" }),
    });

    const resolved = await resolveFromApi("m", "https://civitai.com/models/111?modelVersionId=200", deps);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(resolved.fields.title).toBe("Test Model - v1.0");
  });

  it("fills missing fields with empty values", async () => {
    const { deps } = depsFor({
      [`${API}/model-versions/5`]: () => jsonResponse({ model: { name: "Bare" }, baseModelType: null }),
    });
    const url = "https://civitai.com/models/9?modelVersionId=5";

    const resolved = await resolveFromApi("bare", url, deps);

    expect(resolved.fields).toMatchObject({
      title: "Bare",
      type: "",
      base_model_type: "",
      size: "",
      model_link: "https://civitai.com/models/9",
      metadata: { trained_words: "", hashes: {}, description: "", download_link: url, published_on: "" },
    });
    expect(resolved.imageUrls).toEqual([]);
  });

  it("fails when the link has no model id", async () => {
    const { deps, fetchImpl } = depsFor({});

    await expect(resolveFromApi("x", "https://civitai.com/user/someone", deps)).rejects.toThrow(ResolutionError);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("fails when the model has no versions", async () => {
    const { deps } = depsFor({ [`${API}/models/111`]: () => jsonResponse({ modelVersions: [] }) });

    await expect(resolveFromApi("x", "https://civitai.com/models/111", deps)).rejects.toThrow("Model 111 has no versions");
  });

  it("rejects a version payload of the wrong shape", async () => {
    const { deps } = depsFor({ [`${API}/model-versions/5`]: () => jsonResponse({ trainedWords: "not-a-list" }) });

    await expect(resolveFromApi("x", "https://civitai.com/models/9?modelVersionId=5", deps)).rejects.toThrow(
      /Unexpected version payload for 5: \/trainedWords must be array/
    );
  });
});
