import { fileURLToPath } from "node:url";
import { describe, expect, test } from "vitest";
import { readManifest } from "../src/manifest.js";

function fixture(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

describe("readManifest", () => {
  test("reads name and version", () => {
    expect(readManifest(fixture("manifest.json"))).toEqual({
      name: "checkout-service",
      version: "2.3.1",
    });
  });

  test("keeps valid fields when others have the wrong type", () => {
    expect(readManifest(fixture("manifest-partial.json"))).toEqual({
      version: "1.0.0",
    });
  });

  test("missing file yields an empty manifest", () => {
    expect(readManifest(fixture("does-not-exist.json"))).toEqual({});
  });

  test("malformed JSON yields an empty manifest", () => {
    expect(readManifest(fixture("manifest-invalid.json"))).toEqual({});
  });
});
