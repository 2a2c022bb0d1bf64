import { describe, it, expect } from "vitest";
import { DownloadStore } from "../downloads";

describe("DownloadStore", () => {
  it("serves an entry repeatedly until it expires", () => {
    let clock = 1_000;
    const store = new DownloadStore(60_000, () => clock);
    const { token, expiresAt } = store.put("resultado_a.docx.zip", Buffer.from("zip"));

    expect(expiresAt.toISOString()).toBe("1970-01-01T00:01:01.000Z");
    expect(store.get(token)?.filename).toBe("resultado_a.docx.zip");
    expect(store.get(token)?.data.toString()).toBe("zip");

    clock = 61_000;
    expect(store.get(token)).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it("prunes expired entries when new ones are stored", () => {
    let clock = 0;
    const store = new DownloadStore(10, () => clock);
    store.put("a.zip", Buffer.from("a"));
    store.put("b.zip", Buffer.from("b"));
    clock = 10;
    store.put("c.zip", Buffer.from("c"));
    expect(store.size).toBe(1);
  });

  it("returns nothing for unknown tokens", () => {
    expect(new DownloadStore(1000).get("nope")).toBeUndefined();
  });
});
