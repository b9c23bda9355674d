import { describe, expect, it, vi } from "vitest";
import { LabelResolver } from "../../src/gmail/labels.js";
import type { GmailLabel } from "../../src/gmail/types.js";
import { MemoryLogger } from "../helpers.js";

const ACCOUNT_LABELS: GmailLabel[] = [
  { id: "INBOX", name: "INBOX", type: "system" },
  { id: "Label_1", name: "Work", type: "user" },
  { id: "Label_2", name: "Receipts/2024", type: "user" },
];

function makeSource(labels: GmailLabel[] = ACCOUNT_LABELS) {
  return { listLabels: vi.fn().mockResolvedValue(labels) };
}

describe("LabelResolver", () => {
  it("resolves system labels without listing the account", async () => {
    const source = makeSource();
    const resolver = new LabelResolver(source, new MemoryLogger());
    expect(await resolver.resolve("inbox")).toBe("INBOX");
    expect(await resolver.resolve("Category_Promotions")).toBe("CATEGORY_PROMOTIONS");
    expect(source.listLabels).not.toHaveBeenCalled();
  });

  it("matches user label names case-insensitively", async () => {
    const resolver = new LabelResolver(makeSource(), new MemoryLogger());
    expect(await resolver.resolve("work")).toBe("Label_1");
    expect(await resolver.resolve(" receipts/2024 ")).toBe("Label_2");
  });

  it("lists the account once and caches misses", async () => {
    const source = makeSource();
    const resolver = new LabelResolver(source, new MemoryLogger());
    expect(await resolver.resolve("Missing")).toBeNull();
    expect(await resolver.resolve("missing")).toBeNull();
    expect(await resolver.resolve("Work")).toBe("Label_1");
    expect(source.listLabels).toHaveBeenCalledTimes(1);
  });

  it("shares one listing between concurrent lookups", async () => {
    const source = makeSource();
    const resolver = new LabelResolver(source, new MemoryLogger());
    const ids = await Promise.all([resolver.resolve("Work"), resolver.resolve("Receipts/2024")]);
    expect(ids).toEqual(["Label_1", "Label_2"]);
    expect(source.listLabels).toHaveBeenCalledTimes(1);
  });

  it("propagates listing failures without caching them", async () => {
    const source = {
      listLabels: vi
        .fn()
        .mockRejectedValueOnce(new Error("quota exceeded"))
        .mockResolvedValue(ACCOUNT_LABELS),
    };
    const resolver = new LabelResolver(source, new MemoryLogger());
    await expect(resolver.resolve("Work")).rejects.toThrow("quota exceeded");
    expect(await resolver.resolve("Work")).toBe("Label_1");
    expect(source.listLabels).toHaveBeenCalledTimes(2);
  });

  it("lists again after invalidate", async () => {
    const source = {
      listLabels: vi
        .fn()
        .mockResolvedValueOnce([])
        .mockResolvedValue([{ id: "Label_9", name: "New", type: "user" }]),
    };
    const resolver = new LabelResolver(source, new MemoryLogger());
    expect(await resolver.resolve("New")).toBeNull();
    resolver.invalidate();
    expect(await resolver.resolve("New")).toBe("Label_9");
    expect(await resolver.resolve("INBOX")).toBe("INBOX");
  });

  it("ignores a listing that was in flight when invalidated", async () => {
    let release: (labels: GmailLabel[]) => void = () => {};
    const source = {
      listLabels: vi
        .fn()
        .mockImplementationOnce(
          () =>
            new Promise<GmailLabel[]>((resolve) => {
              release = resolve;
            }),
        )
        .mockResolvedValue([{ id: "Label_9", name: "New", type: "user" }]),
    };
    const resolver = new LabelResolver(source, new MemoryLogger());

    const pending = resolver.resolve("Old");
    resolver.invalidate();
    release([{ id: "Label_1", name: "Old", type: "user" }]);

    expect(await pending).toBeNull();
    expect(await resolver.resolve("New")).toBe("Label_9");
    expect(source.listLabels).toHaveBeenCalledTimes(2);
  });

  it("returns null for a blank name", async () => {
    const source = makeSource();
    expect(await new LabelResolver(source, new MemoryLogger()).resolve("  ")).toBeNull();
    expect(source.listLabels).not.toHaveBeenCalled();
  });
});
