import { describe, it, expect, vi } from "vitest";
import { paginateTimeline, type TimelineSource } from "./paginate";
import type { TimelinePage } from "../types/tweet";

function page(cursor: string, size: number): TimelinePage {
  return {
    entries: Array.from({ length: size }, () => ({ kind: "status" as const, tweet: { type: "tombstone" as const } })),
    cursorTop: `top-${cursor}`,
    cursorBottom: `bottom-${cursor}`,
  };
}

function sourceOf(pages: TimelinePage[]) {
  const getTimelinePage = vi.fn(async () => pages.shift() ?? page("end", 0));
  const source: TimelineSource = { getTimelinePage };
  return { source, getTimelinePage };
}

async function collect(iterable: AsyncIterable<TimelinePage>): Promise<TimelinePage[]> {
  const pages: TimelinePage[] = [];
  for await (const p of iterable) pages.push(p);
  return pages;
}

describe("paginateTimeline", () => {
  it("follows bottom cursors until an empty page", async () => {
    const { source, getTimelinePage } = sourceOf([page("1", 3), page("2", 2), page("3", 0)]);

    const pages = await collect(paginateTimeline(source, "42", { count: 100 }));

    expect(pages.map((p) => p.cursorBottom)).toEqual(["bottom-1", "bottom-2"]);
    expect(getTimelinePage.mock.calls).toEqual([
      ["42", 100, undefined, true],
      ["42", 100, "bottom-1", false],
      ["42", 100, "bottom-2", false],
    ]);
  });

  it("never asks for pinned entries when disabled", async () => {
    const { source, getTimelinePage } = sourceOf([page("1", 1)]);
    await collect(paginateTimeline(source, "42", { includePinned: false }));
    expect(getTimelinePage.mock.calls[0]).toEqual(["42", undefined, undefined, false]);
  });

  it("stops after maxPages", async () => {
    const { source, getTimelinePage } = sourceOf([page("1", 1), page("2", 1), page("3", 1)]);
    const pages = await collect(paginateTimeline(source, "42", { maxPages: 2 }));
    expect(pages).toHaveLength(2);
    expect(getTimelinePage).toHaveBeenCalledTimes(2);
  });

  it("yields nothing for an empty timeline", async () => {
    const { source } = sourceOf([]);
    expect(await collect(paginateTimeline(source, "42"))).toEqual([]);
  });

  it("propagates a failing page", async () => {
    const source: TimelineSource = { getTimelinePage: vi.fn().mockRejectedValue(new Error("HTTP 429")) };
    await expect(collect(paginateTimeline(source, "42"))).rejects.toThrow("HTTP 429");
  });
});
