import { describe, it, expect } from "vitest";
import { describeResult } from "./runner";
import { DownloadError } from "../api";
import { Tracker } from "../utils";
import type { FetchItem } from "../types";

const item: FetchItem = {
  label: "e.guitar",
  query: "electric guitar",
  locate: async () => null,
  filename: () => "e-guitar",
};

describe("describeResult", () => {
  it("shows the id and destination on success", () => {
    expect(
      describeResult({ status: "ok", item, iconId: 11, path: "icons/e-guitar.png" }),
    ).toBe(
      "label='e.guitar' | query='electric guitar' | id=11 | → icons/e-guitar.png",
    );
  });

  it("shows the miss reason", () => {
    expect(describeResult({ status: "miss", item, reason: "no-results" })).toBe(
      "label='e.guitar' | query='electric guitar' | reason=no results",
    );
    expect(describeResult({ status: "miss", item, reason: "missing-id" })).toBe(
      "label='e.guitar' | query='electric guitar' | reason=missing id",
    );
  });

  it("uses the same miss text as the tracked issue", () => {
    const tracker = new Tracker();
    tracker.trackMiss(item.label, item.query, "missing-id");
    const [issue] = tracker.getIssues();

    expect(describeResult({ status: "miss", item, reason: "missing-id" })).toBe(
      `label='e.guitar' | query='electric guitar' | reason=${issue.details}`,
    );
  });

  it("shows the error message", () => {
    const error = new DownloadError("Download error for 11: 500 boom", 500);
    expect(describeResult({ status: "error", item, error })).toBe(
      "label='e.guitar' | query='electric guitar' | Download error for 11: 500 boom",
    );
  });
});
