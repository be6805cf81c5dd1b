import { beforeAll, describe, it, expect } from "vitest";
import { normalizeQuery } from "./normalize-query";
import { loadDefaultConfig } from "./load-config";
import type { NormalizerRule } from "../types";

describe("normalizeQuery", () => {
  let rules: NormalizerRule[];

  beforeAll(async () => {
    rules = (await loadDefaultConfig()).normalizer.rules;
  });

  // ==========================================================================
  // Substitution table
  // ==========================================================================
  describe("substitution table", () => {
    it("rewrites every rule's key into its replacement", () => {
      for (const { from, to } of rules) {
        const query = normalizeQuery(from, rules);
        expect(query).toContain(to);
        if (!to.includes(from)) {
          expect(query).not.toContain(from);
        }
      }
    });

    it("expands abbreviations inside longer labels", () => {
      expect(normalizeQuery("Vintage E.Piano", rules)).toBe(
        "vintage electric piano",
      );
    });

    it("applies several rules to the same label", () => {
      expect(normalizeQuery("SA 2 Choir&Vocals", rules)).toBe(
        "sa2 choir vocals",
      );
    });

    it("lets later rules see earlier replacements", () => {
      const chained = [
        { from: "ab", to: "cd" },
        { from: "cd", to: "ef" },
      ];
      expect(normalizeQuery("ab", chained)).toBe("ef");
    });

    it("matches substrings, so it is not idempotent", () => {
      expect(normalizeQuery("Japanes", rules)).toBe("japanese");
      expect(normalizeQuery("japanese", rules)).toBe("japanesee");
    });

    it("matches before whitespace is collapsed", () => {
      expect(normalizeQuery("Sub   Category", rules)).toBe("sub category");
    });
  });

  // ==========================================================================
  // Cleanup
  // ==========================================================================
  describe("cleanup", () => {
    it("trims and lower-cases", () => {
      expect(normalizeQuery("  Guitar  ", [])).toBe("guitar");
    });

    it("turns unicode dashes into hyphens", () => {
      expect(normalizeQuery("Bass – Synth — Pad", [])).toBe("bass - synth - pad");
    });

    it("turns dotted abbreviations into words", () => {
      expect(normalizeQuery("a.guitar", [])).toBe("a guitar");
    });

    it("falls back to the trimmed label when nothing is left", () => {
      expect(normalizeQuery(" ... ", [])).toBe("...");
    });
  });
});
