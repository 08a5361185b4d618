import { describe, expect, it } from "vitest";

import { collectJsonCandidates } from "../core/json-extraction.js";

describe("collectJsonCandidates", () => {
  it("takes a reply that is itself JSON", () => {
    expect(collectJsonCandidates('  {"ready": true}\n')).toEqual([{ ready: true }]);
  });

  it("finds fenced blocks before bare objects", () => {
    const reply = 'Note {"a": 1} then\n```json\n{"b": 2}\n```';

    expect(collectJsonCandidates(reply)).toEqual([{ b: 2 }, { a: 1 }]);
  });

  it("keeps braces inside strings balanced", () => {
    expect(collectJsonCandidates('Here: {"text": "a } brace", "n": {"x": 1}} done')).toEqual([
      { text: "a } brace", n: { x: 1 } }
    ]);
  });

  it("returns nothing for prose", () => {
    expect(collectJsonCandidates("no json here { at all")).toEqual([]);
  });
});
