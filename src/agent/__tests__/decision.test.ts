import { describe, expect, it } from "vitest";
import { extractJsonObject, parseDecision, parseJsonReply } from "../decision.js";

const categories = ["Finance", "Work", "Personal"];

describe("extractJsonObject", () => {
  it("finds an object inside chatter and code fences", () => {
    expect(extractJsonObject('Here you go:\n```json\n{"a": {"b": 1}}\n```')).toBe('{"a": {"b": 1}}');
  });

  it("ignores braces inside strings", () => {
    expect(extractJsonObject('{"reason": "uses } and {", "x": 1} trailing')).toBe(
      '{"reason": "uses } and {", "x": 1}',
    );
  });

  it("skips an unbalanced opening brace", () => {
    expect(extractJsonObject('{ oops {"ok": true}')).toBe('{"ok": true}');
  });

  it("returns null without an object", () => {
    expect(extractJsonObject("no json here")).toBeNull();
  });
});

describe("parseJsonReply", () => {
  it("reports a missing object", () => {
    expect(parseJsonReply("nothing")).toEqual({ ok: false, error: "no JSON object in model reply" });
  });

  it("reports invalid JSON", () => {
    const result = parseJsonReply("{'single': 'quotes'}");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.startsWith("invalid JSON in model reply: ")).toBe(true);
  });
});

describe("parseDecision", () => {
  it("normalizes action and category", () => {
    const result = parseDecision(
      '{"action": " MOVE ", "category": "finance", "targetFolder": " Finance/2024 ", "reason": " Invoice ", "confidence": "0.85"}',
      categories,
    );
    expect(result).toEqual({
      ok: true,
      decision: {
        action: "move",
        category: "Finance",
        targetFolder: "Finance/2024",
        reason: "Invoice",
        confidence: 0.85,
      },
    });
  });

  it("drops targetFolder for non-move actions", () => {
    const result = parseDecision(
      '{"action": "keep", "category": "Work", "targetFolder": "Work", "confidence": 0.7}',
      categories,
    );
    expect(result).toEqual({
      ok: true,
      decision: { action: "keep", category: "Work", targetFolder: undefined, reason: "", confidence: 0.7 },
    });
  });

  it("keeps unknown categories as given", () => {
    const result = parseDecision('{"action": "move", "category": "Recipes", "confidence": 1}', categories);
    expect(result.ok && result.decision.category).toBe("Recipes");
  });

  it("rejects unsupported actions", () => {
    const result = parseDecision('{"action": "rename", "category": "Work", "confidence": 0.5}', categories);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.startsWith("invalid decision (action: ")).toBe(true);
  });

  it("rejects out-of-range confidence", () => {
    const result = parseDecision('{"action": "keep", "category": "Work", "confidence": 1.5}', categories);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.startsWith("invalid decision (confidence: ")).toBe(true);
  });
});
