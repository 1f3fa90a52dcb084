import { describe, expect, it } from "vitest";
import { EventClassifier, sanitizeLine } from "../src/logs/classifier.js";

const classifier = new EventClassifier([
  { pattern: "Lost connection with reason", kind: "disconnect" },
  { pattern: "Disconnection Notification.", kind: "disconnect" },
  { pattern: "stop() called", kind: "closed" },
]);

describe("EventClassifier", () => {
  it("matches disconnect keywords", () => {
    const line = "2024-05-01T10:00:00Z,12.3,abc,2 [FLog::Network] Lost connection with reason : Timeout";
    expect(classifier.classify(line)).toEqual({ kind: "disconnect", line });
  });

  it("matches the closed keyword", () => {
    expect(classifier.classify("[FLog::SingleSurfaceApp] stop() called")).toEqual({
      kind: "closed",
      line: "[FLog::SingleSurfaceApp] stop() called",
    });
  });

  it("returns none for unrelated lines", () => {
    expect(classifier.classify("[FLog::Output] Player joined")).toEqual({ kind: "none" });
  });

  it("is case sensitive", () => {
    expect(classifier.classify("lost connection with reason")).toEqual({ kind: "none" });
  });

  it("lets the first matching rule win", () => {
    const result = classifier.classify("Disconnection Notification. stop() called");
    expect(result.kind).toBe("disconnect");
  });

  it("ignores empty patterns", () => {
    const permissive = new EventClassifier([{ pattern: "", kind: "closed" }]);
    expect(permissive.classify("anything")).toEqual({ kind: "none" });
  });

  it("sanitizes the reported line", () => {
    expect(classifier.classify("  \u001b[31mstop() called\u001b[0m\r")).toEqual({
      kind: "closed",
      line: "stop() called",
    });
  });
});

describe("sanitizeLine", () => {
  it("strips escapes, NUL bytes and surrounding whitespace", () => {
    expect(sanitizeLine("\u001b[1m bold\u0000 \u001b[22m\n")).toBe("bold");
  });
});
