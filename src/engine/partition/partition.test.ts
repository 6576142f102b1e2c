import { describe, expect, it } from "vitest";
import { detection } from "../../__tests__/fixtures";
import { MalformedDetectionError } from "../../shared/errors";
import { partitionDetections } from "./index";
import { normalizeClassName, resolveLabel } from "./labels";

describe("resolveLabel", () => {
  it("normalises raw class names before lookup", () => {
    expect(normalizeClassName(" NO-Mask ")).toBe("nomask");
    expect(normalizeClassName("Safety Vest")).toBe("safetyvest");
    expect(normalizeClassName("safety_cone")).toBe("safetycone");
  });

  it("maps model classes onto participating labels", () => {
    expect(resolveLabel("Person")).toEqual({ kind: "known", label: "person" });
    expect(resolveLabel("Hardhat")).toEqual({ kind: "known", label: "helmet" });
    expect(resolveLabel("Safety Vest")).toEqual({ kind: "known", label: "vest" });
    expect(resolveLabel("NO-Mask")).toEqual({
      kind: "known",
      label: "mask-violation",
    });
    expect(resolveLabel("Mask")).toEqual({ kind: "known", label: "mask" });
  });

  it("separates ignored classes from unknown ones", () => {
    expect(resolveLabel("NO-Hardhat")).toEqual({ kind: "ignored" });
    expect(resolveLabel("Safety Cone")).toEqual({ kind: "ignored" });
    expect(resolveLabel("dog")).toEqual({ kind: "unknown" });
  });
});

describe("partitionDetections", () => {
  it("groups detections by category, preserving input order", () => {
    const result = partitionDetections([
      detection("Hardhat", [10, 10, 20, 20]),
      detection("Person", [0, 0, 100, 200]),
      detection("Safety Vest", [0, 60, 100, 180]),
      detection("Hardhat", [40, 10, 50, 20]),
      detection("NO-Mask", [45, 10, 75, 35]),
      detection("Mask", [45, 10, 75, 35]),
      detection("machinery", [300, 300, 400, 400]),
    ]);

    expect(result.helmets.map((entry) => entry.index)).toEqual([0, 3]);
    expect(result.vests.map((entry) => entry.index)).toEqual([2]);
    expect(result.maskViolations.map((entry) => entry.index)).toEqual([4]);
    expect(result.masksWorn.map((entry) => entry.index)).toEqual([5]);
    expect(result.persons).toHaveLength(1);
    expect(result.ignoredCount).toBe(1);
    expect(result.rejected).toEqual([]);
  });

  it("assigns personId by top edge, then left edge, then input order", () => {
    const result = partitionDetections([
      detection("person", [50, 10, 90, 100]),
      detection("person", [0, 10, 40, 100]),
      detection("person", [200, 0, 260, 100]),
      detection("person", [0, 10, 40, 100]),
    ]);

    expect(
      result.persons.map(({ personId, index }) => ({ personId, index })),
    ).toEqual([
      { personId: 0, index: 2 },
      { personId: 1, index: 1 },
      { personId: 2, index: 3 },
      { personId: 3, index: 0 },
    ]);
  });

  it("drops malformed detections and keeps processing the rest", () => {
    const result = partitionDetections(
      [
        detection("person", [0, 0, 100, 200]),
        detection("person", [100, 0, 50, 200]),
        detection("Hardhat", [-5, 0, 10, 10]),
        detection("Safety Vest", [0, 0, 700, 100]),
        detection("NO-Mask", [10, 10, 20, 20], 1.5),
        detection("forklift", [10, 10, 20, 20]),
      ],
      { width: 640, height: 480 },
    );

    expect(result.persons).toHaveLength(1);
    expect(result.helmets).toEqual([]);
    expect(result.vests).toEqual([]);
    expect(result.maskViolations).toEqual([]);
    expect(
      result.rejected.map(({ index, reason }) => ({ index, reason })),
    ).toEqual([
      { index: 1, reason: "invalid-box" },
      { index: 2, reason: "out-of-bounds" },
      { index: 3, reason: "out-of-bounds" },
      { index: 4, reason: "invalid-confidence" },
      { index: 5, reason: "unknown-label" },
    ]);
    expect(result.rejected[0]).toBeInstanceOf(MalformedDetectionError);
    expect(result.rejected[0].message).toBe(
      "Detection #1 rejected (invalid-box): box (100, 0, 50, 200)",
    );
    expect(result.rejected[4].message).toBe(
      'Detection #5 rejected (unknown-label): label "forklift"',
    );
  });

  it("returns empty groups for an empty list", () => {
    expect(partitionDetections([])).toEqual({
      persons: [],
      helmets: [],
      vests: [],
      maskViolations: [],
      masksWorn: [],
      ignoredCount: 0,
      rejected: [],
    });
  });
});
