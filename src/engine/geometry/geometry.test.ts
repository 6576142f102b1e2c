import { describe, expect, it } from "vitest";
import { box } from "../../__tests__/fixtures";
import { DEFAULT_COMPLIANCE_CONFIG } from "../config/compliance-config";
import {
  boxArea,
  checkBox,
  containmentFraction,
  faceRegion,
  headRegion,
  intersectionArea,
  iou,
  isWellFormedBox,
  snapToPixel,
} from "./index";

const { regions } = DEFAULT_COMPLIANCE_CONFIG;

describe("iou", () => {
  it("returns 1 for identical boxes", () => {
    expect(iou(box(10, 10, 50, 90), box(10, 10, 50, 90))).toBe(1);
  });

  it("returns 0 for disjoint and edge-touching boxes", () => {
    expect(iou(box(0, 0, 10, 10), box(20, 20, 30, 30))).toBe(0);
    expect(iou(box(0, 0, 10, 10), box(10, 0, 20, 10))).toBe(0);
  });

  it("divides intersection by union", () => {
    // 50 shared, 150 covered
    expect(iou(box(0, 0, 10, 10), box(5, 0, 15, 10))).toBeCloseTo(1 / 3, 10);
  });

  it("computes a torso-sized vest against a full person box exactly", () => {
    expect(iou(box(0, 0, 100, 30), box(0, 0, 100, 100))).toBe(0.3);
    expect(iou(box(0, 60, 100, 180), box(0, 0, 100, 200))).toBe(0.6);
  });
});

describe("containmentFraction", () => {
  it("is 1 when the inner box lies fully inside", () => {
    expect(containmentFraction(box(30, 5, 70, 45), box(0, 0, 100, 70))).toBe(1);
  });

  it("measures against the inner box area, not the union", () => {
    expect(containmentFraction(box(0, 0, 10, 10), box(0, 5, 10, 20))).toBe(0.5);
  });

  it("is 0 for an empty inner box", () => {
    expect(containmentFraction(box(5, 5, 5, 10), box(0, 0, 100, 100))).toBe(0);
  });
});

describe("regions", () => {
  it("takes the top 35% of the person box, full width, as the head", () => {
    expect(headRegion(box(0, 0, 100, 200), regions)).toEqual(box(0, 0, 100, 70));
    expect(headRegion(box(200, 100, 300, 300), regions)).toEqual(
      box(200, 100, 300, 170),
    );
  });

  it("snaps region edges down to whole pixels", () => {
    expect(snapToPixel(0.35 * 700)).toBe(245);
    expect(snapToPixel(52.5)).toBe(52);
    expect(headRegion(box(0, 0, 100, 700), regions).y2).toBe(245);
    expect(headRegion(box(0, 10, 100, 160), regions).y2).toBe(62);
    expect(faceRegion(box(0, 0, 90, 700), regions)).toEqual(box(32, 0, 76, 140));
  });

  it("centres the face region at 60% of the width", () => {
    expect(faceRegion(box(0, 0, 100, 200), regions)).toEqual(box(35, 0, 85, 40));
  });

  it("clips the face region to the person box", () => {
    const wide = faceRegion(box(0, 0, 100, 200), {
      faceHeightFraction: 0.2,
      faceCenterFraction: 0.9,
      faceWidthFraction: 0.5,
    });
    expect(wide.x1).toBe(65);
    expect(wide.x2).toBe(100);
  });
});

describe("box helpers", () => {
  it("reports zero area and intersection for degenerate input", () => {
    expect(boxArea(box(10, 10, 5, 20))).toBe(0);
    expect(intersectionArea(box(0, 0, 10, 10), box(10, 10, 20, 20))).toBe(0);
  });

  it("accepts only boxes that pass every validity check", () => {
    expect(isWellFormedBox(box(0, 0, 640, 480), { width: 640, height: 480 })).toBe(
      true,
    );
    expect(isWellFormedBox(box(0, 0, 10, 10))).toBe(true);
    expect(isWellFormedBox(box(10, 0, 5, 10))).toBe(false);
    expect(isWellFormedBox(box(0, 0, 10, 481), { width: 640, height: 480 })).toBe(
      false,
    );
  });

  it("classifies box validity", () => {
    expect(checkBox(box(0, 0, 10, 10))).toBe("ok");
    expect(checkBox(box(10, 0, 10, 10))).toBe("invalid-box");
    expect(checkBox(box(0, 20, 10, 10))).toBe("invalid-box");
    expect(checkBox(box(0, Number.NaN, 10, 10))).toBe("invalid-box");
    expect(checkBox(box(-1, 0, 10, 10))).toBe("out-of-bounds");
    expect(checkBox(box(0, 0, 641, 10), { width: 640, height: 480 })).toBe(
      "out-of-bounds",
    );
    expect(checkBox(box(0, 0, 640, 480), { width: 640, height: 480 })).toBe(
      "ok",
    );
  });
});
