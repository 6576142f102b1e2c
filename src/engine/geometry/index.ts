import type { BoundingBox, ImageSize } from "../../shared/types/detection";
import type { RegionFractions } from "../config/compliance-config";

export const boxWidth = (box: BoundingBox): number => box.x2 - box.x1;

export const boxHeight = (box: BoundingBox): number => box.y2 - box.y1;

export const boxArea = (box: BoundingBox): number => {
  const width = boxWidth(box);
  const height = boxHeight(box);
  if (width <= 0 || height <= 0) {
    return 0;
  }
  return width * height;
};

export const intersectionArea = (a: BoundingBox, b: BoundingBox): number => {
  const width = Math.min(a.x2, b.x2) - Math.max(a.x1, b.x1);
  const height = Math.min(a.y2, b.y2) - Math.max(a.y1, b.y1);
  if (width <= 0 || height <= 0) {
    return 0;
  }
  return width * height;
};

export const iou = (a: BoundingBox, b: BoundingBox): number => {
  const intersection = intersectionArea(a, b);
  if (intersection === 0) {
    return 0;
  }
  const union = boxArea(a) + boxArea(b) - intersection;
  return union > 0 ? intersection / union : 0;
};

/** Share of `inner`'s area lying inside `outer`. */
export const containmentFraction = (
  inner: BoundingBox,
  outer: BoundingBox,
): number => {
  const area = boxArea(inner);
  if (area === 0) {
    return 0;
  }
  return intersectionArea(inner, outer) / area;
};

// Products such as 0.35 * 700 land a hair under the whole pixel.
const PIXEL_SNAP_EPSILON = 1e-6;

/** Region extents are whole pixels, rounded down. */
export const snapToPixel = (value: number): number =>
  Math.floor(value + PIXEL_SNAP_EPSILON);

export const headRegion = (
  personBox: BoundingBox,
  fractions: Pick<RegionFractions, "headHeightFraction">,
): BoundingBox => {
  return {
    x1: personBox.x1,
    y1: personBox.y1,
    x2: personBox.x2,
    y2:
      personBox.y1 +
      snapToPixel(fractions.headHeightFraction * boxHeight(personBox)),
  };
};

export const faceRegion = (
  personBox: BoundingBox,
  fractions: Pick<
    RegionFractions,
    "faceHeightFraction" | "faceCenterFraction" | "faceWidthFraction"
  >,
): BoundingBox => {
  const width = boxWidth(personBox);
  const centerX =
    personBox.x1 + snapToPixel(fractions.faceCenterFraction * width);
  const halfWidth = snapToPixel((fractions.faceWidthFraction * width) / 2);

  return {
    x1: Math.max(personBox.x1, centerX - halfWidth),
    y1: personBox.y1,
    x2: Math.min(personBox.x2, centerX + halfWidth),
    y2:
      personBox.y1 +
      snapToPixel(fractions.faceHeightFraction * boxHeight(personBox)),
  };
};

export type BoxValidity = "ok" | "invalid-box" | "out-of-bounds";

export const checkBox = (
  box: BoundingBox,
  imageSize?: ImageSize,
): BoxValidity => {
  const { x1, y1, x2, y2 } = box;
  if (![x1, y1, x2, y2].every((value) => Number.isFinite(value))) {
    return "invalid-box";
  }
  if (x1 >= x2 || y1 >= y2) {
    return "invalid-box";
  }
  if (x1 < 0 || y1 < 0) {
    return "out-of-bounds";
  }
  if (imageSize && (x2 > imageSize.width || y2 > imageSize.height)) {
    return "out-of-bounds";
  }
  return "ok";
};

export const isWellFormedBox = (
  box: BoundingBox,
  imageSize?: ImageSize,
): boolean => checkBox(box, imageSize) === "ok";
