import type { BoundingBox, Detection, ImageSize } from "../types/detection";

export const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

export const isFiniteNumber = (value: unknown): value is number => {
  return typeof value === "number" && Number.isFinite(value);
};

export const isFraction = (value: unknown): value is number => {
  return isFiniteNumber(value) && value >= 0 && value <= 1;
};

/**
 * Shape check only: four numeric coordinates. Geometric validity (ordering,
 * bounds) is judged later so one bad box drops one detection, not the request.
 */
export const isBoxShape = (value: unknown): value is BoundingBox => {
  if (!isRecord(value)) {
    return false;
  }
  const { x1, y1, x2, y2 } = value;
  return (
    typeof x1 === "number" &&
    typeof y1 === "number" &&
    typeof x2 === "number" &&
    typeof y2 === "number"
  );
};

export const isDetectionShape = (value: unknown): value is Detection => {
  if (!isRecord(value)) {
    return false;
  }
  const { box, label, confidence } = value;
  return isBoxShape(box) && typeof label === "string" && typeof confidence === "number";
};

export const isDetectionPayload = (value: unknown): value is Detection[] => {
  return Array.isArray(value) && value.every((entry) => isDetectionShape(entry));
};

export const isImageSize = (value: unknown): value is ImageSize => {
  if (!isRecord(value)) {
    return false;
  }
  const { width, height } = value;
  return (
    isFiniteNumber(width) && width > 0 && isFiniteNumber(height) && height > 0
  );
};
