import type {
  BoundingBox,
  Detection,
  IndexedDetection,
  Person,
} from "../shared/types/detection";

export const box = (
  x1: number,
  y1: number,
  x2: number,
  y2: number,
): BoundingBox => ({ x1, y1, x2, y2 });

export const detection = (
  label: string,
  coords: [number, number, number, number],
  confidence = 0.9,
): Detection => ({
  box: box(...coords),
  label,
  confidence,
});

export const person = (
  personId: number,
  coords: [number, number, number, number],
  index = personId,
): Person => ({
  index,
  label: "person",
  personId,
  detection: detection("person", coords),
});

export const helmet = (
  index: number,
  coords: [number, number, number, number],
): IndexedDetection => ({
  index,
  label: "helmet",
  detection: detection("Hardhat", coords),
});

export const vest = (
  index: number,
  coords: [number, number, number, number],
): IndexedDetection => ({
  index,
  label: "vest",
  detection: detection("Safety Vest", coords),
});

export const maskViolation = (
  index: number,
  coords: [number, number, number, number],
): IndexedDetection => ({
  index,
  label: "mask-violation",
  detection: detection("NO-Mask", coords),
});

export const maskWorn = (
  index: number,
  coords: [number, number, number, number],
): IndexedDetection => ({
  index,
  label: "mask",
  detection: detection("Mask", coords),
});
