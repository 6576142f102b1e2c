import { MalformedDetectionError } from "../../shared/errors";
import type {
  Detection,
  ImageSize,
  IndexedDetection,
  Person,
} from "../../shared/types/detection";
import { isFraction } from "../../shared/validation/detectionValues";
import { checkBox } from "../geometry";
import { resolveLabel } from "./labels";

export type PartitionedDetections = {
  /** Sorted into personId order. */
  persons: Person[];
  helmets: IndexedDetection[];
  vests: IndexedDetection[];
  maskViolations: IndexedDetection[];
  masksWorn: IndexedDetection[];
  ignoredCount: number;
  rejected: MalformedDetectionError[];
};

// Top edge, then left edge, then input position.
const comparePersons = (a: IndexedDetection, b: IndexedDetection): number => {
  const { box: boxA } = a.detection;
  const { box: boxB } = b.detection;
  if (boxA.y1 !== boxB.y1) {
    return boxA.y1 - boxB.y1;
  }
  if (boxA.x1 !== boxB.x1) {
    return boxA.x1 - boxB.x1;
  }
  return a.index - b.index;
};

const validateDetection = (
  detection: Detection,
  index: number,
  imageSize?: ImageSize,
): MalformedDetectionError | null => {
  const boxValidity = checkBox(detection.box, imageSize);
  if (boxValidity !== "ok") {
    const { x1, y1, x2, y2 } = detection.box;
    return new MalformedDetectionError(
      index,
      boxValidity,
      `box (${x1}, ${y1}, ${x2}, ${y2})`,
    );
  }
  if (!isFraction(detection.confidence)) {
    return new MalformedDetectionError(
      index,
      "invalid-confidence",
      `confidence ${String(detection.confidence)}`,
    );
  }
  return null;
};

export const partitionDetections = (
  detections: readonly Detection[],
  imageSize?: ImageSize,
): PartitionedDetections => {
  const personEntries: IndexedDetection[] = [];
  const helmets: IndexedDetection[] = [];
  const vests: IndexedDetection[] = [];
  const maskViolations: IndexedDetection[] = [];
  const masksWorn: IndexedDetection[] = [];
  const rejected: MalformedDetectionError[] = [];
  let ignoredCount = 0;

  detections.forEach((detection, index) => {
    const resolution = resolveLabel(detection.label);
    if (resolution.kind === "unknown") {
      rejected.push(
        new MalformedDetectionError(
          index,
          "unknown-label",
          `label "${detection.label}"`,
        ),
      );
      return;
    }

    const error = validateDetection(detection, index, imageSize);
    if (error) {
      rejected.push(error);
      return;
    }

    if (resolution.kind === "ignored") {
      ignoredCount += 1;
      return;
    }

    const entry: IndexedDetection = {
      index,
      label: resolution.label,
      detection,
    };

    switch (resolution.label) {
      case "person":
        personEntries.push(entry);
        break;
      case "helmet":
        helmets.push(entry);
        break;
      case "vest":
        vests.push(entry);
        break;
      case "mask-violation":
        maskViolations.push(entry);
        break;
      case "mask":
        masksWorn.push(entry);
        break;
    }
  });

  const persons: Person[] = [...personEntries]
    .sort(comparePersons)
    .map((entry, personId): Person => ({
      index: entry.index,
      label: "person",
      detection: entry.detection,
      personId,
    }));

  return {
    persons,
    helmets,
    vests,
    maskViolations,
    masksWorn,
    ignoredCount,
    rejected,
  };
};
