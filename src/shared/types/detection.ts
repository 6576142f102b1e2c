/** Axis-aligned box in source-image pixel coordinates. */
export type BoundingBox = {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
};

export type ImageSize = {
  width: number;
  height: number;
};

/** Raw model output for one object, as received from the detector. */
export type Detection = {
  readonly box: Readonly<BoundingBox>;
  /** Class name exactly as the model emitted it, e.g. "Hardhat" or "NO-Mask". */
  readonly label: string;
  readonly confidence: number;
};

export type DetectionLabel =
  | "person"
  | "helmet"
  | "vest"
  | "mask-violation"
  | "mask";

export type PpeCategory = "helmet" | "vest" | "mask";

/** A detection that survived validation, tagged with its input position. */
export type IndexedDetection = {
  index: number;
  label: DetectionLabel;
  detection: Detection;
};

export type Person = IndexedDetection & {
  label: "person";
  personId: number;
};
