import type {
  Annotation,
  OverallColor,
  PersonReport,
  RgbColor,
} from "../../shared/types/compliance";

export const ANNOTATION_COLORS: Record<OverallColor, RgbColor> = {
  GREEN: [0, 255, 0],
  RED: [255, 0, 0],
};

// Label baseline sits this many pixels above the box's top edge.
const LABEL_OFFSET_PX = 10;

export const buildAnnotations = (
  reports: readonly PersonReport[],
): Annotation[] => {
  return reports.map((report) => ({
    personId: report.personId,
    box: { ...report.box },
    color: report.overallColor,
    rgb: ANNOTATION_COLORS[report.overallColor],
    label: report.label,
    labelAnchor: {
      x: report.box.x1,
      y: Math.max(0, report.box.y1 - LABEL_OFFSET_PX),
    },
  }));
};
