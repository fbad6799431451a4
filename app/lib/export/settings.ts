import type { ExportQuality, PageFormat } from "../types";

const INCH = 72;

export interface PageMargins {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export interface RenderSettings {
  /** Page width and height in points */
  pageSize: [number, number];
  margins: PageMargins;
  baseFontSize: number;
  /** Resolution embedded images are rasterised at */
  imageDpi: number;
  jpegQuality: number;
  /** Pack objects into compressed object streams */
  compress: boolean;
}

export const PAGE_FORMATS = ["standard", "mobile"] as const satisfies readonly PageFormat[];
export const EXPORT_QUALITIES = ["standard", "high", "print"] as const satisfies readonly ExportQuality[];

const PAGE_LAYOUTS: Record<PageFormat, Pick<RenderSettings, "pageSize" | "baseFontSize">> = {
  // A4
  standard: { pageSize: [595.28, 841.89], baseFontSize: 12 },
  // Phone-like proportions
  mobile: { pageSize: [4.5 * INCH, 7 * INCH], baseFontSize: 14 },
};

const QUALITY_PRESETS: Record<ExportQuality, Pick<RenderSettings, "imageDpi" | "jpegQuality" | "compress">> = {
  standard: { imageDpi: 96, jpegQuality: 70, compress: true },
  high: { imageDpi: 150, jpegQuality: 85, compress: true },
  print: { imageDpi: 300, jpegQuality: 95, compress: false },
};

export function resolveRenderSettings(format: PageFormat, quality: ExportQuality): RenderSettings {
  return {
    ...PAGE_LAYOUTS[format],
    ...QUALITY_PRESETS[quality],
    // Extra room at the bottom for the page number
    margins: { top: 0.75 * INCH, right: 0.75 * INCH, bottom: 1.0 * INCH, left: 0.75 * INCH },
  };
}

export function describeFormat(format: PageFormat): string {
  return format === "mobile" ? "Mobile (4.5 x 7 in)" : "Standard (A4)";
}

export function describeQuality(quality: ExportQuality): string {
  const { imageDpi } = QUALITY_PRESETS[quality];
  const label = quality === "print" ? "Print" : quality === "high" ? "High" : "Standard";
  return `${label} (${imageDpi} dpi images)`;
}
