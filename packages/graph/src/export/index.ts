import type { Graph } from "../core/Graph.js";
import { toJSON } from "../infrastructure/serialize.js";
import { renderSvg } from "./svg.js";
import { renderText } from "./text.js";

export const EXPORT_FORMATS = ["json", "svg", "text"] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export function renderGraph(graph: Graph, format: ExportFormat): string {
  switch (format) {
    case "json":
      return `${JSON.stringify(toJSON(graph), null, 2)}\n`;
    case "svg":
      return renderSvg(graph);
    case "text":
      return renderText(graph);
  }
}

export { renderSvg, escapeXml, nodeRadius, LANGUAGE_COLORS, EXTERNAL_COLOR } from "./svg.js";
export { renderText, formatDiagnostic } from "./text.js";
