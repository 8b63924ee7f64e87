/**
 * SVG rendering of the module-level graph: files and external modules on a
 * circle, import edges as arrows, definitions folded into their files.
 */
import path from "node:path";
import { LANGUAGE_IDS, type LanguageId } from "@depgraph/syntax";

import type { Graph } from "../core/Graph.js";

const CANVAS_WIDTH = 1200;
const CANVAS_HEIGHT = 900;
const MARGIN = 50;
const MIN_NODE_RADIUS = 20;
const MAX_NODE_RADIUS = 40;
const LEGEND_SPACING = 25;

export const LANGUAGE_COLORS: Record<LanguageId, string> = {
  python: "#3776ab",
  javascript: "#f7df1e",
  typescript: "#3178c6",
  rust: "#ce422b",
  go: "#00add8",
};

export const EXTERNAL_COLOR = "#9e9e9e";

interface PlacedNode {
  id: string;
  label: string;
  title: string;
  color: string;
  definitions: number;
  x: number;
  y: number;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * Two decimals at most, no trailing zeros.
 */
function num(value: number): string {
  return String(Math.round(value * 100) / 100);
}

/**
 * Radius between the min and max by definition count; all equal gives the minimum.
 */
export function nodeRadius(count: number, min: number, max: number): number {
  if (max <= min) return MIN_NODE_RADIUS;
  return MIN_NODE_RADIUS + ((count - min) / (max - min)) * (MAX_NODE_RADIUS - MIN_NODE_RADIUS);
}

function layout(graph: Graph): PlacedNode[] {
  const definitionCounts = new Map<string, number>();
  for (const def of graph.definitionNodes()) {
    definitionCounts.set(def.file, (definitionCounts.get(def.file) ?? 0) + 1);
  }

  const entries = [
    ...graph.fileNodes().map((file) => ({
      id: file.id,
      label: path.posix.basename(file.path, path.posix.extname(file.path)),
      title: file.path,
      color: LANGUAGE_COLORS[file.language],
      definitions: definitionCounts.get(file.path) ?? 0,
    })),
    ...graph.externalNodes().map((ext) => ({
      id: ext.id,
      label: ext.module,
      title: ext.module,
      color: EXTERNAL_COLOR,
      definitions: 0,
    })),
  ];

  const circle = Math.min(CANVAS_HEIGHT - 2 * MARGIN, CANVAS_WIDTH - 2 * MARGIN) * 0.4;
  const step = (2 * Math.PI) / entries.length;
  return entries.map((entry, i) => ({
    ...entry,
    x: CANVAS_WIDTH / 2 + circle * Math.cos(i * step),
    y: CANVAS_HEIGHT / 2 + circle * Math.sin(i * step),
  }));
}

export function renderSvg(graph: Graph): string {
  const open =
    `<svg xmlns="http://www.w3.org/2000/svg" width="${CANVAS_WIDTH}" height="${CANVAS_HEIGHT}" ` +
    `viewBox="0 0 ${CANVAS_WIDTH} ${CANVAS_HEIGHT}" style="background-color: white">`;

  const nodes = layout(graph);
  if (nodes.length === 0) {
    return `${open}</svg>\n`;
  }

  const lines = [
    open,
    '<defs><marker id="arrowhead" markerWidth="10" markerHeight="7" refX="10" refY="3.5" orient="auto">' +
      '<path d="M0,0 L10,3.5 L0,7 Z" fill="lightblue"/></marker></defs>',
  ];

  // Edges first so nodes are drawn over them
  const byId = new Map(nodes.map((n) => [n.id, n] as const));
  for (const edge of graph.edges()) {
    if (edge.kind !== "imports") continue;
    const from = byId.get(edge.source);
    const to = byId.get(edge.target);
    if (!from || !to) continue;
    lines.push(
      `<line x1="${num(from.x)}" y1="${num(from.y)}" x2="${num(to.x)}" y2="${num(to.y)}" ` +
        'stroke="lightblue" stroke-width="2" marker-end="url(#arrowhead)"/>'
    );
  }

  let min = Infinity;
  let max = -Infinity;
  for (const node of nodes) {
    min = Math.min(min, node.definitions);
    max = Math.max(max, node.definitions);
  }
  for (const node of nodes) {
    const r = nodeRadius(node.definitions, min, max);
    lines.push(
      `<circle cx="${num(node.x)}" cy="${num(node.y)}" r="${num(r)}" fill="${node.color}" stroke="black" stroke-width="2">` +
        `<title>${escapeXml(node.title)}</title></circle>`,
      `<text x="${num(node.x)}" y="${num(node.y)}" text-anchor="middle" dominant-baseline="middle" ` +
        `font-family="Arial" font-size="12" fill="black">${escapeXml(node.label)}</text>`
    );
  }

  lines.push(...legend(graph));
  lines.push("</svg>");
  return `${lines.join("\n")}\n`;
}

function legend(graph: Graph): string[] {
  const present = new Set<string>(graph.fileNodes().map((f) => f.language));
  const entries: Array<[string, string]> = LANGUAGE_IDS.filter((id) => present.has(id)).map((id) => [
    id,
    LANGUAGE_COLORS[id],
  ]);
  if (graph.externalNodes().length > 0) {
    entries.push(["external", EXTERNAL_COLOR]);
  }

  return entries.flatMap(([name, color], i) => {
    const y = MARGIN + i * LEGEND_SPACING;
    return [
      `<circle cx="${MARGIN}" cy="${y}" r="6" fill="${color}" stroke="black" stroke-width="1"/>`,
      `<text x="${MARGIN + 15}" y="${y}" dominant-baseline="middle" font-family="Arial" font-size="12">${name}</text>`,
    ];
  });
}
