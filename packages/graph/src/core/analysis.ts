/**
 * Analysis over the file-level import graph: strongly connected components
 * (import cycles) and betweenness centrality.
 */
import type { Graph } from "./Graph.js";

export interface ImportGraph {
  /** File paths in discovery order */
  files: string[];
  /** Index of each imported file, per importing file index */
  adjacency: number[][];
}

export interface ComponentSize {
  size: number;
  count: number;
}

export interface ImportCycles {
  /** Components with more than one file, largest first */
  cycles: string[][];
  /** Number of components per size, largest size first */
  sizes: ComponentSize[];
  /** Largest component, a single file when there are no cycles */
  largest: string[];
}

export interface CentralityEntry {
  file: string;
  score: number;
}

/**
 * File-to-file import edges; imports of external modules are left out.
 */
export function importGraph(graph: Graph): ImportGraph {
  const files = graph.fileNodes().map((f) => f.path);
  const position = new Map(graph.fileNodes().map((f, i) => [f.id, i] as const));

  const adjacency = files.map(() => new Set<number>());
  for (const edge of graph.edges()) {
    if (edge.kind !== "imports") continue;
    const from = position.get(edge.source);
    const to = position.get(edge.target);
    if (from !== undefined && to !== undefined) {
      adjacency[from].add(to);
    }
  }

  return { files, adjacency: adjacency.map((targets) => [...targets].sort((a, b) => a - b)) };
}

/**
 * Strongly connected components (Tarjan), members in discovery order.
 * Depth-first search runs on an explicit frame stack so long import chains
 * do not exhaust the call stack.
 */
export function stronglyConnectedComponents({ files, adjacency }: ImportGraph): string[][] {
  const index = new Array<number>(files.length).fill(-1);
  const lowlink = new Array<number>(files.length).fill(0);
  const onStack = new Array<boolean>(files.length).fill(false);
  const stack: number[] = [];
  const components: number[][] = [];
  let counter = 0;

  const frames: Array<{ v: number; next: number }> = [];
  const visit = (v: number): void => {
    index[v] = counter;
    lowlink[v] = counter;
    counter++;
    stack.push(v);
    onStack[v] = true;
    frames.push({ v, next: 0 });
  };

  for (let root = 0; root < files.length; root++) {
    if (index[root] !== -1) continue;
    visit(root);

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      const v = frame.v;

      if (frame.next < adjacency[v].length) {
        const w = adjacency[v][frame.next++];
        if (index[w] === -1) {
          visit(w);
        } else if (onStack[w]) {
          lowlink[v] = Math.min(lowlink[v], index[w]);
        }
        continue;
      }

      frames.pop();
      if (lowlink[v] === index[v]) {
        const component: number[] = [];
        let w: number | undefined;
        do {
          w = stack.pop();
          if (w === undefined) break;
          onStack[w] = false;
          component.push(w);
        } while (w !== v);
        components.push(component.sort((a, b) => a - b));
      }

      const parent = frames[frames.length - 1];
      if (parent) {
        lowlink[parent.v] = Math.min(lowlink[parent.v], lowlink[v]);
      }
    }
  }

  return components
    .sort((a, b) => b.length - a.length || a[0] - b[0])
    .map((component) => component.map((i) => files[i]));
}

export function findImportCycles(graph: Graph): ImportCycles {
  const components = stronglyConnectedComponents(importGraph(graph));

  const counts = new Map<number, number>();
  for (const component of components) {
    counts.set(component.length, (counts.get(component.length) ?? 0) + 1);
  }

  return {
    cycles: components.filter((c) => c.length > 1),
    sizes: [...counts.entries()].map(([size, count]) => ({ size, count })).sort((a, b) => b.size - a.size),
    largest: components[0] ?? [],
  };
}

/**
 * Betweenness centrality (Brandes) over the import graph, normalized by
 * 1 / ((n - 1)(n - 2)) when there are more than two files.
 */
export function betweennessCentrality({ files, adjacency }: ImportGraph): number[] {
  const n = files.length;
  const centrality = new Array<number>(n).fill(0);

  for (let s = 0; s < n; s++) {
    const order: number[] = [];
    const predecessors: number[][] = files.map(() => []);
    const paths = new Array<number>(n).fill(0);
    const distance = new Array<number>(n).fill(-1);
    paths[s] = 1;
    distance[s] = 0;

    const queue = [s];
    for (let head = 0; head < queue.length; head++) {
      const v = queue[head];
      order.push(v);
      for (const w of adjacency[v]) {
        if (distance[w] < 0) {
          distance[w] = distance[v] + 1;
          queue.push(w);
        }
        if (distance[w] === distance[v] + 1) {
          paths[w] += paths[v];
          predecessors[w].push(v);
        }
      }
    }

    const dependency = new Array<number>(n).fill(0);
    for (let i = order.length - 1; i >= 0; i--) {
      const w = order[i];
      for (const v of predecessors[w]) {
        dependency[v] += (paths[v] / paths[w]) * (1 + dependency[w]);
      }
      if (w !== s) centrality[w] += dependency[w];
    }
  }

  if (n > 2) {
    const scale = 1 / ((n - 1) * (n - 2));
    for (let v = 0; v < n; v++) {
      centrality[v] *= scale;
    }
  }
  return centrality;
}

/**
 * Files ranked by betweenness, highest first; ties in discovery order.
 */
export function mostCentralFiles(graph: Graph, limit = 10): CentralityEntry[] {
  const imports = importGraph(graph);
  const scores = betweennessCentrality(imports);
  return imports.files
    .map((file, i) => ({ file, score: scores[i] }))
    .sort((a, b) => b.score - a.score)
    .slice(0, limit);
}
