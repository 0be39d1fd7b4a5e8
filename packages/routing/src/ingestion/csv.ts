/**
 * Graph ingestion from the nodes/edges CSV tables.
 *
 * nodes.csv: id, lat, lon, label?, kind?
 * edges.csv: id, source, target, length_m, capacity, kind?
 *
 * Row-level problems are collected and raised together; structural checks
 * (duplicates, dangling endpoints, non-positive numbers) are left to
 * GraphStore.load so both entry points share one rule set.
 */

import { readFile } from "node:fs/promises";
import Papa from "papaparse";

import type { GraphEdge, GraphNode } from "@campus-flow/types";
import { MalformedGraphError } from "../errors.js";
import { GraphStore } from "../graph/graph-store.js";

type CsvRow = Record<string, string | undefined>;

export interface GraphCsvPaths {
  nodesPath: string;
  edgesPath: string;
}

const NODE_COLUMNS = ["id", "lat", "lon"] as const;
const EDGE_COLUMNS = ["id", "source", "target", "length_m", "capacity"] as const;

function parseTable(csvText: string, table: string, required: readonly string[], issues: string[]): CsvRow[] {
  const parsed = Papa.parse<CsvRow>(csvText, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  for (const err of parsed.errors) {
    issues.push(`${table}: row ${err.row ?? "?"}: ${err.message}`);
  }

  const fields = parsed.meta.fields ?? [];
  const missing = required.filter((column) => !fields.includes(column));
  if (missing.length > 0) {
    issues.push(`${table}: missing column(s) ${missing.join(", ")}`);
    return [];
  }
  return parsed.data;
}

function text(row: CsvRow, column: string): string {
  return (row[column] ?? "").trim();
}

function numberField(row: CsvRow, column: string, where: string, issues: string[]): number {
  const raw = text(row, column);
  const value = raw === "" ? Number.NaN : Number(raw);
  if (!Number.isFinite(value)) {
    issues.push(`${where}: ${column} is not a number ("${raw}")`);
  }
  return value;
}

/** Parse node and edge CSV text into validated graph rows. */
export function parseGraphCsv(
  nodesCsv: string,
  edgesCsv: string,
): { nodes: GraphNode[]; edges: GraphEdge[] } {
  const issues: string[] = [];
  const nodeRows = parseTable(nodesCsv, "nodes.csv", NODE_COLUMNS, issues);
  const edgeRows = parseTable(edgesCsv, "edges.csv", EDGE_COLUMNS, issues);

  const nodes: GraphNode[] = [];
  for (const [index, row] of nodeRows.entries()) {
    const id = text(row, "id");
    const where = `nodes.csv row ${index + 1}`;
    if (id === "") {
      issues.push(`${where}: empty id`);
      continue;
    }
    nodes.push({
      id,
      coordinate: {
        lat: numberField(row, "lat", where, issues),
        lng: numberField(row, "lon", where, issues),
      },
      label: text(row, "label"),
      kind: text(row, "kind") || "junction",
    });
  }

  const edges: GraphEdge[] = [];
  for (const [index, row] of edgeRows.entries()) {
    const id = text(row, "id");
    const where = `edges.csv row ${index + 1}`;
    if (id === "") {
      issues.push(`${where}: empty id`);
      continue;
    }
    edges.push({
      id,
      source: text(row, "source"),
      target: text(row, "target"),
      lengthMeters: numberField(row, "length_m", where, issues),
      capacity: numberField(row, "capacity", where, issues),
      kind: text(row, "kind") || "path",
    });
  }

  if (issues.length > 0) {
    throw new MalformedGraphError(issues);
  }
  return { nodes, edges };
}

/** Read both CSV files and build the graph store. */
export async function loadGraphFromCsv(paths: GraphCsvPaths): Promise<GraphStore> {
  const [nodesCsv, edgesCsv] = await Promise.all([
    readFile(paths.nodesPath, "utf-8"),
    readFile(paths.edgesPath, "utf-8"),
  ]);
  const { nodes, edges } = parseGraphCsv(nodesCsv, edgesCsv);
  console.log(`[graph] Parsed ${paths.nodesPath} (${nodes.length} rows), ${paths.edgesPath} (${edges.length} rows)`);
  return GraphStore.load(nodes, edges);
}
