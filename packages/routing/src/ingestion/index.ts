/**
 * Graph ingestion.
 *
 * Reads the authored nodes/edges tables into an immutable GraphStore.
 * Geometry extraction and CSV authoring live outside this package.
 */

export { parseGraphCsv, loadGraphFromCsv, type GraphCsvPaths } from "./csv.js";
