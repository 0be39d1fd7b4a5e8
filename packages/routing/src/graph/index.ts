export { GraphStore, type SnapResult } from "./graph-store.js";
export { haversineDistance } from "./geo.js";
