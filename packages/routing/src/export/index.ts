export {
  graphToGeoJson,
  forecastToGeoJson,
  CONGESTION_COLORS,
  type GraphGeoJsonOptions,
  type GeoJsonFeature,
  type GeoJsonFeatureCollection,
  type GeoJsonLineString,
  type GeoJsonPoint,
} from "./geojson.js";
export { routeToFeature, routeAnswerToGeoJson, ROUTE_COLORS } from "./route-geojson.js";
