export {
  createWeightFunction,
  distanceWeight,
  penaltyFactor,
  STEPPED_PENALTIES,
  type WeightFunction,
  type WeightOptions,
} from "./weight-function.js";
