export {
  compareRatio,
  goldenRatioReport,
  validateConstants,
  ratioSteps,
} from "./RatioComparator";
