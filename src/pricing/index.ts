export { type CostEstimate, CostEstimator } from "./cost-estimator.service.js";
export { divideHalfEven, formatMicros } from "./money.js";
export { PricingModule } from "./pricing.module.js";
