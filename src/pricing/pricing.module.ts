import { Module } from "@nestjs/common";
import { CostEstimator } from "./cost-estimator.service.js";

@Module({
  providers: [CostEstimator],
  exports: [CostEstimator],
})
export class PricingModule {}
