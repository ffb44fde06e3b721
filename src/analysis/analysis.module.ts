import { Module } from "@nestjs/common";
import { AuthModule } from "../auth/index.js";
import { ConversationModule } from "../conversation/index.js";
import { CredentialsModule } from "../credentials/index.js";
import { LedgerModule } from "../ledger/index.js";
import { PricingModule } from "../pricing/index.js";
import { UpstreamModule } from "../upstream/index.js";
import { AnalysisConfigsService } from "./analysis-configs.service.js";
import { AnalysisConfigsController, AnalysisController } from "./analysis.controller.js";
import { AnalysisService } from "./analysis.service.js";

@Module({
  imports: [AuthModule, ConversationModule, CredentialsModule, LedgerModule, PricingModule, UpstreamModule],
  controllers: [AnalysisController, AnalysisConfigsController],
  providers: [AnalysisService, AnalysisConfigsService],
  exports: [AnalysisService],
})
export class AnalysisModule {}
