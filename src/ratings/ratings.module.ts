import { Module } from "@nestjs/common";
import { LedgerModule } from "../ledger/index.js";
import { RatingsService } from "./ratings.service.js";

@Module({
  imports: [LedgerModule],
  providers: [RatingsService],
  exports: [RatingsService],
})
export class RatingsModule {}
