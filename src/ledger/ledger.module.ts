import { Module } from "@nestjs/common";
import { PricingModule } from "../pricing/index.js";
import { RequestLedger } from "./request-ledger.service.js";

@Module({
  imports: [PricingModule],
  providers: [RequestLedger],
  exports: [RequestLedger],
})
export class LedgerModule {}
