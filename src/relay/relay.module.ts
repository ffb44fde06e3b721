import { Module } from "@nestjs/common";
import { AuthModule } from "../auth/index.js";
import { ConversationModule } from "../conversation/index.js";
import { CredentialsModule } from "../credentials/index.js";
import { LedgerModule } from "../ledger/index.js";
import { PersonasModule } from "../personas/index.js";
import { RatingsModule } from "../ratings/index.js";
import { UpstreamModule } from "../upstream/index.js";
import { RelayController } from "./relay.controller.js";
import { RelayService } from "./relay.service.js";

@Module({
  imports: [
    AuthModule,
    ConversationModule,
    CredentialsModule,
    PersonasModule,
    LedgerModule,
    RatingsModule,
    UpstreamModule,
  ],
  controllers: [RelayController],
  providers: [RelayService],
  exports: [RelayService],
})
export class RelayModule {}
