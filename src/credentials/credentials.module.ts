import { Module } from "@nestjs/common";
import { AuthModule } from "../auth/index.js";
import { ConversationModule } from "../conversation/index.js";
import { VaultModule } from "../vault/index.js";
import { CredentialResolver } from "./credential-resolver.service.js";
import { CredentialsController } from "./credentials.controller.js";
import { CredentialsService } from "./credentials.service.js";

@Module({
  imports: [AuthModule, ConversationModule, VaultModule],
  controllers: [CredentialsController],
  providers: [CredentialResolver, CredentialsService],
  exports: [CredentialResolver],
})
export class CredentialsModule {}
