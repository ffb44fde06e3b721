import { Module } from "@nestjs/common";
import { CredentialVault } from "./credential-vault.service.js";

@Module({
  providers: [CredentialVault],
  exports: [CredentialVault],
})
export class VaultModule {}
