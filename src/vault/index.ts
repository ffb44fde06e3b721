export {
  CredentialVault,
  generateSyntheticKey,
  isSyntheticKey,
  SYNTHETIC_KEY_PREFIX,
} from "./credential-vault.service.js";
export { VaultModule } from "./vault.module.js";
