export { CredentialResolver, type ResolvedCredential } from "./credential-resolver.service.js";
export { CredentialsModule } from "./credentials.module.js";
export { type CredentialView, CredentialsService } from "./credentials.service.js";
