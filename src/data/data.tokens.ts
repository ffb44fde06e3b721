export const DATABASE_POOL = Symbol("DATABASE_POOL");
export const REPOSITORIES = Symbol("REPOSITORIES");
export const ORGANIZATION_REPOSITORY = Symbol("ORGANIZATION_REPOSITORY");
export const CREDENTIAL_REPOSITORY = Symbol("CREDENTIAL_REPOSITORY");
export const PRINCIPAL_REPOSITORY = Symbol("PRINCIPAL_REPOSITORY");
export const SESSION_REPOSITORY = Symbol("SESSION_REPOSITORY");
export const REQUEST_REPOSITORY = Symbol("REQUEST_REPOSITORY");
export const USAGE_REPOSITORY = Symbol("USAGE_REPOSITORY");
export const PERSONA_REPOSITORY = Symbol("PERSONA_REPOSITORY");
export const ANALYSIS_CONFIG_REPOSITORY = Symbol("ANALYSIS_CONFIG_REPOSITORY");
export const ANALYSIS_RESULT_REPOSITORY = Symbol("ANALYSIS_RESULT_REPOSITORY");
