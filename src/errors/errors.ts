import { HttpException, HttpStatus } from "@nestjs/common";

export class TokenInvalidError extends HttpException {
  constructor() {
    super("Invalid or missing token", HttpStatus.UNAUTHORIZED);
  }
}

export class AdminTokenInvalidError extends HttpException {
  constructor() {
    super("Invalid or missing admin token", HttpStatus.UNAUTHORIZED);
  }
}

export class AdminTokenNotConfiguredError extends HttpException {
  constructor() {
    super("No admin tokens configured", HttpStatus.UNAUTHORIZED);
  }
}

export class ConfigurationError extends HttpException {
  constructor(message: string) {
    super(message, HttpStatus.BAD_REQUEST);
  }
}

export class MissingUserIdError extends HttpException {
  constructor() {
    super("X-User-ID header is required", HttpStatus.BAD_REQUEST);
  }
}

export class InvalidAnalysisConfigError extends HttpException {
  constructor(message: string) {
    super(message, HttpStatus.BAD_REQUEST);
  }
}

export class CredentialNotConfiguredError extends HttpException {
  constructor(organizationId: string) {
    super(
      `No active API key configured for organization ${organizationId}`,
      HttpStatus.FORBIDDEN,
    );
  }
}

export class NotAuthorizedError extends HttpException {
  constructor(message = "Access denied") {
    super(message, HttpStatus.FORBIDDEN);
  }
}

export class OrganizationNotFoundError extends HttpException {
  constructor(id: string) {
    super(`Organization ${id} not found`, HttpStatus.NOT_FOUND);
  }
}

export class CredentialNotFoundError extends HttpException {
  constructor(id: string) {
    super(`API key ${id} not found`, HttpStatus.NOT_FOUND);
  }
}

export class PrincipalNotFoundError extends HttpException {
  constructor(externalId: string) {
    super(`User ${externalId} not found`, HttpStatus.NOT_FOUND);
  }
}

export class SessionNotFoundError extends HttpException {
  constructor(token: string) {
    super(`Session ${token} not found`, HttpStatus.NOT_FOUND);
  }
}

export class RequestNotFoundError extends HttpException {
  constructor(reference: string) {
    super(`Request ${reference} not found`, HttpStatus.NOT_FOUND);
  }
}

export class PersonaNotFoundError extends HttpException {
  constructor(id: string) {
    super(`Persona ${id} not found or not accessible`, HttpStatus.NOT_FOUND);
  }
}

export class AnalysisConfigNotFoundError extends HttpException {
  constructor(id: string) {
    super(`Analysis configuration ${id} not found`, HttpStatus.NOT_FOUND);
  }
}

export class AnalysisResultNotFoundError extends HttpException {
  constructor(id: string) {
    super(`Analysis ${id} not found`, HttpStatus.NOT_FOUND);
  }
}

export class DuplicateNameError extends HttpException {
  constructor(kind: string, name: string) {
    super(`${kind} with name '${name}' already exists`, HttpStatus.CONFLICT);
  }
}

export class OrganizationInUseError extends HttpException {
  constructor(id: string) {
    super(`Organization ${id} has recorded requests and cannot be deleted`, HttpStatus.CONFLICT);
  }
}

export class DuplicateDefaultCredentialError extends HttpException {
  constructor() {
    super("An active organization-wide API key already exists", HttpStatus.CONFLICT);
  }
}

/**
 * Non-success reply from the upstream API. The upstream body is relayed to the
 * caller unchanged together with the upstream status.
 */
export class UpstreamError extends HttpException {
  constructor(
    readonly upstreamStatus: number,
    readonly body: Record<string, unknown>,
  ) {
    super(body, upstreamStatus);
  }
}

export type TransportFailure = "connect" | "timeout";

export class TransportError extends HttpException {
  constructor(
    readonly failure: TransportFailure,
    message: string,
  ) {
    super(
      message,
      failure === "timeout" ? HttpStatus.GATEWAY_TIMEOUT : HttpStatus.BAD_GATEWAY,
    );
  }
}

export class MalformedUpstreamResponseError extends HttpException {
  constructor(message: string) {
    super(`Malformed upstream response: ${message}`, HttpStatus.BAD_GATEWAY);
  }
}
