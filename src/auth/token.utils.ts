import { isSyntheticKey } from "../vault/index.js";

export type ParsedToken = { kind: "synthetic"; key: string } | { kind: "jwt"; token: string };

export function parseBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader) return null;
  const match = authHeader.match(/^Bearer (.+)$/);
  if (!match) return null;
  return match[1]?.trim() || null;
}

export function parseToken(authHeader: string | undefined): ParsedToken | null {
  const token = parseBearerToken(authHeader);
  if (!token) return null;
  if (isSyntheticKey(token)) {
    return { kind: "synthetic", key: token };
  }
  // compact JWS: three base64url segments
  if (/^[\w-]+\.[\w-]+\.[\w-]*$/.test(token)) {
    return { kind: "jwt", token };
  }
  return null;
}
