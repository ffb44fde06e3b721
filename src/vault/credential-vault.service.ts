import { createCipheriv, createDecipheriv, randomBytes, randomInt } from "node:crypto";
import { Injectable } from "@nestjs/common";
import { ConfigService } from "../config/config.service.js";
import { ConfigurationError } from "../errors/index.js";

const ALGORITHM = "aes-256-gcm";
const KEY_BYTES = 32;
const IV_BYTES = 12;
const FORMAT_VERSION = "v1";

export const SYNTHETIC_KEY_PREFIX = "sk-proxy-";
const SYNTHETIC_KEY_LENGTH = 48;
const ALPHANUMERIC = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

export function generateSyntheticKey(): string {
  let suffix = "";
  for (let i = 0; i < SYNTHETIC_KEY_LENGTH; i++) {
    suffix += ALPHANUMERIC[randomInt(ALPHANUMERIC.length)];
  }
  return `${SYNTHETIC_KEY_PREFIX}${suffix}`;
}

export function isSyntheticKey(value: string): boolean {
  return /^sk-proxy-[A-Za-z0-9]{48}$/.test(value);
}

/**
 * Symmetric encryption of upstream API keys at rest. Ciphertexts are
 * `v1.<iv>.<tag>.<data>` with base64url segments.
 */
@Injectable()
export class CredentialVault {
  private key: Buffer | null = null;

  constructor(private readonly configService: ConfigService) {}

  encrypt(plaintext: string): string {
    const iv = randomBytes(IV_BYTES);
    const cipher = createCipheriv(ALGORITHM, this.getKey(), iv);
    const data = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);
    const tag = cipher.getAuthTag();
    return [FORMAT_VERSION, iv, tag, data]
      .map((part) => (typeof part === "string" ? part : part.toString("base64url")))
      .join(".");
  }

  decrypt(ciphertext: string): string {
    const [version, iv, tag, data] = ciphertext.split(".");
    if (version !== FORMAT_VERSION || iv === undefined || tag === undefined || data === undefined) {
      throw new ConfigurationError("Stored API key has an unrecognized format");
    }
    const decipher = createDecipheriv(ALGORITHM, this.getKey(), Buffer.from(iv, "base64url"));
    decipher.setAuthTag(Buffer.from(tag, "base64url"));
    try {
      return Buffer.concat([
        decipher.update(Buffer.from(data, "base64url")),
        decipher.final(),
      ]).toString("utf8");
    } catch {
      throw new ConfigurationError("Stored API key could not be decrypted with ENCRYPTION_KEY");
    }
  }

  private getKey(): Buffer {
    if (this.key) return this.key;
    const encoded = this.configService.get("encryptionKey");
    if (!encoded) {
      throw new ConfigurationError("ENCRYPTION_KEY is not configured");
    }
    const key = Buffer.from(encoded, "base64");
    if (key.length !== KEY_BYTES) {
      throw new ConfigurationError(`ENCRYPTION_KEY must be base64 encoding of ${KEY_BYTES} bytes`);
    }
    this.key = key;
    return key;
  }
}
