import { Injectable, type LogLevel, Logger } from "@nestjs/common";

export const CONFIG_DEFAULTS = {
  PORT: 3000,
  UPSTREAM_BASE_URL: "https://api.openai.com/v1",
  UPSTREAM_TIMEOUT: "10m",
  UPSTREAM_TIMEOUT_MS: 10 * 60 * 1000,
  JWT_ALGORITHM: "HS256",
  JWT_EXPIRATION: "365d",
  JWT_EXPIRATION_MS: 365 * 24 * 60 * 60 * 1000,
  CORS_ORIGINS: ["http://localhost:3000", "http://localhost:8080"],
  RATE_LIMIT_REQUESTS: 100,
  RATE_LIMIT_WINDOW: "1m",
  RATE_LIMIT_WINDOW_MS: 60 * 1000,
  LOG_LEVEL: "log",
} as const;

export const JWT_ALGORITHMS = ["HS256", "HS384", "HS512"] as const;
export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];

const LOG_LEVELS: LogLevel[] = ["fatal", "error", "warn", "log", "debug", "verbose"];

export interface Config {
  port: number;
  databaseUrl: string | undefined;
  databaseAutoMigrate: boolean;
  upstreamBaseUrl: string;
  upstreamTimeout: number; // in milliseconds
  encryptionKey: string | undefined; // base64, 32 bytes
  jwtSecretKey: string | undefined;
  jwtAlgorithm: JwtAlgorithm;
  jwtExpiration: number; // in milliseconds
  corsOrigins: string[];
  rateLimitRequests: number; // recognised, not enforced
  rateLimitWindow: number; // in milliseconds
  adminTokens: string[];
  logLevels: LogLevel[];
}

@Injectable()
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private readonly config: Config;

  constructor() {
    this.config = {
      port: this.parseInteger("PORT", CONFIG_DEFAULTS.PORT),
      databaseUrl: process.env["DATABASE_URL"] || undefined,
      databaseAutoMigrate: process.env["DATABASE_AUTO_MIGRATE"] === "true",
      upstreamBaseUrl: (process.env["UPSTREAM_BASE_URL"] ?? CONFIG_DEFAULTS.UPSTREAM_BASE_URL).replace(
        /\/+$/,
        "",
      ),
      upstreamTimeout: this.parseDuration(
        "UPSTREAM_TIMEOUT",
        CONFIG_DEFAULTS.UPSTREAM_TIMEOUT,
        CONFIG_DEFAULTS.UPSTREAM_TIMEOUT_MS,
      ),
      encryptionKey: process.env["ENCRYPTION_KEY"] || undefined,
      jwtSecretKey: process.env["JWT_SECRET_KEY"] || undefined,
      jwtAlgorithm: this.parseJwtAlgorithm(),
      jwtExpiration: this.parseDuration(
        "JWT_EXPIRATION",
        CONFIG_DEFAULTS.JWT_EXPIRATION,
        CONFIG_DEFAULTS.JWT_EXPIRATION_MS,
      ),
      corsOrigins: this.parseCorsOrigins(),
      rateLimitRequests: this.parseInteger("RATE_LIMIT_REQUESTS", CONFIG_DEFAULTS.RATE_LIMIT_REQUESTS),
      rateLimitWindow: this.parseDuration(
        "RATE_LIMIT_WINDOW",
        CONFIG_DEFAULTS.RATE_LIMIT_WINDOW,
        CONFIG_DEFAULTS.RATE_LIMIT_WINDOW_MS,
      ),
      adminTokens: this.parseList(process.env["ADMIN_TOKENS"]),
      logLevels: this.parseLogLevels(),
    };
  }

  get<K extends keyof Config>(key: K): Config[K] {
    return this.config[key];
  }

  private parseInteger(envKey: string, defaultValue: number): number {
    const value = process.env[envKey];
    if (!value) return defaultValue;
    const parsed = Number.parseInt(value, 10);
    if (Number.isNaN(parsed)) return defaultValue;
    return parsed;
  }

  private parseDuration(envKey: string, defaultValue: string, defaultMs: number): number {
    const value = process.env[envKey] ?? defaultValue;
    const match = value.match(/^(\d+)(s|m|h|d)$/);
    if (!match) {
      this.logger.warn(`Invalid ${envKey} format: ${value}, using default ${defaultValue}`);
      return defaultMs;
    }
    const num = Number.parseInt(match[1] ?? "0", 10);
    const unit = match[2];
    switch (unit) {
      case "s":
        return num * 1000;
      case "m":
        return num * 60 * 1000;
      case "h":
        return num * 60 * 60 * 1000;
      case "d":
        return num * 24 * 60 * 60 * 1000;
      default:
        return defaultMs;
    }
  }

  private parseJwtAlgorithm(): JwtAlgorithm {
    const value = process.env["JWT_ALGORITHM"];
    if (!value) return CONFIG_DEFAULTS.JWT_ALGORITHM;
    const algorithm = JWT_ALGORITHMS.find((a) => a === value);
    if (!algorithm) {
      this.logger.warn(
        `Unsupported JWT_ALGORITHM: ${value}, using default ${CONFIG_DEFAULTS.JWT_ALGORITHM}`,
      );
      return CONFIG_DEFAULTS.JWT_ALGORITHM;
    }
    return algorithm;
  }

  // Accepts a comma-separated list or a JSON array of strings
  private parseCorsOrigins(): string[] {
    const value = process.env["CORS_ORIGINS"]?.trim();
    if (!value) return [...CONFIG_DEFAULTS.CORS_ORIGINS];
    if (value.startsWith("[")) {
      try {
        const parsed: unknown = JSON.parse(value);
        if (Array.isArray(parsed)) {
          return parsed.filter((o): o is string => typeof o === "string" && o.length > 0);
        }
      } catch {
        this.logger.warn("CORS_ORIGINS is not valid JSON, treating it as a comma-separated list");
      }
    }
    return this.parseList(value);
  }

  private parseLogLevels(): LogLevel[] {
    const value = process.env["LOG_LEVEL"]?.toLowerCase() ?? CONFIG_DEFAULTS.LOG_LEVEL;
    // Common aliases from other ecosystems
    const normalized = value === "info" ? "log" : value === "warning" ? "warn" : value;
    const index = LOG_LEVELS.findIndex((l) => l === normalized);
    if (index === -1) {
      this.logger.warn(`Invalid LOG_LEVEL: ${value}, using default ${CONFIG_DEFAULTS.LOG_LEVEL}`);
      return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(CONFIG_DEFAULTS.LOG_LEVEL) + 1);
    }
    return LOG_LEVELS.slice(0, index + 1);
  }

  private parseList(value: string | undefined): string[] {
    if (!value) return [];
    return value
      .split(",")
      .map((t) => t.trim())
      .filter(Boolean);
  }
}
