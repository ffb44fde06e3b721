import { ConfigService } from "../src/config/config.service.js";

export const TEST_ENCRYPTION_KEY = Buffer.alloc(32, 7).toString("base64");
export const TEST_JWT_SECRET = "test-secret";

/** A ConfigService built from the given variables on top of the test defaults. */
export function createTestConfig(env: Record<string, string> = {}): ConfigService {
  const originalEnv = process.env;
  process.env = {
    ...originalEnv,
    ENCRYPTION_KEY: TEST_ENCRYPTION_KEY,
    JWT_SECRET_KEY: TEST_JWT_SECRET,
    UPSTREAM_BASE_URL: "http://upstream.test/v1",
    ...env,
  };
  try {
    return new ConfigService();
  } finally {
    process.env = originalEnv;
  }
}
