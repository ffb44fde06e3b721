export { ConfigModule } from "./config.module.js";
export { type Config, CONFIG_DEFAULTS, ConfigService, type JwtAlgorithm } from "./config.service.js";
