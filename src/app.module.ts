import { Module } from "@nestjs/common";
import { AdminModule } from "./admin/index.js";
import { AnalysisModule } from "./analysis/index.js";
import { AuthModule } from "./auth/index.js";
import { ConfigModule } from "./config/index.js";
import { ConversationModule } from "./conversation/index.js";
import { CredentialsModule } from "./credentials/index.js";
import { DataModule } from "./data/index.js";
import { HealthController } from "./health/health.controller.js";
import { OrganizationsModule } from "./organizations/index.js";
import { PersonasModule } from "./personas/index.js";
import { RelayModule } from "./relay/index.js";

@Module({
  imports: [
    ConfigModule,
    DataModule,
    AuthModule,
    OrganizationsModule,
    AdminModule,
    ConversationModule,
    CredentialsModule,
    PersonasModule,
    RelayModule,
    AnalysisModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
