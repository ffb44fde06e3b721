import { Module } from "@nestjs/common";
import { AuthModule } from "../auth/index.js";
import { OrganizationsModule } from "../organizations/index.js";
import { AdminController } from "./admin.controller.js";

@Module({
  imports: [AuthModule, OrganizationsModule],
  controllers: [AdminController],
})
export class AdminModule {}
