import { Module } from "@nestjs/common";
import { AuthModule } from "../auth/index.js";
import { SessionsController, UsersController } from "./conversation.controller.js";
import { ConversationService } from "./conversation.service.js";

@Module({
  imports: [AuthModule],
  controllers: [UsersController, SessionsController],
  providers: [ConversationService],
  exports: [ConversationService],
})
export class ConversationModule {}
