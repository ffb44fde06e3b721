import { Module } from "@nestjs/common";
import { AuthModule } from "../auth/index.js";
import { ConversationModule } from "../conversation/index.js";
import { PersonasController } from "./personas.controller.js";
import { PersonasService } from "./personas.service.js";

@Module({
  imports: [AuthModule, ConversationModule],
  controllers: [PersonasController],
  providers: [PersonasService],
  exports: [PersonasService],
})
export class PersonasModule {}
