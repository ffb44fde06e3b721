export { PersonasModule } from "./personas.module.js";
export { isPersonaAccessible, type PersonaView, PersonasService } from "./personas.service.js";
