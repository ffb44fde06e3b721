export { OrganizationsModule } from "./organizations.module.js";
export { type CreateOrganizationInput, CreateOrganizationInputSchema } from "./organizations.schema.js";
export {
  type OrganizationTokenView,
  type OrganizationView,
  OrganizationsService,
  toOrganizationView,
} from "./organizations.service.js";
