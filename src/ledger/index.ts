export { LedgerModule } from "./ledger.module.js";
export {
  type FinalizeDetails,
  generateRequestId,
  type OpenRequestInput,
  ownsRequest,
  RequestLedger,
} from "./request-ledger.service.js";
export { parseUsage, type UsageReport } from "./usage.js";
