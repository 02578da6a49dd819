/**
 * Campaign Module Exports
 */

export * from "./types.js";
export { CampaignStore } from "./campaign-store.js";
export { IssuedToken, type IssuedTokenMetadata } from "./issued-token.js";
export {
  CampaignLedger,
  createCampaignLedger,
  campaignStatus,
  type CampaignLedgerDeps,
  type BuyQuote,
  type CampaignFilter,
} from "./campaign-ledger.js";
