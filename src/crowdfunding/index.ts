export { CrowdfundingPlatform, type CrowdfundingPlatformOptions } from "./platform.js";
export { DEFAULT_PLATFORM_CONFIG, validatePlatformConfig } from "./config.js";
export { evaluateStatus, fundingProgress, hasEnded } from "./lifecycle.js";
export { BASIS_POINTS, MAX_UINT256, checkedAdd, checkedSub, checkedMul, feeOf, assertBasisPoints } from "./math.js";
export { emptyBalance, feeOutstanding, refundableAmount, assertConserved } from "./ledger.js";
export { consoleEventLogger, type CampaignEvent, type CampaignEventListener } from "./events.js";
export { isAddress, assertAddress } from "./address.js";
export {
  CampaignError,
  AuthorizationError,
  InvalidInputError,
  InvalidStateError,
  TemporalViolationError,
  ConservationViolationError,
  type CampaignErrorKind,
  type ErrorDetails
} from "./errors.js";
export type {
  AccessControl,
  Address,
  BalanceLedger,
  Campaign,
  CampaignDetails,
  CampaignInfo,
  CampaignStatus,
  Clock,
  CreateCampaignInput,
  DonorRecord,
  FundingModel,
  PauseGate,
  PlatformConfig,
  TokenRegistry,
  TokenTransfers
} from "./types.js";
