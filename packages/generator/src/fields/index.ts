export {
  generateAmounts,
  roundCents,
  REVENUE_RANGE,
  CAPEX_RANGE,
  OPEX_RANGE,
} from "./amount.js";
export type { AmountPair, AmountRange } from "./amount.js";
export {
  generateTransactionDate,
  DEFAULT_HISTORICAL_PROBABILITY,
  MAX_DAYS_AGO,
} from "./date.js";
export {
  generateJournalSource,
  generateTransactionType,
  describeTransaction,
} from "./journal.js";
export {
  generateWellId,
  generateAfeNumber,
  generateLeaseName,
  generatePropertyId,
  generateJibNumber,
  generateCostCenter,
  generateState,
  generateCounty,
  generateBasin,
} from "./oil-gas.js";
