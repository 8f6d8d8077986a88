export { normalizePackSize } from './normalize';
export { extractNumericTokens } from './numericTokens';
export { PACK_SIZE_RULES, FALLBACK_RULE } from './rules';
export { PackUnit, PACK_UNITS, PACK_SIZE_RULE_IDS } from './types';
export type { NormalizedPackSize, PackSizeRule, PackSizeRuleId, RawLabel } from './types';
