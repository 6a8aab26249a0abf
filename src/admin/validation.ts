// Admin input patterns
const SAFE_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;
const SAFE_MARKET_ID_PATTERN = /^[a-zA-Z0-9_-]{1,128}$/;
const SAFE_PARAM_PATTERN = /^[a-zA-Z0-9_.]{1,64}$/;

export function isValidStrategyName(name: string): boolean {
  return SAFE_NAME_PATTERN.test(name);
}

export function isValidMarketId(marketId: string): boolean {
  return SAFE_MARKET_ID_PATTERN.test(marketId);
}

export function isValidParamName(param: string): boolean {
  return SAFE_PARAM_PATTERN.test(param);
}

/**
 * Strip control characters and truncate before a value goes into a log or audit line
 */
export function sanitizeForLog(message: string, maxLength = 500): string {
  const cleaned = message.replace(/[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f]/g, '?');
  return cleaned.length > maxLength ? `${cleaned.slice(0, maxLength)}...` : cleaned;
}
