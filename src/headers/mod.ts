/**
 * Claim-based response header API.
 */

export { getHeaderClaims, HeaderClaims } from "./header_claims.ts";
export type { HeaderClaimsEnv, HeaderSetter, HeaderWriter } from "./header_claims.ts";
export { HeaderClaimConflictError } from "./errors.ts";
