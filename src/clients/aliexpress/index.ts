/**
 * AliExpress affiliate client public API
 */

export { AliExpressClient } from "./aliexpressClient";
export type { AliExpressClientConfig, ApiResult } from "./aliexpressClient";
export { AliExpressApiError } from "./apiError";
export { signParams, buildSignBase, formatTimestamp } from "./signing";
export { decodeEnvelope, toApiResponse, responseKeyFor } from "./responseEnvelope";
export { mapPromotionLinks, mapProductDetails } from "./mappers";
