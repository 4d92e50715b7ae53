/**
 * HTTP client public API
 */

export { httpRequest, fetchFinalUrl } from "./httpClient";
export { HttpError, isTransportError, maskUrlCredentials } from "./httpError";
export type {
  HttpRequest,
  HttpRequestFn,
  HttpMethod,
  HttpErrorDetails,
  HttpRetryConfig,
  FetchFinalUrlFn,
  FinalUrlRequest,
  FinalUrlResponse,
} from "@/types";
