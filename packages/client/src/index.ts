export { createApiClient } from "./api-client.js";
export type { ApiClient, ApiClientOptions, ApiError, ApiResult, AudioUpload } from "./api-client.js";
