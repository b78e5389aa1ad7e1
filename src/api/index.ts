export { PracticumApiClient } from './PracticumApiClient.js';
export type { PracticumApiClientConfig, FetchFn } from './types.js';
