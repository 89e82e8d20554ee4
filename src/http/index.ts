export { HttpEndpoint, VERSION_HEADER } from './endpoint.js';
export type { FetchFn, HttpEndpointConfig } from './endpoint.js';
