// src/index.ts

export * from './http-client/index.js';
export * from './query/index.js';
export { CloudFoundryService, SERVICE_LABEL } from './service/cloudFoundryService.js';
