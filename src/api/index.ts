export { createApiRouter, createApp, startServer } from './server';
export type { ApiOptions } from './server';
