export * from './types';
export * from './core';
export { loadConfig, getDefaultConfig, validateConfig, mergeConfig, applyEnvironment, parseRunMode, exitCodeFor } from './config';
export { createApp, createApiRouter, startServer } from './api';
