export { default as DaikinSmartApp } from './app';
export type { DaikinSmartAppOptions, SmartAppEvents } from './app';
export { loadConfig, readSettingsFile, DEFAULT_STORAGE_PATH } from './config';
export type { SmartAppConfig, SmartAppSettings } from './config';
export { CommandDispatcher } from './commands/CommandDispatcher';
export { DaikinAuthenticator } from './lib/daikin/DaikinAuthenticator';
export { DaikinCloudClient } from './lib/daikin/DaikinCloudClient';
export * from './lib/daikin/errors';
export { createInMemoryTokenStore } from './lib/daikin/Provider';
export type { Authenticator, LoginResult, Provider, TokenStore } from './lib/daikin/Provider';
export { RateLimiter } from './lib/daikin/RateLimiter';
export { SessionManager } from './lib/daikin/SessionManager';
export type { SessionSource } from './lib/daikin/SessionManager';
export { CredentialStore } from './lib/storage/CredentialStore';
export type { CredentialInput } from './lib/storage/CredentialStore';
export { default as JsonFileStore } from './lib/storage/JsonFileStore';
export { PollScheduler } from './polling/PollScheduler';
export { StateSynchronizer } from './polling/StateSynchronizer';
export type { CommandOutcome, ConfidenceChange, RediscoveryHint } from './polling/StateSynchronizer';
export { DeviceRegistry } from './registry/DeviceRegistry';
export * from './types';
