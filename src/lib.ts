/**
 * Public API.
 */

export * from './core/index.js'
export * from './application/index.js'
export * from './infrastructure/index.js'
export { createApp, type App } from './app/createApp.js'
export { createDefaultAppConfig, loadAppConfig, type AppConfig, type WatchConfig } from './config/appConfig.js'
