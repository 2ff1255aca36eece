export { createApp } from './app'
export type { AppDependencies } from './app'
export { ConfigSchema, loadConfig, readBuildInfo, MISSING_VERSION, MISSING_BRANCH } from './config'
export type { ServerConfig, BuildInfo } from './config'
