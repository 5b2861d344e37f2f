export * from './core/ociauth/specificity.js'
export * from './core/ociauth/address.js'
export * from './core/ociauth/credentials.js'
export * from './core/ociauth/errors.js'
export * from './core/ociauth/sources.js'
export * from './core/ociauth/environment.js'
export * from './core/ociauth/credentialHelper.js'
export * from './core/ociauth/match.js'
export * from './core/ociauth/config.js'
export * from './core/ociauth/dockerConfig.js'
export * from './core/ociauth/discovery.js'
export * from './core/ociauth/configs.js'
export * from './core/cliconfig/diagnostics.js'
export * from './core/cliconfig/ociCredentials.js'
export * from './core/cliconfig/config.js'
export * from './core/cliconfig/ociCredentialsPolicy.js'
export { createLogger, silentLogger, type Logger, type LogLevel, type LogSink } from './core/logger.js'
