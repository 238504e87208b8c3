export { PageExtractor } from './core/extraction/PageExtractor.js';
export * from './core/extraction/types.js';
export * from './core/session/types.js';
export {
  PlaywrightSession,
  localChromium,
  remoteChromium,
  sessionFactoryFromConfig,
  defaultSessionFactory,
  DEFAULT_NAVIGATION_TIMEOUT,
  DEFAULT_REMOTE_ENDPOINT
} from './core/session/playwrightSession.js';
export * from './core/errors.js';
export { loadConfig, ExtractorConfig, LogLevelName } from './config.js';
export { default as logger, Logger, createLogger } from './utils/logger.js';
export { AmazonBook } from './sites/amazon.js';
