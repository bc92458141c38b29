/**
 * Configuration Module - Public API
 *
 * Layered configuration, resolver option schemas and secret reference
 * resolution.
 */

export {
  Configuration,
  ConfigurationBuilder,
  flattenObject,
  KEY_DELIMITER,
  type ConfigurationValues,
} from './builder.js';

export * from './schemas/index.js';

export * from './secrets/index.js';
