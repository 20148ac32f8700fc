/**
 * Configuration loading utilities
 */
export {
  loadConfig,
  DEFAULT_CONFIG,
  validateConfig,
  validateVersion,
  parseReportFormat,
} from './ConfigLoader.js';
export type { ForkcovConfig } from './ConfigLoader.js';
