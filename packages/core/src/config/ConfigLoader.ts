import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYAML } from 'yaml';
import { ConfigError } from '../errors/ForkcovError.js';
import { REPORT_FORMATS, type ReportFormat } from '../format/ReportFormatter.js';
import { parseLogLevel, type LogLevel } from '../logging/Logger.js';
import { FORKCOV_VERSION, getSchemaVersion } from '../version.js';

/**
 * forkcov configuration schema.
 *
 * YAML Location: .forkcov/config.yaml (preferred) or .forkcov/config.json (deprecated)
 *
 * Example config.yaml:
 *
 * ```yaml
 * version: "0.1.0"
 * logLevel: info
 * format: summary
 * # Report constructs with an unvisited branch as not run
 * demote: true
 * ```
 *
 * Command-line flags override every value here.
 */
export interface ForkcovConfig {
  /**
   * Config schema version (major.minor.patch, no pre-release tag).
   * If omitted, no version check is performed.
   */
  version?: string;

  logLevel: LogLevel;

  format: ReportFormat;

  /**
   * Apply coverage demotion to node runs.
   * Can be overridden via CLI: --no-demote
   */
  demote: boolean;
}

export const DEFAULT_CONFIG: ForkcovConfig = {
  version: getSchemaVersion(FORKCOV_VERSION),
  logLevel: 'warnings',
  format: 'reference',
  demote: true,
};

type ConfigSource = 'config.yaml' | 'config.json';

/**
 * Load forkcov config from project directory.
 *
 * Priority:
 * 1. config.yaml (preferred)
 * 2. config.json (deprecated, fallback)
 * 3. DEFAULT_CONFIG (if neither exists)
 *
 * Unparseable files log a warning and yield the defaults. Files that parse
 * but hold invalid values throw ConfigError.
 *
 * @param projectPath - Absolute path to project root
 * @param logger - Optional logger for warnings (defaults to console.warn)
 */
export function loadConfig(
  projectPath: string,
  logger: { warn: (msg: string) => void } = console
): ForkcovConfig {
  const configDir = join(projectPath, '.forkcov');
  const yamlPath = join(configDir, 'config.yaml');
  const jsonPath = join(configDir, 'config.json');

  // 1. Try YAML first (preferred)
  if (existsSync(yamlPath)) {
    const parsed = readConfigFile(yamlPath, 'config.yaml', content => parseYAML(content), logger);
    return parsed === null ? DEFAULT_CONFIG : validateConfig(parsed, yamlPath);
  }

  // 2. Fallback to JSON (migration path)
  if (existsSync(jsonPath)) {
    logger.warn('config.json is deprecated. Move its settings to .forkcov/config.yaml');
    const parsed = readConfigFile(jsonPath, 'config.json', content => JSON.parse(content), logger);
    return parsed === null ? DEFAULT_CONFIG : validateConfig(parsed, jsonPath);
  }

  // 3. No config file - return defaults
  return DEFAULT_CONFIG;
}

function readConfigFile(
  filePath: string,
  source: ConfigSource,
  parse: (content: string) => unknown,
  logger: { warn: (msg: string) => void }
): unknown {
  try {
    const content = readFileSync(filePath, 'utf-8');
    // An empty YAML document parses to null
    return parse(content) ?? {};
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.warn(`Failed to parse ${source}: ${error.message}`);
    logger.warn('Using default configuration');
    return null;
  }
}

/**
 * Check a parsed config document and merge it over the defaults.
 * THROWS ConfigError on the first invalid value.
 */
export function validateConfig(parsed: unknown, filePath?: string): ForkcovConfig {
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError('Config error: config must be a mapping of options', 'ERR_CONFIG_INVALID', { filePath });
  }

  const raw: { [key: string]: unknown } = Object.fromEntries(Object.entries(parsed));
  validateVersion(raw.version);

  const config: ForkcovConfig = { ...DEFAULT_CONFIG };

  if (raw.version !== undefined && raw.version !== null) {
    config.version = String(raw.version);
  }

  if (raw.logLevel !== undefined && raw.logLevel !== null) {
    const level = typeof raw.logLevel === 'string' ? parseLogLevel(raw.logLevel) : null;
    if (level === null) {
      throw new ConfigError(
        `Config error: logLevel must be one of silent, errors, warnings, info, debug, got ${JSON.stringify(raw.logLevel)}`,
        'ERR_CONFIG_OPTION',
        { filePath, option: 'logLevel' },
      );
    }
    config.logLevel = level;
  }

  if (raw.format !== undefined && raw.format !== null) {
    config.format = parseReportFormat(raw.format, filePath);
  }

  if (raw.demote !== undefined && raw.demote !== null) {
    if (typeof raw.demote !== 'boolean') {
      throw new ConfigError(
        `Config error: demote must be a boolean, got ${typeof raw.demote}`,
        'ERR_CONFIG_OPTION',
        { filePath, option: 'demote' },
      );
    }
    config.demote = raw.demote;
  }

  return config;
}

export function parseReportFormat(value: unknown, filePath?: string): ReportFormat {
  const format = REPORT_FORMATS.find(candidate => candidate === value);
  if (format === undefined) {
    throw new ConfigError(
      `Config error: format must be one of ${REPORT_FORMATS.join(', ')}, got ${JSON.stringify(value)}`,
      'ERR_CONFIG_OPTION',
      { filePath, option: 'format' },
    );
  }
  return format;
}

/**
 * Validate config version compatibility with running forkcov version.
 * THROWS on error (fail loudly per project convention).
 *
 * Compares major.minor.patch (pre-release tags are stripped).
 * If config has no version field, validation passes silently.
 *
 * @param configVersion - Version string from config file (may be undefined)
 * @param currentVersion - Override for testing (defaults to FORKCOV_VERSION)
 */
export function validateVersion(
  configVersion: unknown,
  currentVersion?: string
): void {
  if (configVersion === undefined || configVersion === null) {
    return;
  }

  if (typeof configVersion !== 'string') {
    throw new ConfigError(`Config error: version must be a string, got ${typeof configVersion}`, 'ERR_CONFIG_INVALID');
  }

  if (!configVersion.trim()) {
    throw new ConfigError('Config error: version cannot be empty', 'ERR_CONFIG_INVALID');
  }

  const current = currentVersion ?? FORKCOV_VERSION;
  const configSchema = getSchemaVersion(configVersion);
  const currentSchema = getSchemaVersion(current);

  if (configSchema !== currentSchema) {
    throw new ConfigError(
      `Config error: config version "${configVersion}" is not compatible with ` +
      `forkcov ${current}. Expected "${currentSchema}".`,
      'ERR_CONFIG_INVALID',
      {},
      `Set version: "${currentSchema}" in .forkcov/config.yaml`,
    );
  }
}
