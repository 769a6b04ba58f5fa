/**
 * @evtlog/config
 * Logging configuration: settings objects, YAML and INI files, discovery and backend wiring.
 */

export {
  configureLogging,
  type ConfigureLoggingOptions,
  type ConfiguredLogging,
} from './configure.js';
export {
  DEFAULT_EVTLOG_CONFIG_FILES,
  resolveConfigPath,
  type ResolveConfigPathOptions,
} from './discovery.js';
export { ConfigurationLoadError, ConfigurationRejectedError } from './errors.js';
export {
  loadLoggingSettings,
  type LoadLoggingSettingsOptions,
  type LoadedLoggingSettings,
  type LoadedSettingsFormat,
  type LoggingSettingsSource,
} from './loader.js';
export { parseIniSettings } from './parsing/ini.js';
export {
  YAML_EXTENSIONS,
  parseSettingsText,
  type ParsedSettingsText,
  type SettingsFormat,
} from './parsing/settings-text.js';
export {
  LOGGING_SETTINGS_SCHEMA,
  type HandlerSettings,
  type LoggerSettings,
  type LoggingSettings,
  type LoggingSettingsInput,
} from './settings/schema.js';
export { validateLoggingSettings } from './settings/validate.js';
