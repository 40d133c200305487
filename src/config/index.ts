/**
 * @fileoverview Configuration presets and loading.
 */

export {
  PRESET_NAMES,
  isPresetName,
  presetDefaults,
  type ConcordConfig,
  type PresetName,
} from './presets.js';

export {
  DEFAULT_CONFIG_FILE,
  loadConfig,
  readConfigFile,
  readEnvConfig,
  type ConfigInput,
  type LoadConfigOptions,
} from './loader.js';
