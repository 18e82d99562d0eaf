/**
 * Configuration
 */

export {
  DEVELOPMENT,
  PRODUCTION,
  TESTING,
  PRESETS,
  getPreset,
  isPresetName,
  createConfigFromPreset,
} from './presets.js';
export type { ConfigPreset, PresetName } from './presets.js';

export { loadConfigFromEnv } from './env.js';
export type { ConfigEnv } from './env.js';
