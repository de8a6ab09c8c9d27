import { ConfigLevel, ConfigEntry, LEVEL_PRECEDENCE } from './config-level';
import { ConfigParser } from './config-parser';
import { ConfigStore } from './config-store';
import {
  SweepConfigManager,
  ConfigKeys,
  ConfigKey,
  WritableLevel,
  isKnownKey,
} from './config-manager';
import { TypedConfig } from './typed-config';

export {
  ConfigLevel,
  ConfigEntry,
  LEVEL_PRECEDENCE,
  ConfigParser,
  ConfigStore,
  SweepConfigManager,
  ConfigKeys,
  isKnownKey,
  TypedConfig,
};
export type { ConfigKey, WritableLevel };
